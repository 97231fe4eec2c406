import type { CallCompletion } from "./models/handlers";
import type { CallOutcome } from "./models/outcome";
import { RESPONSE_KINDS } from "./models/response";
import type { CompletionQueue } from "./utils/completion-queue";

/**
 * Joins the interpretations of one call into a single outcome.
 *
 * The first outcome is kept; a later success replaces a kept failure, and
 * nothing else replaces a kept outcome. When every expected outcome has
 * arrived, the aggregate is dispatched once on `queue`.
 *
 * NOTE: the result depends on arrival order whenever failures with different
 * reasons arrive before any success. See DESIGN.md.
 */
export class CompletionBarrier {
  private remaining: number;
  private aggregate?: CallOutcome;

  constructor(
    private readonly queue: CompletionQueue,
    private readonly completion: CallCompletion,
    expected: number = RESPONSE_KINDS.length
  ) {
    this.remaining = expected;
  }

  public get pending(): number {
    return this.remaining;
  }

  /**
   * Records one interpretation's outcome.
   *
   * @throws {Error} If every expected outcome has already arrived
   */
  public arrive(outcome: CallOutcome): void {
    if (this.remaining === 0) {
      throw new Error("CompletionBarrier received more outcomes than expected");
    }

    const kept = this.aggregate;
    const aggregate = !kept || (outcome.ok && !kept.ok) ? outcome : kept;
    this.aggregate = aggregate;

    this.remaining--;
    if (this.remaining === 0) {
      this.queue.dispatch(() => this.completion(aggregate));
    }
  }
}
