import type { BatchCompletion, CallCompletion } from "./models/handlers";
import { failure, success, type BatchResult, type CallOutcome } from "./models/outcome";
import type { RequestWrapper } from "./request-wrapper";
import type { CompletionQueue } from "./utils/completion-queue";

/**
 * How a batch of calls is executed.
 *
 * - `parallel` - every call starts right away
 * - `sequential` - each call starts once the previous one completed
 *
 * With `ignoreFailures` unset, the first failure fails the batch: in parallel
 * mode the other calls are cancelled, in sequential mode the remaining calls
 * are never sent.
 */
export interface ExecutionOption {
  readonly mode: "parallel" | "sequential";
  readonly ignoreFailures: boolean;
}

export const ExecutionOption = {
  parallel(ignoreFailures = false): ExecutionOption {
    return { mode: "parallel", ignoreFailures };
  },
  sequential(ignoreFailures = false): ExecutionOption {
    return { mode: "sequential", ignoreFailures };
  },
};

/**
 * Builds the wrapper of a call; `completion` receives the call's aggregate outcome.
 */
export type CallProcessor<T> = (call: T, completion: CallCompletion) => RequestWrapper;

interface BatchRun<T> {
  readonly calls: readonly T[];
  readonly ignoreFailures: boolean;
  readonly queue: CompletionQueue;
  readonly process: CallProcessor<T>;
  readonly deliver: BatchCompletion;
}

/**
 * State of a parallel batch. Wrapper callbacks only reference this object;
 * the batch owns the captured result and the outstanding-call counter.
 */
export class ParallelBatch<T> {
  private captured: BatchResult = success;
  private remaining: number;
  private wrappers: readonly RequestWrapper[] = [];

  constructor(private readonly run: BatchRun<T>) {
    this.remaining = run.calls.length;
  }

  public start(): void {
    this.wrappers = this.run.calls.map((call) =>
      this.run.process(call, (outcome) => this.settle(outcome))
    );
    for (const wrapper of this.wrappers) {
      wrapper
        .onReady((ready) => ready.start())
        .onFail((error) => this.settle(failure(error)));
    }
  }

  private settle(outcome: CallOutcome): void {
    if (!outcome.ok && !this.run.ignoreFailures && this.captured.ok) {
      this.captured = outcome;
      for (const wrapper of this.wrappers) {
        wrapper.cancel();
      }
    }

    this.remaining--;
    if (this.remaining === 0) {
      const result = this.captured;
      this.run.queue.dispatch(() => this.run.deliver(result));
    }
  }
}

/**
 * State of a sequential batch, advanced by each call's completion.
 * A call is built only after the previous one completed.
 */
export class SequentialBatch<T> {
  private index = 0;

  constructor(private readonly run: BatchRun<T>) {}

  public start(): void {
    this.processCurrent();
  }

  private processCurrent(): void {
    this.run
      .process(this.run.calls[this.index], (outcome) => this.settle(outcome))
      .onReady((ready) => ready.start())
      .onFail((error) => this.settle(failure(error)));
  }

  private settle(outcome: CallOutcome): void {
    if (!outcome.ok && !this.run.ignoreFailures) {
      this.finish(outcome);
      return;
    }

    this.index++;
    if (this.index >= this.run.calls.length) {
      this.finish(success);
      return;
    }
    this.processCurrent();
  }

  private finish(result: BatchResult): void {
    this.run.queue.dispatch(() => this.run.deliver(result));
  }
}
