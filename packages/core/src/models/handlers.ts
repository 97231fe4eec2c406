import type { Progress } from "./call-params";
import type { NetworkServiceError } from "./network-service-error";
import type { BatchResult, CallOutcome } from "./outcome";
import {
  isInterpretedAs,
  type HttpResponse,
  type InterpretedResponse,
  type ResponseKind,
  type ResponseType,
} from "./response";

/**
 * Handler function for failures of a call. Called for every failed
 * interpretation, before the failure is returned in the outcome.
 *
 * @param error - The failure that occurred
 */
export interface ErrorHandler {
  (error: NetworkServiceError): void;
}

/**
 * Handler function for download progress of a call.
 */
export interface ProgressHandler {
  (progress: Progress): void;
}

/**
 * Receives the aggregate outcome of a single call.
 */
export interface CallCompletion {
  (outcome: CallOutcome): void;
}

/**
 * Receives the result of a batch.
 */
export interface BatchCompletion {
  (result: BatchResult): void;
}

/**
 * A registered response handler, with its response type erased.
 */
export interface AnyResponseHandler {
  readonly statuses: ReadonlySet<number>;
  readonly kind: ResponseKind;
  /** Name of the constructed response type */
  readonly typeName: string;
  /**
   * Constructs the typed response from `interpreted` and returns a function
   * delivering it. Throws when construction fails.
   */
  prepare(response: HttpResponse, interpreted: InterpretedResponse): () => void;
}

/**
 * Binds a response type to the status codes it accepts and the function receiving it.
 *
 * @template K - The kind of body the response type consumes
 * @template R - The constructed response type
 */
export class ResponseHandler<K extends ResponseKind, R>
  implements AnyResponseHandler
{
  public readonly statuses: ReadonlySet<number>;

  constructor(
    public readonly responseType: ResponseType<K, R>,
    statuses: Iterable<number>,
    private readonly handler: (response: R) => void
  ) {
    this.statuses = new Set(statuses);
  }

  public get kind(): K {
    return this.responseType.kind;
  }

  public get typeName(): string {
    return this.responseType.name;
  }

  public prepare(
    response: HttpResponse,
    interpreted: InterpretedResponse
  ): () => void {
    if (!isInterpretedAs(interpreted, this.responseType.kind)) {
      throw new TypeError(
        `'${this.typeName}' expects a ${this.kind} response, got ${interpreted.kind}`
      );
    }
    const constructed = this.responseType.construct(response, interpreted.body);
    return () => this.handler(constructed);
  }
}
