import type { Requestable } from "./models/call-params";
import {
  ResponseHandler,
  type AnyResponseHandler,
  type ErrorHandler,
  type ProgressHandler,
} from "./models/handlers";
import type { ResponseKind, ResponseType } from "./models/response";
import type { CompletionQueue } from "./utils/completion-queue";

/**
 * A single logical network operation: a request and everything that
 * consumes its response.
 */
export interface AnyRequestCall {
  readonly request: Requestable;
  /** Matched in registration order */
  readonly handlers: readonly AnyResponseHandler[];
  readonly errorHandler?: ErrorHandler;
  readonly progress: readonly ProgressHandler[];
  /** Where handlers, progress and the call's completion run */
  readonly queue: CompletionQueue;
}

/**
 * The call type executed by {@link NetworkService}. Created with {@link CallBuilder}
 * and immutable afterwards.
 */
export class RequestCall implements AnyRequestCall {
  public readonly handlers: readonly AnyResponseHandler[];
  public readonly progress: readonly ProgressHandler[];

  constructor(
    public readonly request: Requestable,
    handlers: readonly AnyResponseHandler[],
    progress: readonly ProgressHandler[],
    public readonly queue: CompletionQueue,
    public readonly errorHandler?: ErrorHandler
  ) {
    this.handlers = Object.freeze([...handlers]);
    this.progress = Object.freeze([...progress]);
  }
}

/**
 * Fluent construction of a {@link RequestCall}.
 *
 * @example
 * ```typescript
 * const call = service
 *   .builder({ method: "GET", path: "/users", encoding: "url", statusCodes: [200] })
 *   .response(ResponseTypes.schema("Users", usersSchema), 200, (users) => render(users))
 *   .error((error) => report(error))
 *   .make();
 * ```
 */
export class CallBuilder {
  private readonly handlers: AnyResponseHandler[] = [];
  private readonly progressHandlers: ProgressHandler[] = [];
  private errorHandler?: ErrorHandler;
  private completionQueue: CompletionQueue;

  constructor(
    private readonly request: Requestable,
    queue: CompletionQueue
  ) {
    this.completionQueue = queue;
  }

  /**
   * Registers a handler for responses with the given status code(s).
   * Several handlers may match the same response; all of them are invoked.
   */
  public response<K extends ResponseKind, R>(
    responseType: ResponseType<K, R>,
    statuses: number | Iterable<number>,
    handler: (response: R) => void
  ): this {
    const accepted = typeof statuses === "number" ? [statuses] : statuses;
    this.handlers.push(new ResponseHandler(responseType, accepted, handler));
    return this;
  }

  public error(handler: ErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  public progress(handler: ProgressHandler): this {
    this.progressHandlers.push(handler);
    return this;
  }

  public queue(queue: CompletionQueue): this {
    this.completionQueue = queue;
    return this;
  }

  public make(): RequestCall {
    return new RequestCall(
      this.request,
      this.handlers,
      this.progressHandlers,
      this.completionQueue,
      this.errorHandler
    );
  }
}
