import type { NetworkServiceError } from "./models/network-service-error";
import type { TransportRequest } from "./request-adapter";

type WrapperState =
  | { status: "pending" }
  | { status: "ready"; request: TransportRequest }
  | { status: "failed"; error: NetworkServiceError };

/**
 * Deferred handle around a transport request that is being built.
 * Leaves `pending` exactly once, either with a request ready to start or
 * with the error that prevented building it.
 */
export class RequestWrapper {
  private state: WrapperState = { status: "pending" };
  private readyCallback?: (wrapper: RequestWrapper) => void;
  private failCallback?: (error: NetworkServiceError) => void;
  private started = false;
  private cancelRequested = false;
  private completed = false;

  public get status(): WrapperState["status"] {
    return this.state.status;
  }

  public get isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Registers the callback run once the request is ready.
   * Runs immediately if the wrapper is already ready.
   */
  public onReady(callback: (wrapper: RequestWrapper) => void): this {
    this.readyCallback = callback;
    if (this.state.status === "ready") {
      callback(this);
    }
    return this;
  }

  /**
   * Registers the callback run if the request cannot be built.
   * Runs immediately if building has already failed.
   */
  public onFail(callback: (error: NetworkServiceError) => void): this {
    this.failCallback = callback;
    if (this.state.status === "failed") {
      callback(this.state.error);
    }
    return this;
  }

  /**
   * @throws {Error} If the wrapper has already left `pending`
   */
  public resolve(request: TransportRequest): void {
    this.transition({ status: "ready", request });
    this.readyCallback?.(this);
  }

  /**
   * @throws {Error} If the wrapper has already left `pending`
   */
  public reject(error: NetworkServiceError): void {
    this.transition({ status: "failed", error });
    this.failCallback?.(error);
  }

  /**
   * Sends the request.
   *
   * @throws {Error} If the request is not ready or was already started
   */
  public start(): void {
    if (this.state.status !== "ready") {
      throw new Error(`Cannot start a ${this.state.status} request`);
    }
    if (this.started) {
      throw new Error("Request has already been started");
    }
    this.started = true;
    this.state.request.start();
    if (this.cancelRequested) {
      this.state.request.cancel();
    }
  }

  /**
   * Cancels the request. Safe to call repeatedly and after completion.
   * A cancel issued before the request is started takes effect on start.
   */
  public cancel(): void {
    if (this.cancelRequested || this.completed) {
      return;
    }
    this.cancelRequested = true;
    if (this.state.status === "ready" && this.started) {
      this.state.request.cancel();
    }
  }

  /**
   * Marks the call as completed; later cancels are no-ops.
   */
  public complete(): void {
    this.completed = true;
  }

  private transition(next: Exclude<WrapperState, { status: "pending" }>): void {
    if (this.state.status !== "pending") {
      throw new Error(
        `RequestWrapper cannot become ${next.status}: already ${this.state.status}`
      );
    }
    this.state = next;
  }
}
