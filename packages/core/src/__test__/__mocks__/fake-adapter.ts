import RequestAdapter from "../../request-adapter";
import type {
  PreparedRequest,
  RequestAdapterOptions,
  TransportExchange,
  TransportListeners,
  TransportRequest,
} from "../../request-adapter";
import type { Progress } from "../../models/call-params";
import { StatusValidationError } from "../../models/network-service-error";

/**
 * Scripted behaviour of one fake request.
 *
 * - `exchange` - delivered on the next turn after `start()`
 * - `hold` - never completes on its own; completes with a cancellation error when cancelled
 * - `buildError` - `createRequest` rejects with it
 */
export type FakeReply =
  | { exchange: TransportExchange; progress?: Progress[] }
  | { hold: true }
  | { buildError: Error };

export type FakeResponder = (prepared: PreparedRequest) => FakeReply;

export class CancelledError extends Error {
  constructor() {
    super("Request was cancelled");
    this.name = "CancelledError";
  }
}

/**
 * Transport double answering requests from a responder function and
 * recording what the service asked it to do.
 */
export default class FakeAdapter extends RequestAdapter {
  public readonly prepared: PreparedRequest[] = [];
  public readonly started: string[] = [];
  public readonly cancelled: string[] = [];

  constructor(
    private readonly respond: FakeResponder,
    options?: RequestAdapterOptions
  ) {
    super(options);
  }

  public async createRequest(
    prepared: PreparedRequest,
    listeners: TransportListeners
  ): Promise<TransportRequest> {
    this.prepared.push(prepared);
    const reply = this.respond(prepared);
    if ("buildError" in reply) {
      throw reply.buildError;
    }

    let done = false;
    const complete = (exchange: TransportExchange) => {
      if (!done) {
        done = true;
        listeners.onComplete(exchange);
      }
    };

    return {
      start: () => {
        this.started.push(prepared.url);
        if ("hold" in reply) {
          return;
        }
        setImmediate(() => {
          reply.progress?.forEach((progress) => listeners.onProgress(progress));
          complete(reply.exchange);
        });
      },
      cancel: () => {
        this.cancelled.push(prepared.url);
        setImmediate(() => complete({ error: new CancelledError() }));
      },
    };
  }
}

/**
 * Builds a completed exchange for `prepared` with a UTF-8 body.
 */
export function respondWith(
  prepared: PreparedRequest,
  status: number,
  body = "",
  headers: Record<string, string> = {}
): FakeReply {
  return {
    exchange: {
      response: { status, headers, url: prepared.url },
      body: Buffer.from(body),
      error: prepared.statusCodes.has(status)
        ? undefined
        : new StatusValidationError(status),
    },
  };
}
