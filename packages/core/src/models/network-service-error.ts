import type { Requestable } from "./call-params";
import type { HttpResponse } from "./response";

/**
 * Why a call (or one interpretation of its response) failed.
 *
 * - `unreachable` - no HTTP exchange happened
 * - `skipped` - an interceptor blocked response processing
 * - `httpError` - a transport error that no handler absorbed
 * - `deserializationFailure` - a matching handler could not construct its response
 * - `encodingFailure` - the request body could not be built
 */
export type FailureReason =
  | "unreachable"
  | "skipped"
  | "httpError"
  | "deserializationFailure"
  | "encodingFailure";

export interface NetworkServiceErrorInit {
  reason: FailureReason;
  request: Requestable;
  response?: HttpResponse;
  /** The underlying transport or construction error */
  error?: Error;
  body?: unknown;
}

/**
 * Failure of a call, reported to the call's error handler and returned
 * as part of the call and batch outcomes.
 */
export class NetworkServiceError extends Error {
  public readonly reason: FailureReason;
  public readonly request: Requestable;
  public readonly response?: HttpResponse;
  public readonly body?: unknown;

  constructor({ reason, request, response, error, body }: NetworkServiceErrorInit) {
    super(describeFailure(reason, request, response, error), { cause: error });
    this.name = "NetworkServiceError";
    this.reason = reason;
    this.request = request;
    this.response = response;
    this.body = body;
  }
}

function describeFailure(
  reason: FailureReason,
  request: Requestable,
  response?: HttpResponse,
  error?: Error
): string {
  const status = response ? ` (status ${response.status})` : "";
  const cause = error ? `: ${error.message}` : "";
  return `${request.method} ${request.path} failed with ${reason}${status}${cause}`;
}

/**
 * Misuse of the service detected before any call is executed.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A call object that was not produced by a call builder was submitted.
 */
export class UnsupportedCallError extends ConfigurationError {
  constructor(description: string) {
    super(
      `NetworkService does not support '${description}'. Create calls with NetworkService.builder().`
    );
    this.name = "UnsupportedCallError";
  }
}

/**
 * Raised by transports for a status code outside the request's accepted codes.
 * The response and its body are still available.
 */
export class StatusValidationError extends Error {
  public readonly status: number;

  constructor(status: number) {
    super(`Response status code was unacceptable: ${status}`);
    this.name = "StatusValidationError";
    this.status = status;
  }
}

/**
 * A response body could not be interpreted as the requested kind.
 */
export class ResponseSerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResponseSerializationError";
  }
}
