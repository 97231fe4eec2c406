import type { NetworkServiceInterceptor } from "./models/interceptor";
import {
  NetworkServiceError,
  type FailureReason,
} from "./models/network-service-error";
import { failure, success, type CallOutcome } from "./models/outcome";
import type { HttpResponse, InterpretedResponse } from "./models/response";
import type { AnyRequestCall } from "./request-call";
import type { Logger } from "./utils/logger";

/**
 * Collaborators consulted while resolving a response.
 */
export interface ResolutionContext {
  readonly interceptors: readonly NetworkServiceInterceptor[];
  /** Classifies errors that only flag an unexpected status code */
  isValidationError(error: Error): boolean;
  readonly logger: Logger;
}

/**
 * Reports a failure to the call's error handler and wraps it into an outcome.
 */
function fail(
  call: AnyRequestCall,
  context: ResolutionContext,
  reason: FailureReason,
  interpreted: InterpretedResponse,
  error?: Error
): CallOutcome {
  const serviceError = new NetworkServiceError({
    reason,
    request: call.request,
    response: interpreted.response,
    error,
    body: interpreted.body,
  });
  const meta = {
    reason,
    kind: interpreted.kind,
    status: interpreted.response?.status,
  };
  if (reason === "skipped") {
    context.logger.warn("An interceptor blocked the response", meta);
  } else {
    context.logger.error(serviceError.message, meta);
  }
  notifyErrorHandler(call, serviceError, context.logger);
  return failure(serviceError);
}

/**
 * Passes `error` to the call's error handler. An exception thrown by the
 * handler is logged and does not propagate.
 */
export function notifyErrorHandler(
  call: AnyRequestCall,
  error: NetworkServiceError,
  logger: Logger
): void {
  try {
    call.errorHandler?.(error);
  } catch (handlerError) {
    logger.error("Error handler threw", {
      reason: error.reason,
      error: String(handlerError),
    });
  }
}

/**
 * Resolves one interpretation of a call's response: consults interceptors,
 * then constructs and delivers the typed response to every matching handler.
 *
 * @returns Success when every matching handler received its response,
 * or when no handler matched and the transport saw no error
 */
export function resolveResponse(
  call: AnyRequestCall,
  interpreted: InterpretedResponse,
  context: ResolutionContext
): CallOutcome {
  const { response, error } = interpreted;
  if (!response) {
    return fail(call, context, "unreachable", interpreted, error);
  }

  let allowed: boolean;
  try {
    allowed = context.interceptors.every((interceptor) =>
      interceptor.intercept(call, response, interpreted.body)
    );
  } catch (interceptorError) {
    return fail(
      call,
      context,
      "skipped",
      interpreted,
      interceptorError instanceof Error
        ? interceptorError
        : new Error(String(interceptorError))
    );
  }
  if (!allowed) {
    return fail(call, context, "skipped", interpreted, error);
  }

  const matching = call.handlers.filter(
    (handler) =>
      handler.statuses.has(response.status) && handler.kind === interpreted.kind
  );

  if (matching.length === 0) {
    return error ? fail(call, context, "httpError", interpreted, error) : success;
  }

  for (const handler of matching) {
    if (error && !context.isValidationError(error)) {
      return fail(call, context, "httpError", interpreted, error);
    }

    let deliver: () => void;
    try {
      deliver = handler.prepare(response, interpreted);
    } catch (constructionError) {
      return fail(
        call,
        context,
        "deserializationFailure",
        interpreted,
        asError(constructionError, handler.typeName, response)
      );
    }
    try {
      deliver();
    } catch (handlerError) {
      context.logger.error(`Response handler for '${handler.typeName}' threw`, {
        kind: interpreted.kind,
        status: response.status,
        error: String(handlerError),
      });
    }
  }

  return success;
}

function asError(value: unknown, typeName: string, response: HttpResponse): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(
    `Failed to construct '${typeName}' from a ${response.status} response: ${String(value)}`
  );
}
