import type { NetworkServiceError } from "./network-service-error";

/**
 * Result of one interpretation, one call or a whole batch.
 */
export type CallOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: NetworkServiceError };

/**
 * The single result delivered for a submitted batch.
 */
export type BatchResult = CallOutcome;

export const success: CallOutcome = { ok: true };

export function failure(error: NetworkServiceError): CallOutcome {
  return { ok: false, error };
}
