import type { AnyRequestCall } from "../request-call";
import type { HttpResponse } from "./response";

/**
 * Consulted before any handler of a call runs. Returning `false` blocks
 * handler delivery for that response; the call then fails as `skipped`.
 */
export interface NetworkServiceInterceptor {
  intercept(call: AnyRequestCall, response: HttpResponse, body: unknown): boolean;
}
