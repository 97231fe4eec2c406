import type { ZodType, ZodTypeDef } from "zod";

/**
 * The four views in which every response is interpreted.
 */
export type ResponseKind = "data" | "json" | "string" | "empty";

/**
 * All response kinds in the order they are interpreted.
 * Every call is resolved once per entry, whatever kinds its handlers target.
 */
export const RESPONSE_KINDS: readonly ResponseKind[] = [
  "data",
  "json",
  "string",
  "empty",
];

/**
 * Body type carried by each response kind.
 */
export interface ResponseBodyMap {
  data: Uint8Array;
  json: unknown;
  string: string;
  empty: undefined;
}

/**
 * Status line and headers of a received response.
 */
export interface HttpResponse {
  readonly status: number;
  /** Header names are lower-cased */
  readonly headers: Readonly<Record<string, string>>;
  readonly url: string;
}

/**
 * One view of a single HTTP exchange.
 *
 * @template K - The kind of body carried
 */
export interface InterpretedResponse<K extends ResponseKind = ResponseKind> {
  readonly kind: K;
  /** Absent when no HTTP exchange happened */
  readonly response?: HttpResponse;
  /** Transport, validation or serialization error */
  readonly error?: Error;
  readonly body?: ResponseBodyMap[K];
}

/**
 * Narrows an interpreted response to a specific kind.
 */
export function isInterpretedAs<K extends ResponseKind>(
  interpreted: InterpretedResponse,
  kind: K
): interpreted is InterpretedResponse<K> {
  return interpreted.kind === kind;
}

/**
 * Describes how a typed response is constructed from a response of a given kind.
 * `construct` throws when the body cannot be turned into `R`.
 *
 * @template K - The kind of body consumed
 * @template R - The constructed response type
 */
export interface ResponseType<K extends ResponseKind, R> {
  readonly kind: K;
  /** Used in log messages */
  readonly name: string;
  construct(response: HttpResponse, body: ResponseBodyMap[K] | undefined): R;
}

/**
 * Factories for common response types.
 *
 * @example
 * ```typescript
 * const users = ResponseTypes.schema("Users", z.array(userSchema));
 * const text = ResponseTypes.string("Text", (_, body) => body);
 * ```
 */
export const ResponseTypes = {
  data<R>(
    name: string,
    construct: (response: HttpResponse, body: Uint8Array | undefined) => R
  ): ResponseType<"data", R> {
    return { kind: "data", name, construct };
  },

  json<R>(
    name: string,
    construct: (response: HttpResponse, body: unknown) => R
  ): ResponseType<"json", R> {
    return { kind: "json", name, construct };
  },

  string<R>(
    name: string,
    construct: (response: HttpResponse, body: string | undefined) => R
  ): ResponseType<"string", R> {
    return { kind: "string", name, construct };
  },

  empty<R>(
    name: string,
    construct: (response: HttpResponse) => R
  ): ResponseType<"empty", R> {
    return { kind: "empty", name, construct: (response) => construct(response) };
  },

  /**
   * JSON response validated with a zod schema. Schema violations are construction failures.
   */
  schema<R>(
    name: string,
    schema: ZodType<R, ZodTypeDef, unknown>
  ): ResponseType<"json", R> {
    return {
      kind: "json",
      name,
      construct: (_response, body) => schema.parse(body),
    };
  },
};
