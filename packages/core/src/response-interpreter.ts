import { ResponseSerializationError } from "./models/network-service-error";
import type {
  HttpResponse,
  InterpretedResponse,
  ResponseKind,
} from "./models/response";
import type { TransportExchange } from "./request-adapter";

const EMPTY_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205]);

type ParseResult<T> = { value: T } | { error: Error };

function parseJson(response: HttpResponse, body: Uint8Array): ParseResult<unknown> {
  if (EMPTY_BODY_STATUSES.has(response.status)) {
    return { value: null };
  }
  if (body.byteLength === 0) {
    return {
      error: new ResponseSerializationError(
        "JSON could not be serialized: response body is empty"
      ),
    };
  }
  try {
    return { value: JSON.parse(Buffer.from(body).toString("utf8")) };
  } catch (cause) {
    return {
      error: new ResponseSerializationError(
        "JSON could not be serialized: body is not valid JSON",
        { cause }
      ),
    };
  }
}

function charsetOf(response: HttpResponse): string {
  const match = /charset=("?)([^";]+)\1/i.exec(
    response.headers["content-type"] ?? ""
  );
  return match ? match[2].trim() : "utf-8";
}

function decodeString(response: HttpResponse, body: Uint8Array): ParseResult<string> {
  if (EMPTY_BODY_STATUSES.has(response.status)) {
    return { value: "" };
  }
  const charset = charsetOf(response);
  try {
    return { value: new TextDecoder(charset).decode(body) };
  } catch (cause) {
    return {
      error: new ResponseSerializationError(
        `String could not be serialized with charset '${charset}'`,
        { cause }
      ),
    };
  }
}

function interpretWith<K extends "json" | "string", T>(
  kind: K,
  exchange: TransportExchange,
  parse: (response: HttpResponse, body: Uint8Array) => ParseResult<T>
): { kind: K; response?: HttpResponse; error?: Error; body?: T } {
  const { response, body, error } = exchange;
  if (!response) {
    return { kind, error };
  }
  const parsed = parse(response, body ?? new Uint8Array(0));
  if ("value" in parsed) {
    return { kind, response, error, body: parsed.value };
  }
  return { kind, response, error: error ?? parsed.error };
}

/**
 * Interprets a transport exchange as a response of the given kind.
 * A transport error takes precedence over serialization errors, while the
 * body is still parsed when possible.
 */
export function interpretExchange(
  kind: ResponseKind,
  exchange: TransportExchange
): InterpretedResponse {
  switch (kind) {
    case "data":
      return {
        kind,
        response: exchange.response,
        error: exchange.error,
        body: exchange.response ? exchange.body ?? new Uint8Array(0) : undefined,
      };
    case "json":
      return interpretWith(kind, exchange, parseJson);
    case "string":
      return interpretWith(kind, exchange, decodeString);
    case "empty":
      return { kind, response: exchange.response, error: exchange.error };
  }
}
