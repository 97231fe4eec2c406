import type {
  HttpMethod,
  ParameterEncoding,
  Parameters,
} from "../models/call-params";

/**
 * A request with its parameters applied, ready to hand to a transport.
 */
export interface EncodedRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
}

const QUERY_METHODS: ReadonlySet<HttpMethod> = new Set(["GET", "HEAD", "DELETE"]);

/**
 * Flattens a parameter into `[name, value]` pairs using bracket notation:
 * arrays become `name[]`, objects `name[key]`.
 *
 * @param booleans - `numeric` writes `1`/`0`, `literal` writes `true`/`false`
 */
export function parameterComponents(
  value: unknown,
  name: string,
  booleans: "numeric" | "literal" = "literal"
): Array<[string, string]> {
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item) =>
      parameterComponents(item, `${name}[]`, booleans)
    );
  }
  if (value !== null && typeof value === "object") {
    return Object.entries(value).flatMap(([key, nested]) =>
      parameterComponents(nested, `${name}[${key}]`, booleans)
    );
  }
  if (value === null) {
    return [[name, ""]];
  }
  if (typeof value === "boolean" && booleans === "numeric") {
    return [[name, value ? "1" : "0"]];
  }
  return [[name, String(value)]];
}

/**
 * Percent-encodes parameters as `application/x-www-form-urlencoded`, keys sorted.
 */
export function encodeQuery(parameters: Parameters): string {
  return Object.keys(parameters)
    .sort()
    .flatMap((key) => parameterComponents(parameters[key], key, "numeric"))
    .map(
      ([name, value]) =>
        `${encodeURIComponent(name)}=${encodeURIComponent(value)}`
    )
    .join("&");
}

/**
 * Replaces `$name` placeholders in a path with URI-encoded parameter values.
 */
export function applyPathParameters(path: string, parameters: Parameters): string {
  return Object.entries(parameters).reduce(
    (result, [key, value]) =>
      result.split(`$${key}`).join(encodeURIComponent(String(value))),
    path
  );
}

/**
 * Joins a host and a path with exactly one slash between them.
 */
export function joinUrl(host: string, path: string): string {
  const trimmedHost = host.replace(/\/+$/, "");
  const trimmedPath = path.replace(/^\/+/, "");
  return trimmedPath ? `${trimmedHost}/${trimmedPath}` : trimmedHost;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/**
 * Applies parameters to a request according to its encoding.
 *
 * @param url - Host and path, before path parameters are substituted
 * @throws {TypeError} If a JSON body cannot be serialised
 */
export function encodeRequest(
  url: string,
  method: HttpMethod,
  headers: Record<string, string>,
  encoding: ParameterEncoding,
  parameters?: Parameters
): EncodedRequest {
  const encoded: EncodedRequest = { url, method, headers: { ...headers } };
  if (!parameters) {
    return encoded;
  }

  switch (encoding) {
    case "path":
      encoded.url = applyPathParameters(url, parameters);
      break;
    case "json":
      encoded.body = JSON.stringify(parameters);
      if (!hasHeader(encoded.headers, "Content-Type")) {
        encoded.headers["Content-Type"] = "application/json";
      }
      break;
    case "url":
    case "formData": {
      const query = encodeQuery(parameters);
      if (!query) {
        break;
      }
      if (QUERY_METHODS.has(method)) {
        encoded.url = `${url}${url.includes("?") ? "&" : "?"}${query}`;
      } else {
        encoded.body = query;
        if (!hasHeader(encoded.headers, "Content-Type")) {
          encoded.headers["Content-Type"] =
            "application/x-www-form-urlencoded; charset=utf-8";
        }
      }
      break;
    }
  }
  return encoded;
}
