import type { Readable } from "node:stream";

/**
 * Supported HTTP methods for calls
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

/**
 * How `parameters` of a request are put on the wire.
 *
 * - `json` - JSON request body
 * - `url` - query string for GET, HEAD and DELETE, form-urlencoded body otherwise
 * - `formData` - same as `url`
 * - `path` - substitutes `$name` placeholders in the request path
 */
export type ParameterEncoding = "json" | "url" | "formData" | "path";

/**
 * Parameters attached to a request. Values may be nested arrays and objects,
 * which are flattened using bracket notation for `url` and multipart encodings.
 */
export type Parameters = Record<string, unknown>;

/**
 * Abstract description of a single HTTP request.
 *
 * @example
 * ```typescript
 * const getUser: Requestable = {
 *   method: "GET",
 *   path: "/users/$id",
 *   parameters: { id: 42 },
 *   encoding: "path",
 *   statusCodes: [200, 404],
 * };
 * ```
 */
export interface Requestable {
  /** The HTTP method to use */
  readonly method: HttpMethod;
  /** Overrides the host configured on the service */
  readonly host?: string;
  /** Path appended to the host */
  readonly path: string;
  /** Headers merged over the service's default headers */
  readonly headers?: Readonly<Record<string, string>>;
  readonly parameters?: Parameters;
  readonly encoding: ParameterEncoding;
  /**
   * Status codes considered valid. A response with any other status is still
   * delivered, but is flagged by the transport with a validation error.
   * Defaults to {@link DEFAULT_STATUS_CODES}.
   */
  readonly statusCodes?: Iterable<number>;
}

interface MultipartFileBase {
  /** Form field name */
  readonly name: string;
  readonly fileName: string;
  readonly mimeType: string;
}

/** File content held in memory */
export interface MultipartDataFile extends MultipartFileBase {
  readonly type: "data";
  readonly data: Uint8Array;
}

/** File read from disk when the request body is built */
export interface MultipartPathFile extends MultipartFileBase {
  readonly type: "path";
  readonly path: string;
}

/** File streamed into the request body */
export interface MultipartStreamFile extends MultipartFileBase {
  readonly type: "stream";
  readonly stream: Readable;
  /** Number of bytes the stream yields */
  readonly length: number;
}

export type MultipartFile =
  | MultipartDataFile
  | MultipartPathFile
  | MultipartStreamFile;

/**
 * Request whose parameters and files are sent as `multipart/form-data`.
 * Building such a request may fail asynchronously, before any network activity.
 */
export interface MultipartRequestable extends Requestable {
  readonly multipart: true;
  readonly files?: readonly MultipartFile[];
  /** Encoding used to turn parameter values into bytes. Defaults to `utf8`. */
  readonly parametersEncoding?: BufferEncoding;
}

/**
 * Status codes accepted when a request names none: 200-299.
 */
export const DEFAULT_STATUS_CODES: readonly number[] = Array.from(
  { length: 100 },
  (_, index) => 200 + index
);

/**
 * Progress of a response download.
 */
export interface Progress {
  readonly completedBytes: number;
  /** Absent when the server did not announce a content length */
  readonly totalBytes?: number;
  /** Between 0 and 1, absent together with `totalBytes` */
  readonly fractionCompleted?: number;
}

/**
 * Creates a progress value from byte counts.
 */
export function makeProgress(
  completedBytes: number,
  totalBytes?: number
): Progress {
  if (totalBytes === undefined || totalBytes <= 0) {
    return { completedBytes };
  }
  return {
    completedBytes,
    totalBytes,
    fractionCompleted: Math.min(1, completedBytes / totalBytes),
  };
}
