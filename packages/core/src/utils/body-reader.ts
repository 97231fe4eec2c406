import { makeProgress, type Progress } from "../models/call-params";

/**
 * Reads a body stream to the end, reporting progress after every chunk.
 *
 * @param totalBytes - Announced content length, if any
 */
export async function collectBody(
  chunks: AsyncIterable<Uint8Array | string>,
  totalBytes: number | undefined,
  onProgress: (progress: Progress) => void
): Promise<Uint8Array> {
  const parts: Uint8Array[] = [];
  let completed = 0;
  for await (const chunk of chunks) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    parts.push(bytes);
    completed += bytes.byteLength;
    onProgress(makeProgress(completed, totalBytes));
  }
  return Buffer.concat(parts);
}

/**
 * Parses a `content-length` header value.
 */
export function contentLength(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const length = Number.parseInt(value, 10);
  return Number.isNaN(length) ? undefined : length;
}
