import { RequestAdapter, collectBody, contentLength } from "@netcall/core";
import type {
  HttpResponse,
  MultipartBody,
  PreparedRequest,
  RequestAdapterOptions,
  TransportListeners,
  TransportRequest,
} from "@netcall/core";
import { openAsBlob } from "node:fs";
import { buffer } from "node:stream/consumers";

export interface FetchRequestAdapterOptions extends RequestAdapterOptions {
  /** Fetch implementation. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
}

async function* readChunks(stream: {
  getReader(): ChunkReader;
}): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      if (value) {
        yield value;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Request adapter implementation using the native Fetch API.
 *
 * @example
 * ```typescript
 * const service = new NetworkService(new FetchRequestAdapter(), {
 *   host: "https://api.example.com",
 * });
 * ```
 */
export default class FetchRequestAdapter extends RequestAdapter {
  private readonly fetch: typeof fetch;

  constructor(options: FetchRequestAdapterOptions = {}) {
    super(options);
    this.fetch = options.fetch ?? globalThis.fetch;
  }

  public async createRequest(
    prepared: PreparedRequest,
    listeners: TransportListeners
  ): Promise<TransportRequest> {
    const controller = new AbortController();
    const init: RequestInit = {
      method: prepared.method,
      headers: prepared.headers,
      body: prepared.multipart
        ? await encodeMultipart(prepared.multipart)
        : prepared.body,
      signal: controller.signal,
    };

    return {
      start: () => {
        void this.send(prepared, init, listeners);
      },
      cancel: () => controller.abort(),
    };
  }

  private async send(
    prepared: PreparedRequest,
    init: RequestInit,
    listeners: TransportListeners
  ): Promise<void> {
    let response: Response;
    try {
      response = await this.fetch(prepared.url, init);
    } catch (error) {
      listeners.onComplete({ error: asError(error) });
      return;
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });
    const httpResponse: HttpResponse = {
      status: response.status,
      headers,
      url: response.url || prepared.url,
    };

    let body: Uint8Array;
    try {
      body = response.body
        ? await collectBody(
            readChunks(response.body),
            contentLength(headers["content-length"]),
            listeners.onProgress
          )
        : new Uint8Array(0);
    } catch (error) {
      listeners.onComplete({ response: httpResponse, error: asError(error) });
      return;
    }

    listeners.onComplete({
      response: httpResponse,
      body,
      error: this.validateStatus(response.status, prepared.statusCodes),
    });
  }
}

/**
 * Builds a `FormData` body. Field values are sent as UTF-8 text, the way
 * `FormData` encodes strings.
 */
async function encodeMultipart(body: MultipartBody): Promise<FormData> {
  const form = new FormData();
  for (const [name, value] of body.fields) {
    form.append(name, value);
  }
  for (const file of body.files) {
    switch (file.type) {
      case "data":
        form.append(
          file.name,
          new Blob([file.data], { type: file.mimeType }),
          file.fileName
        );
        break;
      case "path":
        form.append(
          file.name,
          await openAsBlob(file.path, { type: file.mimeType }),
          file.fileName
        );
        break;
      case "stream":
        form.append(
          file.name,
          new Blob([await buffer(file.stream)], { type: file.mimeType }),
          file.fileName
        );
        break;
    }
  }
  return form;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
