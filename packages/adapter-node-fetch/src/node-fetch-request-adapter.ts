import { RequestAdapter, collectBody, contentLength } from "@netcall/core";
import type {
  HttpResponse,
  MultipartBody,
  PreparedRequest,
  RequestAdapterOptions,
  TransportListeners,
  TransportRequest,
} from "@netcall/core";
import nodeFetch, { Blob, FormData, fileFrom } from "node-fetch";
import type { RequestInit, Response } from "node-fetch";
import { buffer } from "node:stream/consumers";

export interface NodeFetchRequestAdapterOptions extends RequestAdapterOptions {
  /** Fetch implementation. Defaults to node-fetch. */
  fetch?: typeof nodeFetch;
}

/**
 * Request adapter implementation using node-fetch.
 *
 * @example
 * ```typescript
 * const service = new NetworkService(new NodeFetchRequestAdapter(), {
 *   host: "https://api.example.com",
 * });
 * ```
 */
export default class NodeFetchRequestAdapter extends RequestAdapter {
  private readonly fetch: typeof nodeFetch;

  constructor(options: NodeFetchRequestAdapterOptions = {}) {
    super(options);
    this.fetch = options.fetch ?? nodeFetch;
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
            response.body,
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
 * Builds a node-fetch `FormData` body. Field values are sent as UTF-8 text.
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
          await fileFrom(file.path, file.mimeType),
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
