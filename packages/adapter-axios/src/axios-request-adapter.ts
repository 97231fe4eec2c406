import { RequestAdapter, makeProgress } from "@netcall/core";
import type {
  HttpResponse,
  MultipartBody,
  PreparedRequest,
  RequestAdapterOptions,
  TransportExchange,
  TransportListeners,
  TransportRequest,
} from "@netcall/core";
import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import FormData from "form-data";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";

export interface AxiosRequestAdapterOptions extends RequestAdapterOptions {
  /** Axios instance used to send requests. Defaults to `axios.create()`. */
  instance?: AxiosInstance;
}

/**
 * Request adapter implementation using Axios as the underlying HTTP client.
 * Status codes outside a request's accepted codes are rejected by Axios
 * itself (`validateStatus`); such rejections still carry the response.
 *
 * @example
 * ```typescript
 * const service = new NetworkService(new AxiosRequestAdapter(), {
 *   host: "https://api.example.com",
 * });
 * ```
 */
export default class AxiosRequestAdapter extends RequestAdapter {
  private readonly instance: AxiosInstance;

  constructor(options: AxiosRequestAdapterOptions = {}) {
    super(options);
    this.instance = options.instance ?? axios.create();
  }

  /**
   * Builds an Axios request configuration. Multipart bodies are encoded with
   * `form-data`; files on disk must exist at this point.
   */
  public async createRequest(
    prepared: PreparedRequest,
    listeners: TransportListeners
  ): Promise<TransportRequest> {
    const controller = new AbortController();
    const config: AxiosRequestConfig = {
      url: prepared.url,
      method: prepared.method,
      headers: prepared.headers,
      data: prepared.body,
      responseType: "arraybuffer",
      signal: controller.signal,
      validateStatus: (status) => prepared.statusCodes.has(status),
      onDownloadProgress: (event) =>
        listeners.onProgress(makeProgress(event.loaded, event.total)),
    };

    if (prepared.multipart) {
      const form = await encodeMultipart(prepared.multipart);
      config.data = form;
      config.headers = { ...prepared.headers, ...form.getHeaders() };
    }

    return {
      start: () => {
        void this.instance.request(config).then(
          (response) =>
            listeners.onComplete({
              response: toHttpResponse(response, prepared.url),
              body: toBytes(response.data),
            }),
          (error: unknown) =>
            listeners.onComplete(exchangeFromError(error, prepared.url))
        );
      },
      cancel: () => controller.abort(),
    };
  }

  /**
   * Axios rejects unaccepted status codes with an `AxiosError` that keeps the response.
   */
  public isValidationError(error: Error): boolean {
    if (super.isValidationError(error)) {
      return true;
    }
    return (
      axios.isAxiosError(error) &&
      error.response !== undefined &&
      (error.code === undefined ||
        error.code === AxiosError.ERR_BAD_REQUEST ||
        error.code === AxiosError.ERR_BAD_RESPONSE)
    );
  }
}

async function encodeMultipart(body: MultipartBody): Promise<FormData> {
  const form = new FormData();
  const utf8 = ["utf8", "utf-8"].includes(body.fieldEncoding.toLowerCase());
  for (const [name, value] of body.fields) {
    if (utf8) {
      form.append(name, value);
    } else {
      form.append(name, Buffer.from(value, body.fieldEncoding), {
        contentType: `text/plain; charset=${body.fieldEncoding}`,
      });
    }
  }
  for (const file of body.files) {
    const options = { filename: file.fileName, contentType: file.mimeType };
    switch (file.type) {
      case "data":
        form.append(file.name, Buffer.from(file.data), options);
        break;
      case "path": {
        const { size } = await stat(file.path);
        form.append(file.name, createReadStream(file.path), {
          ...options,
          knownLength: size,
        });
        break;
      }
      case "stream":
        form.append(file.name, file.stream, {
          ...options,
          knownLength: file.length,
        });
        break;
    }
  }
  return form;
}

function toHttpResponse(response: AxiosResponse, url: string): HttpResponse {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(response.headers)) {
    if (value === null || value === undefined) {
      continue;
    }
    headers[name.toLowerCase()] = Array.isArray(value)
      ? value.join(", ")
      : String(value);
  }
  return { status: response.status, headers, url };
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (typeof data === "string") {
    return Buffer.from(data);
  }
  if (data === null || data === undefined) {
    return new Uint8Array(0);
  }
  return Buffer.from(JSON.stringify(data));
}

function exchangeFromError(error: unknown, url: string): TransportExchange {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return {
        response: toHttpResponse(error.response, url),
        body: toBytes(error.response.data),
        error,
      };
    }
    return { error };
  }
  return { error: error instanceof Error ? error : new Error(String(error)) };
}
