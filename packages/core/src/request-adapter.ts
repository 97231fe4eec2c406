import type { MultipartFile, Progress } from "./models/call-params";
import { StatusValidationError } from "./models/network-service-error";
import type { HttpResponse } from "./models/response";
import type { EncodedRequest } from "./utils/parameter-encoding";
import { validateUrl, type UrlValidationOptions } from "./utils/url-validator";

/**
 * Multipart form content: flattened parameter fields and files.
 */
export interface MultipartBody {
  fields: Array<[string, string]>;
  files: readonly MultipartFile[];
  /** Encoding used to turn field values into bytes */
  fieldEncoding: BufferEncoding;
}

/**
 * Everything a transport needs to build a request.
 * `body` is absent for multipart requests, which carry `multipart` instead.
 */
export interface PreparedRequest extends EncodedRequest {
  statusCodes: ReadonlySet<number>;
  multipart?: MultipartBody;
}

/**
 * What a transport observed for a started request.
 * `response` is absent when no HTTP exchange happened.
 */
export interface TransportExchange {
  response?: HttpResponse;
  body?: Uint8Array;
  error?: Error;
}

export interface TransportListeners {
  onProgress(progress: Progress): void;
  /** Called exactly once per started request */
  onComplete(exchange: TransportExchange): void;
}

/**
 * A built transport request that has not been sent yet.
 */
export interface TransportRequest {
  start(): void;
  cancel(): void;
}

export interface RequestAdapterOptions {
  /** URL validation options to prevent SSRF attacks */
  urlValidation?: UrlValidationOptions;
}

/**
 * Base class for transports. Subclasses build requests with a concrete HTTP library.
 *
 * @example
 * ```typescript
 * class MyAdapter extends RequestAdapter {
 *   public createRequest(prepared: PreparedRequest, listeners: TransportListeners) {
 *     const controller = new AbortController();
 *     return {
 *       start: () => send(prepared, controller.signal).then(listeners.onComplete),
 *       cancel: () => controller.abort(),
 *     };
 *   }
 * }
 * ```
 */
export default abstract class RequestAdapter {
  protected urlValidationOptions: UrlValidationOptions;

  /**
   * Invoked every time the number of in-flight requests drops to zero.
   */
  public backgroundCompletionHandler?: () => void;

  private inFlight = 0;

  constructor(options: RequestAdapterOptions = {}) {
    this.urlValidationOptions = options.urlValidation ?? {};
  }

  /**
   * Builds a transport request. A rejected promise (or a thrown error) means
   * the request body could not be encoded.
   */
  public abstract createRequest(
    prepared: PreparedRequest,
    listeners: TransportListeners
  ): TransportRequest | Promise<TransportRequest>;

  /**
   * Tells whether `error` only flags an unexpected status code, with the
   * response body still available.
   */
  public isValidationError(error: Error): boolean {
    return error instanceof StatusValidationError;
  }

  /**
   * Validates the URL and builds the transport request.
   *
   * @throws {SSRFError} If the URL is not allowed
   */
  public async buildRequest(
    prepared: PreparedRequest,
    listeners: TransportListeners
  ): Promise<TransportRequest> {
    validateUrl(prepared.url, this.urlValidationOptions);

    let started = false;
    const request = await this.createRequest(prepared, {
      onProgress: listeners.onProgress,
      onComplete: (exchange) => {
        if (started) {
          this.leave();
        }
        listeners.onComplete(exchange);
      },
    });
    return {
      start: () => {
        started = true;
        this.inFlight++;
        request.start();
      },
      cancel: () => request.cancel(),
    };
  }

  /**
   * Flags a status code outside the accepted ones.
   */
  protected validateStatus(
    status: number,
    statusCodes: ReadonlySet<number>
  ): StatusValidationError | undefined {
    return statusCodes.has(status) ? undefined : new StatusValidationError(status);
  }

  private leave(): void {
    this.inFlight--;
    if (this.inFlight === 0) {
      this.backgroundCompletionHandler?.();
    }
  }
}
