import {
  ExecutionOption,
  ParallelBatch,
  SequentialBatch,
} from "./batch-execution";
import { CompletionBarrier } from "./completion-barrier";
import {
  resolveConfiguration,
  type NetworkServiceConfiguration,
  type ResolvedConfiguration,
} from "./configuration";
import { DEFAULT_STATUS_CODES, type Requestable } from "./models/call-params";
import type { BatchCompletion, CallCompletion } from "./models/handlers";
import type { NetworkServiceInterceptor } from "./models/interceptor";
import {
  ConfigurationError,
  NetworkServiceError,
  UnsupportedCallError,
} from "./models/network-service-error";
import { success, type BatchResult } from "./models/outcome";
import { RESPONSE_KINDS } from "./models/response";
import type RequestAdapter from "./request-adapter";
import type {
  PreparedRequest,
  TransportExchange,
  TransportListeners,
  TransportRequest,
} from "./request-adapter";
import { CallBuilder, RequestCall, type AnyRequestCall } from "./request-call";
import { RequestWrapper } from "./request-wrapper";
import { interpretExchange } from "./response-interpreter";
import {
  notifyErrorHandler,
  resolveResponse,
  type ResolutionContext,
} from "./response-resolver";
import { isMultipartRequestable } from "./utils/call-guards";
import type { CompletionQueue } from "./utils/completion-queue";
import {
  encodeRequest,
  joinUrl,
  parameterComponents,
} from "./utils/parameter-encoding";
import { SSRFError } from "./utils/url-validator";

/**
 * A call that passed validation, with its target URL resolved.
 */
interface ScheduledCall {
  readonly call: RequestCall;
  readonly url: string;
}

/**
 * Executes batches of calls through a {@link RequestAdapter} and resolves
 * every response against the handlers registered on its call.
 *
 * @example
 * ```typescript
 * const service = new NetworkService(new AxiosRequestAdapter(), {
 *   host: "https://api.example.com",
 * });
 * const call = service
 *   .builder({ method: "GET", path: "/users", encoding: "url", statusCodes: [200] })
 *   .response(ResponseTypes.schema("Users", usersSchema), 200, setUsers)
 *   .make();
 *
 * const result = await service.execute([call], ExecutionOption.parallel());
 * ```
 */
export default class NetworkService {
  /**
   * Consulted, in order, before any handler runs. Every interceptor must allow a response.
   */
  public interceptors: NetworkServiceInterceptor[] = [];

  private readonly configuration: ResolvedConfiguration;

  constructor(
    private readonly adapter: RequestAdapter,
    configuration?: NetworkServiceConfiguration
  ) {
    this.configuration = resolveConfiguration(configuration);
  }

  /**
   * Called by the transport when all of its in-flight requests have finished.
   */
  public get backgroundSessionCompletionHandler(): (() => void) | undefined {
    return this.adapter.backgroundCompletionHandler;
  }

  public set backgroundSessionCompletionHandler(handler: (() => void) | undefined) {
    this.adapter.backgroundCompletionHandler = handler;
  }

  /**
   * Starts building a call for `request`.
   */
  public builder(request: Requestable): CallBuilder {
    return new CallBuilder(request, this.configuration.queue);
  }

  /**
   * Executes `calls` according to `option`. The batch result is passed to
   * `completion` on `queue` and resolves the returned promise; for an empty
   * batch both happen synchronously.
   *
   * @throws {UnsupportedCallError} If a call was not made by a {@link CallBuilder}
   * @throws {ConfigurationError} If a call's URL cannot be formed
   */
  public execute(
    calls: readonly AnyRequestCall[],
    option: ExecutionOption,
    queue: CompletionQueue = this.configuration.queue,
    completion?: BatchCompletion
  ): Promise<BatchResult> {
    const scheduled = calls.map((call) => this.schedule(call));

    return new Promise<BatchResult>((resolve) => {
      const deliver: BatchCompletion = (result) => {
        try {
          completion?.(result);
        } catch (completionError) {
          this.configuration.logger.error("Batch completion handler threw", {
            error: String(completionError),
          });
        }
        resolve(result);
      };

      if (scheduled.length === 0) {
        deliver(success);
        return;
      }

      this.configuration.logger.debug("Executing calls", {
        count: scheduled.length,
        mode: option.mode,
        ignoreFailures: option.ignoreFailures,
      });

      const run = {
        calls: scheduled,
        ignoreFailures: option.ignoreFailures,
        queue,
        process: (call: ScheduledCall, callCompletion: CallCompletion) =>
          this.process(call, callCompletion),
        deliver,
      };
      if (option.mode === "parallel") {
        new ParallelBatch(run).start();
      } else {
        new SequentialBatch(run).start();
      }
    });
  }

  /**
   * Verifies that `call` is supported and resolves its URL.
   */
  private schedule(call: AnyRequestCall): ScheduledCall {
    if (!(call instanceof RequestCall)) {
      const description = call.constructor.name || typeof call;
      this.configuration.logger.error("Unsupported call submitted", {
        type: description,
      });
      throw new UnsupportedCallError(description);
    }

    const host = call.request.host ?? this.configuration.host;
    if (!host) {
      throw new ConfigurationError(
        `Neither a default host nor a host for ${call.request.method} ${call.request.path} was specified.`
      );
    }
    return { call, url: joinUrl(host, call.request.path) };
  }

  /**
   * Builds the transport request of a call. The returned wrapper becomes
   * ready or failed asynchronously; `completion` receives the call's outcome
   * once all interpretations of its response were resolved.
   */
  private process(
    scheduled: ScheduledCall,
    completion: CallCompletion
  ): RequestWrapper {
    const { call } = scheduled;
    const wrapper = new RequestWrapper();
    const barrier = new CompletionBarrier(call.queue, (outcome) => {
      wrapper.complete();
      completion(outcome);
    });

    const listeners: TransportListeners = {
      onProgress: (progress) => {
        if (call.progress.length > 0) {
          call.queue.dispatch(() => {
            for (const handler of call.progress) {
              try {
                handler(progress);
              } catch (progressError) {
                this.configuration.logger.error("Progress handler threw", {
                  error: String(progressError),
                });
              }
            }
          });
        }
      },
      onComplete: (exchange) => this.interpret(call, exchange, barrier),
    };

    void this.build(scheduled, listeners).then(
      (request) => wrapper.resolve(request),
      (error: unknown) => wrapper.reject(this.buildFailure(call, error))
    );
    return wrapper;
  }

  private async build(
    { call, url }: ScheduledCall,
    listeners: TransportListeners
  ): Promise<TransportRequest> {
    const { request } = call;
    const headers = { ...this.configuration.headers, ...request.headers };
    const statusCodes = new Set(request.statusCodes ?? DEFAULT_STATUS_CODES);

    let prepared: PreparedRequest;
    if (isMultipartRequestable(request)) {
      const parameters = request.parameters ?? {};
      prepared = {
        url,
        method: request.method,
        headers,
        statusCodes,
        multipart: {
          fields: Object.keys(parameters).flatMap((key) =>
            parameterComponents(parameters[key], key)
          ),
          files: request.files ?? [],
          fieldEncoding: request.parametersEncoding ?? "utf8",
        },
      };
    } else {
      prepared = {
        ...encodeRequest(
          url,
          request.method,
          headers,
          request.encoding,
          request.parameters
        ),
        statusCodes,
      };
    }

    return this.adapter.buildRequest(prepared, listeners);
  }

  /**
   * Fans an exchange out into one interpretation per response kind, each
   * resolved independently on the call's queue.
   */
  private interpret(
    call: RequestCall,
    exchange: TransportExchange,
    barrier: CompletionBarrier
  ): void {
    for (const kind of RESPONSE_KINDS) {
      call.queue.dispatch(() => {
        const interpreted = interpretExchange(kind, exchange);
        barrier.arrive(resolveResponse(call, interpreted, this.resolutionContext()));
      });
    }
  }

  private resolutionContext(): ResolutionContext {
    return {
      interceptors: this.interceptors,
      isValidationError: (error) => this.adapter.isValidationError(error),
      logger: this.configuration.logger,
    };
  }

  /**
   * Reports a request that could not be built.
   */
  private buildFailure(call: RequestCall, cause: unknown): NetworkServiceError {
    const error = new NetworkServiceError({
      reason: cause instanceof SSRFError ? "unreachable" : "encodingFailure",
      request: call.request,
      error: cause instanceof Error ? cause : new Error(String(cause)),
    });
    this.configuration.logger.error(error.message, { reason: error.reason });
    notifyErrorHandler(call, error, this.configuration.logger);
    return error;
  }
}
