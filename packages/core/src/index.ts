/**
 * @packageDocumentation
 * @module @netcall/core
 *
 * Netcall Core Package
 *
 * Executes batches of HTTP calls in parallel or in sequence and resolves each
 * response into typed results by status code and content kind, with
 * interceptors able to veto processing.
 */

// Main exports
export { default as NetworkService } from "./network-service";
export { default as RequestAdapter } from "./request-adapter";
export { default } from "./network-service";
export { ExecutionOption, ParallelBatch, SequentialBatch } from "./batch-execution";
export { CallBuilder, RequestCall } from "./request-call";
export { RequestWrapper } from "./request-wrapper";
export { CompletionBarrier } from "./completion-barrier";
export { resolveResponse } from "./response-resolver";
export { interpretExchange } from "./response-interpreter";
export { resolveConfiguration } from "./configuration";

// Types
export type { AnyRequestCall } from "./request-call";
export type { ResolutionContext } from "./response-resolver";
export type {
  NetworkServiceConfiguration,
  ResolvedConfiguration,
} from "./configuration";
export type {
  MultipartBody,
  PreparedRequest,
  RequestAdapterOptions,
  TransportExchange,
  TransportListeners,
  TransportRequest,
} from "./request-adapter";
export type {
  HttpMethod,
  MultipartDataFile,
  MultipartFile,
  MultipartPathFile,
  MultipartRequestable,
  MultipartStreamFile,
  ParameterEncoding,
  Parameters,
  Progress,
  Requestable,
} from "./models/call-params";
export { DEFAULT_STATUS_CODES, makeProgress } from "./models/call-params";
export type {
  HttpResponse,
  InterpretedResponse,
  ResponseBodyMap,
  ResponseKind,
  ResponseType,
} from "./models/response";
export { RESPONSE_KINDS, ResponseTypes, isInterpretedAs } from "./models/response";
export type {
  AnyResponseHandler,
  BatchCompletion,
  CallCompletion,
  ErrorHandler,
  ProgressHandler,
} from "./models/handlers";
export { ResponseHandler } from "./models/handlers";
export type { NetworkServiceInterceptor } from "./models/interceptor";
export type { BatchResult, CallOutcome } from "./models/outcome";
export { failure, success } from "./models/outcome";
export type {
  FailureReason,
  NetworkServiceErrorInit,
} from "./models/network-service-error";
export {
  ConfigurationError,
  NetworkServiceError,
  ResponseSerializationError,
  StatusValidationError,
  UnsupportedCallError,
} from "./models/network-service-error";

// Utilities
export { CompletionQueues } from "./utils/completion-queue";
export type { CompletionQueue } from "./utils/completion-queue";
export { createConsoleLogger, silentLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export { validateUrl, SSRFError } from "./utils/url-validator";
export type { UrlValidationOptions } from "./utils/url-validator";
export {
  applyPathParameters,
  encodeQuery,
  encodeRequest,
  joinUrl,
  parameterComponents,
} from "./utils/parameter-encoding";
export type { EncodedRequest } from "./utils/parameter-encoding";
export { collectBody, contentLength } from "./utils/body-reader";
export { isMultipartRequestable } from "./utils/call-guards";
