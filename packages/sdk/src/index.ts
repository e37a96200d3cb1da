/**
 * Docuflow SDK for JavaScript/TypeScript
 *
 * @packageDocumentation
 */

// Main client
export { Docuflow } from "./client.js";
export type { ListOptions } from "./client.js";

// Resource base class
export { APIResource } from "./services/base.js";

// Transport, envelope, pagination
export { HTTPTransport } from "./lib/transport.js";
export type { TransportOptions } from "./lib/transport.js";
export { RawResponse, zodDecoder, passthroughDecoder } from "./lib/response.js";
export type { Decoder } from "./lib/response.js";
export { Page, decodePage } from "./lib/pagination.js";
export {
  paginationSchema,
  paginatedResponseSchema,
  operationStateSchema,
  operationStatusSchema,
} from "./lib/schemas.js";

// Types
export type {
  ClientConfig,
  HttpMethod,
  QueryValue,
  FilePart,
  RequestBody,
  RequestDescriptor,
  RequestOptions,
  RetryContext,
  RetryPolicy,
  OperationState,
  OperationStatus,
  PollOptions,
  PaginationInfo,
  PaginatedResponse,
  PageFetcher,
} from "./types/index.js";

// Errors
export {
  SDKError,
  ConfigurationError,
  APIError,
  BadRequestError,
  AuthenticationError,
  QuotaExceededError,
  PermissionDeniedError,
  NotFoundError,
  ConflictError,
  UnprocessableEntityError,
  RateLimitError,
  InternalServerError,
  APIConnectionError,
  APITimeoutError,
  DecodeError,
  PollingTimeoutError,
  PollingCancelledError,
  FileError,
  NoMorePagesError,
} from "./errors/index.js";
export type { ErrorCode, APIErrorContext, FileErrorDetails, RateLimitType } from "./errors/index.js";

// Constants
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_POLL_INTERVAL,
  DEFAULT_POLL_TIMEOUT,
  MAX_FILE_SIZE,
  SUPPORTED_EXTENSIONS,
  RETRYABLE_STATUS_CODES,
  SDK_VERSION,
} from "./utils/constants.js";

// Utilities (for advanced use)
export {
  DEFAULT_RETRY_POLICY,
  createRetryPolicy,
  calculateDelay,
  isRetryableError,
  shouldRetry,
  withRetry,
} from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export {
  waitForCompletion,
  isTerminalStatus,
  isSuccessStatus,
  isErrorStatus,
} from "./utils/polling.js";
export {
  prepareFileUpload,
  prepareUrlUpload,
  prepareBase64Upload,
  detectContentType,
  encodeFileToBase64,
} from "./utils/files.js";
export type { FileInput, FileUploadOptions, UrlUpload, Base64Upload } from "./utils/files.js";
