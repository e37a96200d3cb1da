/**
 * Error classes for the Docuflow SDK
 */

export { SDKError, ConfigurationError } from "./base.js";
export type { ErrorCode } from "./base.js";
export {
  APIError,
  BadRequestError,
  NotFoundError,
  ConflictError,
  UnprocessableEntityError,
  InternalServerError,
} from "./api.js";
export type { APIErrorContext } from "./api.js";
export { AuthenticationError, PermissionDeniedError } from "./auth.js";
export { RateLimitError, QuotaExceededError } from "./rate-limit.js";
export type { RateLimitType } from "./rate-limit.js";
export { APIConnectionError, APITimeoutError } from "./network.js";
export { DecodeError } from "./decode.js";
export { PollingTimeoutError, PollingCancelledError } from "./job.js";
export { FileError } from "./file.js";
export type { FileErrorDetails } from "./file.js";
export { NoMorePagesError } from "./pagination.js";
export {
  STATUS_CODE_TO_ERROR,
  errorFromResponse,
  errorFromTransport,
  extractErrorMessage,
} from "./map.js";
