/**
 * Stable, programmatically matchable error kinds
 */
export type ErrorCode =
  | "API_ERROR"
  | "BAD_REQUEST"
  | "AUTHENTICATION_ERROR"
  | "QUOTA_EXCEEDED"
  | "PERMISSION_DENIED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "UNPROCESSABLE_ENTITY"
  | "RATE_LIMIT_ERROR"
  | "INTERNAL_SERVER_ERROR"
  | "CONNECTION_ERROR"
  | "TIMEOUT_ERROR"
  | "DECODE_ERROR"
  | "FILE_ERROR"
  | "CONFIGURATION_ERROR"
  | "NO_MORE_PAGES"
  | "POLLING_CANCELLED";

/**
 * Base error class for all SDK errors
 */
export class SDKError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode?: number,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when the client is misconfigured (missing API key, bad options)
 */
export class ConfigurationError extends SDKError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}
