import { SDKError, type ErrorCode } from "./base.js";

/**
 * Error thrown when the API server cannot be reached (DNS, refused, reset)
 */
export class APIConnectionError extends SDKError {
  constructor(
    message: string,
    cause?: Error,
    public readonly shouldRetry: boolean = true,
    code: ErrorCode = "CONNECTION_ERROR",
  ) {
    super(message, code, undefined, cause);
  }
}

/**
 * Error thrown when a request exceeds its timeout
 */
export class APITimeoutError extends APIConnectionError {
  constructor(message: string = "Request timed out", cause?: Error) {
    super(message, cause, true, "TIMEOUT_ERROR");
  }
}
