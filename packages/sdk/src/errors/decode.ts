import { SDKError } from "./base.js";

/**
 * Error thrown when a response body cannot be decoded into the requested shape
 */
export class DecodeError extends SDKError {
  constructor(
    message: string,
    public readonly body?: string,
    public readonly issues: string[] = [],
    cause?: Error,
  ) {
    super(message, "DECODE_ERROR", undefined, cause);
  }
}
