import { SDKError } from "./base.js";
import { APITimeoutError } from "./network.js";

/**
 * Error thrown when an asynchronous operation does not finish before the
 * polling deadline. The operation keeps running server-side; its id can be
 * used to resume polling later.
 */
export class PollingTimeoutError extends APITimeoutError {
  constructor(
    public readonly operationId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation ${operationId} did not complete within ${timeoutMs}ms`);
  }
}

/**
 * Error thrown when polling is aborted through an AbortSignal
 */
export class PollingCancelledError extends SDKError {
  constructor(public readonly operationId: string) {
    super(`Polling cancelled for operation ${operationId}`, "POLLING_CANCELLED");
  }
}
