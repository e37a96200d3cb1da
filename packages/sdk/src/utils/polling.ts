import { PollingCancelledError, PollingTimeoutError } from "../errors/index.js";
import type { OperationState, OperationStatus, PollOptions } from "../types/operations.js";
import { DEFAULT_POLL_INTERVAL, DEFAULT_POLL_TIMEOUT } from "./constants.js";
import { sleep } from "./sleep.js";

const TERMINAL_STATES: ReadonlySet<OperationState> = new Set(["SUCCESS", "ERROR"]);

export function isTerminalStatus(status: OperationStatus): boolean {
  return TERMINAL_STATES.has(status.status);
}

export function isSuccessStatus(status: OperationStatus): boolean {
  return status.status === "SUCCESS";
}

export function isErrorStatus(status: OperationStatus): boolean {
  return status.status === "ERROR";
}

/**
 * Poll an operation until it reaches a terminal state
 *
 * The initial status is checked before anything else, so an operation that
 * is already complete returns without a single poll. `onStatus` only sees
 * freshly fetched statuses. An `ERROR` status is returned, not thrown.
 *
 * @param initial - Status returned by the call that started the operation
 * @param fetchStatus - Fetches the current status for an operation id
 * @param options - Polling configuration
 * @returns The terminal status
 * @throws PollingTimeoutError if the timeout elapses first
 * @throws PollingCancelledError if the signal is aborted
 * @throws Whatever `fetchStatus` throws (transport failures are not retried here)
 */
export async function waitForCompletion<S extends OperationStatus>(
  initial: S,
  fetchStatus: (operationId: string) => Promise<S>,
  options: PollOptions<S> = {},
): Promise<S> {
  const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL;
  const timeout = options.timeout ?? DEFAULT_POLL_TIMEOUT;
  // Monotonic clock, unaffected by wall-clock changes
  const deadline = performance.now() + timeout;
  let current = initial;

  while (true) {
    if (isTerminalStatus(current)) {
      return current;
    }

    // Check for cancellation
    if (options.signal?.aborted) {
      throw new PollingCancelledError(current.operationId);
    }

    const remaining = deadline - performance.now();
    if (remaining <= 0) {
      throw new PollingTimeoutError(current.operationId, timeout);
    }

    // Never sleep past the deadline
    await sleep(Math.min(pollInterval, remaining), options.signal);

    if (options.signal?.aborted) {
      throw new PollingCancelledError(current.operationId);
    }

    current = await fetchStatus(current.operationId);

    await options.onStatus?.(current);

    if (isTerminalStatus(current)) {
      return current;
    }

    if (performance.now() >= deadline) {
      throw new PollingTimeoutError(current.operationId, timeout);
    }
  }
}
