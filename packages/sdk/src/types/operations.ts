/**
 * Asynchronous operation type definitions.
 *
 * @packageDocumentation
 */

/**
 * Lifecycle state of an asynchronous operation.
 * `SUCCESS` and `ERROR` are terminal.
 */
export type OperationState = "ENQUEUED" | "PROCESSING" | "SUCCESS" | "ERROR";

/**
 * Snapshot of an asynchronous operation, as returned by a status endpoint.
 *
 * Snapshots are immutable: polling replaces the whole object with the one
 * fetched last.
 */
export interface OperationStatus<TData = unknown> {
  readonly operationId: string;
  readonly status: OperationState;
  /** Completion percentage (0-100), when the API reports one */
  readonly progress?: number;
  /** Result payload, present once the status is `SUCCESS` */
  readonly data?: TData;
  /** Error message, present once the status is `ERROR` */
  readonly error?: string;
}

/**
 * Configuration options for waiting on an operation.
 *
 * @example
 * ```typescript
 * const options: PollOptions<OperationStatus> = {
 *   pollInterval: 2000,  // Check every 2 seconds
 *   timeout: 600000,     // Wait up to 10 minutes
 *   onStatus: (status) => {
 *     console.log(`${status.status}: ${status.progress ?? 0}%`);
 *   },
 * };
 * ```
 */
export interface PollOptions<S> {
  /** Polling interval in ms. Default: 2000 */
  pollInterval?: number;

  /** Maximum wait time in ms. Default: 300000 (5min) */
  timeout?: number;

  /** Called with every freshly fetched status, never with the initial one */
  onStatus?: (status: S) => void | Promise<void>;

  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}
