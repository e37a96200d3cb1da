/**
 * Request and retry type definitions shared by the transport layer.
 *
 * @packageDocumentation
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | null | undefined;

/**
 * A file attached to a multipart request body
 */
export interface FilePart {
  /** Form field name */
  readonly field: string;
  readonly fileName: string;
  readonly contentType: string;
  readonly content: Uint8Array;
}

/**
 * Request body: JSON, multipart form data, or none
 */
export type RequestBody =
  | { readonly type: "json"; readonly data: unknown }
  | {
      readonly type: "multipart";
      readonly fields?: Readonly<Record<string, string>>;
      readonly files: readonly FilePart[];
    };

/**
 * Immutable description of one logical request.
 *
 * The transport builds a fresh HTTP request from it on every attempt, so a
 * multipart body is never a half-consumed stream on retry.
 *
 * @example
 * ```typescript
 * const descriptor: RequestDescriptor = {
 *   method: 'GET',
 *   path: '/api/document-types',
 *   query: { page: 1, limit: 20 },
 * };
 * ```
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query?: Readonly<Record<string, QueryValue>>;
  readonly headers?: Readonly<Record<string, string>>;
  readonly body?: RequestBody;
}

/**
 * Per-call transport options
 */
export interface RequestOptions {
  /** Per-attempt timeout in ms, overriding the client default */
  timeout?: number;

  /** AbortSignal for cancellation */
  signal?: AbortSignal;
}

/**
 * What a failed attempt looked like, as seen by the retry predicate
 */
export interface RetryContext {
  /** HTTP status, absent for connection failures */
  statusCode?: number;
  error: Error;
}

/**
 * Retry behaviour of a transport. Frozen once the transport is created.
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  readonly maxRetries: number;

  /** Delay before the first retry in ms */
  readonly initialDelay: number;

  /** Upper bound for a single delay in ms */
  readonly maxDelay: number;

  /** Base of the exponential backoff */
  readonly multiplier: number;

  /** Lower jitter bound, as a fraction of the computed delay */
  readonly jitterMin: number;

  /** Upper jitter bound, as a fraction of the computed delay */
  readonly jitterMax: number;

  readonly retryableStatusCodes: ReadonlySet<number>;

  /** Replaces the default eligibility rule when set */
  readonly shouldRetry?: (context: RetryContext) => boolean;
}
