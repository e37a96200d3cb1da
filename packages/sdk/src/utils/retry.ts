import { APIError, APIConnectionError, RateLimitError } from "../errors/index.js";
import type { RetryPolicy } from "../types/http.js";
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_RETRY_DELAY,
  DEFAULT_RETRY_DELAY,
  RETRYABLE_STATUS_CODES,
} from "./constants.js";
import { sleep as defaultSleep, type Sleep } from "./sleep.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: DEFAULT_MAX_RETRIES,
  initialDelay: DEFAULT_RETRY_DELAY,
  maxDelay: DEFAULT_MAX_RETRY_DELAY,
  multiplier: 2,
  jitterMin: 0.25,
  jitterMax: 0.5,
  retryableStatusCodes: RETRYABLE_STATUS_CODES,
});

/**
 * Create a frozen policy from the defaults and the given overrides
 */
export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return Object.freeze({ ...DEFAULT_RETRY_POLICY, ...overrides });
}

/**
 * Check if an error is retriable
 */
export function isRetryableError(
  error: unknown,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): boolean {
  // Connection errors and timeouts, unless cancelled by the caller
  if (error instanceof APIConnectionError) {
    return error.shouldRetry;
  }

  if (error instanceof APIError && error.statusCode !== undefined) {
    return (
      policy.retryableStatusCodes.has(error.statusCode) ||
      error.statusCode >= 500
    );
  }

  // Don't retry:
  // - Client errors (4xx other than 429)
  // - Decode errors and anything thrown outside the HTTP stack
  return false;
}

/**
 * Decide whether the attempt numbered `attempt` (0-based) may be followed by another
 */
export function shouldRetry(
  attempt: number,
  policy: RetryPolicy,
  error: unknown,
): boolean {
  if (attempt >= policy.maxRetries) {
    return false;
  }
  if (policy.shouldRetry && error instanceof Error) {
    const statusCode = error instanceof APIError ? error.statusCode : undefined;
    return policy.shouldRetry({ statusCode, error });
  }
  return isRetryableError(error, policy);
}

/**
 * Server-provided retry guidance in seconds, if any
 */
export function getRetryAfter(error: unknown): number | undefined {
  if (error instanceof RateLimitError) {
    return error.retryAfter;
  }
  if (error instanceof APIError) {
    const header = error.headers["retry-after"];
    const parsed = header !== undefined ? Number(header) : NaN;
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Get delay before next retry attempt.
 *
 * Exponential backoff scaled up by a jitter fraction drawn from
 * [jitterMin, jitterMax]. A larger Retry-After wins; the result never
 * exceeds `policy.maxDelay`.
 */
export function calculateDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterSeconds?: number,
  random: () => number = Math.random,
): number {
  const delay = policy.initialDelay * Math.pow(policy.multiplier, attempt);
  const fraction =
    policy.jitterMin + (policy.jitterMax - policy.jitterMin) * random();
  const jittered = delay + delay * fraction;

  const retryAfterMs =
    retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : 0;

  return Math.min(Math.max(jittered, retryAfterMs), policy.maxDelay);
}

export interface RetryOptions {
  policy?: RetryPolicy;
  /** Called before each backoff sleep */
  onRetry?: (attempt: number, error: unknown, delay: number) => void;
  /** Jitter source. Default: Math.random */
  random?: () => number;
  sleep?: Sleep;
  /** Cuts a backoff sleep short; the next attempt then sees the aborted signal */
  signal?: AbortSignal;
}

/**
 * Retry an async operation with exponential backoff.
 *
 * The operation receives the 0-based attempt number and must build any
 * request state afresh on every call.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!shouldRetry(attempt, policy, error)) {
        throw error;
      }

      const delay = calculateDelay(
        attempt,
        policy,
        getRetryAfter(error),
        options.random,
      );

      options.onRetry?.(attempt + 1, error, delay);

      await wait(delay, options.signal);
    }
  }
}
