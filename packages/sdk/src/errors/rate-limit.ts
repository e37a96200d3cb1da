import { APIError, type APIErrorContext } from "./api.js";

/**
 * Period a rate limit applies to
 */
export type RateLimitType = "minute" | "hour" | "day" | (string & {});

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function optionalNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Error thrown when rate limit is exceeded (429)
 *
 * Every detail is read best-effort from the response body and headers;
 * absent or malformed values are left `undefined`.
 */
export class RateLimitError extends APIError {
  /** Seconds to wait before retrying */
  public readonly retryAfter?: number;
  public readonly limitType?: RateLimitType;
  public readonly limit?: number;
  public readonly remaining?: number;
  /** Timestamp at which the limit resets */
  public readonly resetTime?: number;

  constructor(
    message: string,
    statusCode = 429,
    context: APIErrorContext = {},
  ) {
    super(message, statusCode, context, "RATE_LIMIT_ERROR");
    const body = asRecord(context.body);
    this.retryAfter =
      optionalNumber(body.retryAfter) ??
      optionalNumber(this.headers["retry-after"]);
    this.limitType = optionalString(body.limitType);
    this.limit = optionalNumber(body.limit);
    this.remaining = optionalNumber(body.remaining);
    this.resetTime = optionalNumber(body.resetTime);
  }
}

/**
 * Error thrown when the account's monthly quota is used up (402)
 */
export class QuotaExceededError extends APIError {
  public readonly quota?: number;
  public readonly used?: number;
  /** ISO 8601 date at which the quota resets */
  public readonly resetDate?: string;

  constructor(
    message: string,
    statusCode = 402,
    context: APIErrorContext = {},
  ) {
    super(message, statusCode, context, "QUOTA_EXCEEDED");
    const body = asRecord(context.body);
    this.quota = optionalNumber(body.quota);
    this.used = optionalNumber(body.used);
    this.resetDate = optionalString(body.resetDate);
  }
}
