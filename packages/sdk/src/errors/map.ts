import { AxiosError } from "axios";
import { APIError, type APIErrorContext, BadRequestError, ConflictError, InternalServerError, NotFoundError, UnprocessableEntityError } from "./api.js";
import { AuthenticationError, PermissionDeniedError } from "./auth.js";
import { APIConnectionError, APITimeoutError } from "./network.js";
import { QuotaExceededError, RateLimitError } from "./rate-limit.js";

type APIErrorConstructor = new (
  message: string,
  statusCode: number,
  context?: APIErrorContext,
) => APIError;

/**
 * Error class raised for each mapped HTTP status
 */
export const STATUS_CODE_TO_ERROR: Readonly<Record<number, APIErrorConstructor>> = {
  400: BadRequestError,
  401: AuthenticationError,
  402: QuotaExceededError,
  403: PermissionDeniedError,
  404: NotFoundError,
  409: ConflictError,
  422: UnprocessableEntityError,
  429: RateLimitError,
};

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_TIMEOUT"]);

/**
 * Decode an error body as JSON, keeping the raw text when it is not JSON
 */
function decodeErrorBody(text: string): unknown {
  if (text === "") {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function field(value: unknown, key: string): unknown {
  if (typeof value === "object" && value !== null && key in value) {
    return Object.getOwnPropertyDescriptor(value, key)?.value;
  }
  return undefined;
}

/**
 * Extract a human-readable message, handling both string and object formats
 */
export function extractErrorMessage(body: unknown, statusCode: number): string {
  const error = field(body, "error");
  const nested = field(error, "message");
  const message = field(body, "message");
  const detail = field(body, "detail");

  if (typeof error === "string") return error;
  if (typeof nested === "string") return nested;
  if (typeof message === "string") return message;
  if (typeof detail === "string") return detail;
  if (error !== undefined && error !== null) return JSON.stringify(error);
  if (typeof body === "string" && body.trim() !== "") return body.trim();
  return `HTTP ${statusCode}`;
}

/**
 * Map an HTTP error response to a typed SDK error
 */
export function errorFromResponse(
  statusCode: number,
  headers: Record<string, string>,
  text: string,
): APIError {
  const body = decodeErrorBody(text);
  const message = extractErrorMessage(body, statusCode);
  const context: APIErrorContext = {
    requestId: headers["x-request-id"],
    body,
    rawBody: text,
    headers,
  };

  const ErrorClass =
    STATUS_CODE_TO_ERROR[statusCode] ??
    (statusCode >= 500 ? InternalServerError : APIError);
  return new ErrorClass(message, statusCode, context);
}

/**
 * Map a transport failure (no HTTP response) to a connection error
 */
export function errorFromTransport(error: AxiosError): APIConnectionError {
  if (error.code === AxiosError.ERR_CANCELED) {
    return new APIConnectionError("Request was cancelled", error, false);
  }
  if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
    return new APITimeoutError(`Request timed out: ${error.message}`, error);
  }
  return new APIConnectionError(`Connection error: ${error.message}`, error);
}
