import { SDKError, type ErrorCode } from "./base.js";

/**
 * Diagnostic context captured from an error response
 */
export interface APIErrorContext {
  /** Value of the `x-request-id` response header */
  requestId?: string;
  /** Parsed JSON body, or the raw text when it is not JSON */
  body?: unknown;
  /** Body text exactly as received */
  rawBody?: string;
  /** Response headers with lower-cased names */
  headers?: Record<string, string>;
}

/**
 * Error returned by the API with an HTTP status code.
 *
 * Used directly for statuses without a dedicated subclass (418, 405, ...).
 */
export class APIError extends SDKError {
  public readonly requestId?: string;
  public readonly body?: unknown;
  public readonly rawBody?: string;
  public readonly headers: Record<string, string>;

  constructor(
    message: string,
    statusCode: number,
    context: APIErrorContext = {},
    code: ErrorCode = "API_ERROR",
  ) {
    super(message, code, statusCode);
    this.requestId = context.requestId;
    this.body = context.body;
    this.rawBody = context.rawBody;
    this.headers = context.headers ?? {};
  }

  override toString(): string {
    const requestId = this.requestId ? `, requestId=${this.requestId}` : "";
    return `${this.name}(statusCode=${this.statusCode}${requestId}): ${this.message}`;
  }
}

/**
 * Error thrown for malformed requests (400)
 */
export class BadRequestError extends APIError {
  constructor(message: string, statusCode = 400, context: APIErrorContext = {}) {
    super(message, statusCode, context, "BAD_REQUEST");
  }
}

/**
 * Error thrown when a resource does not exist (404)
 */
export class NotFoundError extends APIError {
  constructor(message: string, statusCode = 404, context: APIErrorContext = {}) {
    super(message, statusCode, context, "NOT_FOUND");
  }
}

/**
 * Error thrown when the request conflicts with the resource state (409)
 */
export class ConflictError extends APIError {
  constructor(message: string, statusCode = 409, context: APIErrorContext = {}) {
    super(message, statusCode, context, "CONFLICT");
  }
}

/**
 * Error thrown when the request is well-formed but semantically invalid (422)
 */
export class UnprocessableEntityError extends APIError {
  constructor(message: string, statusCode = 422, context: APIErrorContext = {}) {
    super(message, statusCode, context, "UNPROCESSABLE_ENTITY");
  }
}

/**
 * Error thrown for server-side failures (5xx)
 */
export class InternalServerError extends APIError {
  constructor(message: string, statusCode = 500, context: APIErrorContext = {}) {
    super(message, statusCode, context, "INTERNAL_SERVER_ERROR");
  }
}
