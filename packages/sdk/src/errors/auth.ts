import { APIError, type APIErrorContext } from "./api.js";

/**
 * Error thrown when authentication fails (401)
 */
export class AuthenticationError extends APIError {
  constructor(
    message: string = "Invalid API key",
    statusCode = 401,
    context: APIErrorContext = {},
  ) {
    super(message, statusCode, context, "AUTHENTICATION_ERROR");
  }
}

/**
 * Error thrown when the API key lacks access to a resource (403)
 */
export class PermissionDeniedError extends APIError {
  constructor(
    message: string = "Access forbidden",
    statusCode = 403,
    context: APIErrorContext = {},
  ) {
    super(message, statusCode, context, "PERMISSION_DENIED");
  }
}
