import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import {
  APIConnectionError,
  APIError,
  APITimeoutError,
  AuthenticationError,
  BadRequestError,
  ConflictError,
  InternalServerError,
  NotFoundError,
  PermissionDeniedError,
  PollingTimeoutError,
  QuotaExceededError,
  RateLimitError,
  SDKError,
  UnprocessableEntityError,
  errorFromResponse,
  errorFromTransport,
  extractErrorMessage,
} from "../../src/errors/index.js";

describe("Errors", () => {
  describe("hierarchy", () => {
    it("should make every API error an SDKError", () => {
      const error = new NotFoundError("missing");
      expect(error).toBeInstanceOf(APIError);
      expect(error).toBeInstanceOf(SDKError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe("NotFoundError");
      expect(error.code).toBe("NOT_FOUND");
    });

    it("should make timeouts connection errors", () => {
      const error = new APITimeoutError();
      expect(error).toBeInstanceOf(APIConnectionError);
      expect(error.message).toBe("Request timed out");
      expect(error.code).toBe("TIMEOUT_ERROR");
      expect(error.statusCode).toBeUndefined();
    });

    it("should make polling timeouts API timeouts", () => {
      const error = new PollingTimeoutError("op_1", 500);
      expect(error).toBeInstanceOf(APITimeoutError);
      expect(error.operationId).toBe("op_1");
      expect(error.message).toBe("Operation op_1 did not complete within 500ms");
    });

    it("should use default messages for auth errors", () => {
      expect(new AuthenticationError().message).toBe("Invalid API key");
      expect(new PermissionDeniedError().statusCode).toBe(403);
    });

    it("should format toString with the request id", () => {
      const error = new BadRequestError("Invalid input", 400, { requestId: "req_9" });
      expect(error.toString()).toBe(
        "BadRequestError(statusCode=400, requestId=req_9): Invalid input",
      );
      expect(new APIError("Teapot", 418).toString()).toBe(
        "APIError(statusCode=418): Teapot",
      );
    });
  });

  describe("extractErrorMessage", () => {
    it("should prefer a string error field", () => {
      expect(extractErrorMessage({ error: "Bad", message: "Other" }, 400)).toBe("Bad");
    });

    it("should read a nested error message", () => {
      expect(extractErrorMessage({ error: { message: "Nested" } }, 400)).toBe("Nested");
    });

    it("should fall back to message then detail", () => {
      expect(extractErrorMessage({ message: "From message" }, 400)).toBe("From message");
      expect(extractErrorMessage({ detail: "From detail" }, 422)).toBe("From detail");
    });

    it("should serialize an error object without a message", () => {
      expect(extractErrorMessage({ error: { code: 7 } }, 400)).toBe('{"code":7}');
    });

    it("should use plain text bodies", () => {
      expect(extractErrorMessage("  Bad Gateway \n", 502)).toBe("Bad Gateway");
    });

    it("should fall back to the status", () => {
      expect(extractErrorMessage(undefined, 503)).toBe("HTTP 503");
      expect(extractErrorMessage({}, 500)).toBe("HTTP 500");
    });
  });

  describe("errorFromResponse", () => {
    it.each([
      [400, BadRequestError],
      [401, AuthenticationError],
      [402, QuotaExceededError],
      [403, PermissionDeniedError],
      [404, NotFoundError],
      [409, ConflictError],
      [422, UnprocessableEntityError],
      [429, RateLimitError],
      [500, InternalServerError],
      [502, InternalServerError],
      [503, InternalServerError],
      [504, InternalServerError],
    ])("should map status %i", (status, ErrorClass) => {
      const error = errorFromResponse(status, {}, '{"error":"failed"}');
      expect(error).toBeInstanceOf(ErrorClass);
      expect(error.statusCode).toBe(status);
      expect(error.message).toBe("failed");
    });

    it("should map unlisted 4xx statuses to the base class", () => {
      const error = errorFromResponse(405, {}, "");
      expect(error.constructor).toBe(APIError);
      expect(error.message).toBe("HTTP 405");
    });

    it("should keep the request id, headers and body", () => {
      const headers = { "x-request-id": "req_42", "content-type": "application/json" };
      const error = errorFromResponse(404, headers, '{"error":"Document type not found"}');

      expect(error.requestId).toBe("req_42");
      expect(error.headers).toEqual(headers);
      expect(error.body).toEqual({ error: "Document type not found" });
    });

    it("should keep a non-JSON body as text", () => {
      const error = errorFromResponse(502, {}, "<html>Bad Gateway</html>");
      expect(error.body).toBe("<html>Bad Gateway</html>");
      expect(error.message).toBe("<html>Bad Gateway</html>");
    });

    it("should keep the body text exactly as received", () => {
      const text = '{ "error": "Document type not found" }\n';
      const error = errorFromResponse(404, {}, text);

      expect(error.rawBody).toBe(text);
      expect(error.body).toEqual({ error: "Document type not found" });
    });

    it("should keep an empty raw body when the response has none", () => {
      const error = errorFromResponse(503, {}, "");

      expect(error.rawBody).toBe("");
      expect(error.body).toBeUndefined();
    });

    it("should read rate limit details from the body", () => {
      const error = errorFromResponse(
        429,
        {},
        JSON.stringify({
          error: "Rate limit exceeded",
          retryAfter: 30,
          limitType: "hour",
          limit: 1000,
          remaining: 0,
          resetTime: 1767225600,
        }),
      );

      expect(error).toBeInstanceOf(RateLimitError);
      if (error instanceof RateLimitError) {
        expect(error.retryAfter).toBe(30);
        expect(error.limitType).toBe("hour");
        expect(error.limit).toBe(1000);
        expect(error.remaining).toBe(0);
        expect(error.resetTime).toBe(1767225600);
      }
    });

    it("should fall back to the Retry-After header", () => {
      const error = errorFromResponse(429, { "retry-after": "12" }, "");
      expect(error).toHaveProperty("retryAfter", 12);
    });

    it("should leave malformed rate limit details undefined", () => {
      const error = errorFromResponse(
        429,
        { "retry-after": "soon" },
        '{"retryAfter":"later","limit":null}',
      );
      expect(error).toHaveProperty("retryAfter", undefined);
      expect(error).toHaveProperty("limit", undefined);
    });

    it("should read quota details from the body", () => {
      const error = errorFromResponse(
        402,
        {},
        '{"error":"Monthly quota exceeded","quota":500,"used":500,"resetDate":"2026-11-01T00:00:00Z"}',
      );

      expect(error).toBeInstanceOf(QuotaExceededError);
      if (error instanceof QuotaExceededError) {
        expect(error.message).toBe("Monthly quota exceeded");
        expect(error.quota).toBe(500);
        expect(error.used).toBe(500);
        expect(error.resetDate).toBe("2026-11-01T00:00:00Z");
      }
    });
  });

  describe("errorFromTransport", () => {
    it("should map timeouts", () => {
      const cause = new AxiosError("timeout of 100ms exceeded", "ECONNABORTED");
      const error = errorFromTransport(cause);

      expect(error).toBeInstanceOf(APITimeoutError);
      expect(error.message).toBe("Request timed out: timeout of 100ms exceeded");
      expect(error.cause).toBe(cause);
    });

    it("should map connection failures", () => {
      const error = errorFromTransport(new AxiosError("getaddrinfo ENOTFOUND", "ENOTFOUND"));

      expect(error).not.toBeInstanceOf(APITimeoutError);
      expect(error.message).toBe("Connection error: getaddrinfo ENOTFOUND");
      expect(error.shouldRetry).toBe(true);
    });

    it("should mark cancellations as not retryable", () => {
      const error = errorFromTransport(new AxiosError("canceled", AxiosError.ERR_CANCELED));

      expect(error.message).toBe("Request was cancelled");
      expect(error.shouldRetry).toBe(false);
    });
  });
});
