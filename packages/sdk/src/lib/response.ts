import type { AxiosResponse } from "axios";
import { ZodObject, type ZodType, type ZodTypeDef } from "zod";
import { DecodeError } from "../errors/index.js";
import { normalizeHeaders } from "../utils/headers.js";

/**
 * Turns a decoded JSON value into a typed value, throwing when it does not fit
 */
export type Decoder<T> = (value: unknown) => T;

/**
 * Decoder that returns the JSON value as is
 */
export const passthroughDecoder: Decoder<unknown> = (value) => value;

/**
 * Build a decoder from a zod schema. Validation failures become DecodeError.
 *
 * Fields the root object schema does not declare are carried over from the
 * body, so a plain `z.object(...)` keeps what the server adds later. Nested
 * object schemas should use `.passthrough()` for the same effect.
 */
export function zodDecoder<T>(schema: ZodType<T, ZodTypeDef, unknown>): Decoder<T> {
  return (value) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      );
      throw new DecodeError(
        `Response did not match the expected shape: ${issues.join("; ")}`,
        undefined,
        issues,
        result.error,
      );
    }
    const data = result.data;
    const target: unknown = data;
    if (schema instanceof ZodObject && isRecord(value) && isRecord(target)) {
      for (const [key, field] of Object.entries(value)) {
        if (!(key in target)) {
          target[key] = field;
        }
      }
    }
    return data;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type Cached<V> = { done: false } | { done: true; value: V };

/**
 * Convert whatever the adapter returned into the body text
 */
export function bodyText(data: unknown): string {
  if (data === undefined || data === null) return "";
  if (typeof data === "string") return data;
  if (data instanceof Uint8Array) return Buffer.from(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return JSON.stringify(data);
}

/**
 * A wrapper around an HTTP response giving access to status code and headers
 * without decoding the body, plus a cached typed `parse()`.
 *
 * @example
 * ```typescript
 * const response = await client.execute(
 *   { method: 'GET', path: '/api/document-types/dt_123' },
 *   zodDecoder(documentTypeSchema),
 * );
 * console.log(response.statusCode, response.requestId);
 * const documentType = response.parse();
 * ```
 */
export class RawResponse<T> {
  readonly headers: Readonly<Record<string, string>>;
  readonly text: string;

  private parsed: Cached<T> = { done: false };
  private body: Cached<unknown> = { done: false };

  constructor(
    private readonly response: AxiosResponse<unknown>,
    private readonly decode: Decoder<T>,
  ) {
    this.headers = normalizeHeaders(response.headers);
    this.text = bodyText(response.data);
  }

  get statusCode(): number {
    return this.response.status;
  }

  /** Value of the `x-request-id` header, for correlation with server logs */
  get requestId(): string | undefined {
    return this.headers["x-request-id"];
  }

  /** The underlying axios response */
  get httpResponse(): AxiosResponse<unknown> {
    return this.response;
  }

  /**
   * Parse the body as JSON
   *
   * @throws {DecodeError} If the body is not valid JSON
   */
  json(): unknown {
    if (this.body.done) {
      return this.body.value;
    }
    let value: unknown;
    try {
      value = this.text === "" ? null : JSON.parse(this.text);
    } catch (error) {
      throw new DecodeError(
        `Response body is not valid JSON (status ${this.statusCode})`,
        this.text,
        [],
        error instanceof Error ? error : undefined,
      );
    }
    this.body = { done: true, value };
    return value;
  }

  /**
   * Decode the body into the typed model. The decoder runs once; later calls
   * return the same value.
   *
   * @throws {DecodeError} If the body cannot be decoded
   */
  parse(): T {
    if (this.parsed.done) {
      return this.parsed.value;
    }
    const value = this.decode(this.json());
    this.parsed = { done: true, value };
    return value;
  }
}
