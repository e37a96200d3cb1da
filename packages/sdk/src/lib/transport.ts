import { AxiosError, type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from "axios";
import { errorFromResponse, errorFromTransport } from "../errors/index.js";
import type { RequestBody, RequestDescriptor, RequestOptions, RetryPolicy } from "../types/http.js";
import { DEFAULT_TIMEOUT } from "../utils/constants.js";
import { buildHeaders, normalizeHeaders } from "../utils/headers.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { DEFAULT_RETRY_POLICY, withRetry } from "../utils/retry.js";
import type { Sleep } from "../utils/sleep.js";
import { RawResponse, bodyText, type Decoder } from "./response.js";

export interface TransportOptions {
  apiKey: string;
  httpClient: AxiosInstance;
  /** Per-attempt timeout in ms. Default: 60000 */
  timeout?: number;
  retryPolicy?: RetryPolicy;
  logger?: Logger;
  /** Jitter source. Default: Math.random */
  random?: () => number;
  /** Backoff sleep. Default: setTimeout based */
  sleep?: Sleep;
}

/**
 * Issues one logical request: builds the headers, enforces the timeout,
 * retries transient failures with exponential backoff, and maps the final
 * failure to a typed error.
 *
 * A transport keeps no per-request state, so any number of calls may be in
 * flight on the same instance.
 */
export class HTTPTransport {
  readonly retryPolicy: RetryPolicy;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(private readonly options: TransportOptions) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? createLogger(false);
  }

  /**
   * Execute a request and wrap the successful response.
   *
   * @throws {APIError} Subclass matching the final HTTP status
   * @throws {APIConnectionError} If the server could not be reached
   * @throws {APITimeoutError} If every attempt timed out
   */
  async execute<T>(
    descriptor: RequestDescriptor,
    decode: Decoder<T>,
    options: RequestOptions = {},
  ): Promise<RawResponse<T>> {
    const response = await withRetry(
      () => this.attempt(descriptor, options),
      {
        policy: this.retryPolicy,
        random: this.options.random,
        sleep: this.options.sleep,
        signal: options.signal,
        onRetry: (attempt, error, delay) => {
          this.logger.warn("Retrying request", {
            method: descriptor.method,
            path: descriptor.path,
            attempt,
            delay: Math.round(delay),
            reason: error instanceof Error ? error.message : String(error),
          });
        },
      },
    );

    return new RawResponse(response, decode);
  }

  /**
   * One attempt; resolves only for statuses below 400
   */
  private async attempt(
    descriptor: RequestDescriptor,
    options: RequestOptions,
  ): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.options.httpClient.request<unknown>(
        this.buildConfig(descriptor, options),
      );
    } catch (error) {
      if (error instanceof AxiosError) {
        throw errorFromTransport(error);
      }
      throw error;
    }

    if (response.status >= 400) {
      throw errorFromResponse(
        response.status,
        normalizeHeaders(response.headers),
        bodyText(response.data),
      );
    }
    return response;
  }

  /**
   * Build a fresh request config, body included, for every attempt
   */
  private buildConfig(
    descriptor: RequestDescriptor,
    options: RequestOptions,
  ): AxiosRequestConfig {
    return {
      method: descriptor.method,
      url: descriptor.path,
      params: descriptor.query,
      headers: buildHeaders(this.options.apiKey, descriptor.body, descriptor.headers),
      data: buildBody(descriptor.body),
      timeout: options.timeout ?? this.timeout,
      signal: options.signal,
      // The envelope decodes the body; keep it as text here
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    };
  }
}

function buildBody(body?: RequestBody): unknown {
  if (!body) {
    return undefined;
  }
  if (body.type === "json") {
    return JSON.stringify(body.data);
  }

  const form = new FormData();
  for (const [name, value] of Object.entries(body.fields ?? {})) {
    form.append(name, value);
  }
  for (const file of body.files) {
    form.append(
      file.field,
      new Blob([file.content], { type: file.contentType }),
      file.fileName,
    );
  }
  return form;
}
