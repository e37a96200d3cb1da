import { AuthenticationError, ConfigurationError } from "./errors/index.js";
import { createHttpInstance } from "./lib/http-instance.js";
import { decodePage, type Page } from "./lib/pagination.js";
import type { Decoder, RawResponse } from "./lib/response.js";
import { HTTPTransport } from "./lib/transport.js";
import type { ClientConfig, ResolvedClientConfig } from "./types/config.js";
import type { RequestDescriptor, RequestOptions } from "./types/http.js";
import type { OperationStatus, PollOptions } from "./types/operations.js";
import {
  DEFAULT_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_RETRY_DELAY,
  DEFAULT_RETRY_DELAY,
  DEFAULT_TIMEOUT,
  ENV_VAR_API_KEY,
} from "./utils/constants.js";
import { maskApiKey } from "./utils/headers.js";
import { createLogger, isLoggingEnabledByEnv, type Logger } from "./utils/logger.js";
import { waitForCompletion } from "./utils/polling.js";
import { createRetryPolicy } from "./utils/retry.js";

export interface ListOptions extends RequestOptions {
  /** Page to start from. Default: 1 */
  page?: number;
  /** Items per page. Default: server default */
  limit?: number;
}

/**
 * Main Docuflow SDK client.
 *
 * The client owns the retrying transport every resource layer sends its
 * requests through, and exposes the shared request, pagination and polling
 * primitives.
 *
 * @example
 * ```typescript
 * import { Docuflow, zodDecoder } from '@docuflow/sdk';
 *
 * // Initialize with API key (or set DOCUFLOW_API_KEY)
 * const client = new Docuflow({
 *   apiKey: 'your-api-key',
 *   maxRetries: 3, // optional
 * });
 *
 * const documentType = await client.request(
 *   { method: 'GET', path: '/api/document-types/dt_123' },
 *   zodDecoder(documentTypeSchema),
 * );
 * ```
 */
export class Docuflow {
  readonly transport: HTTPTransport;
  private readonly config: ResolvedClientConfig;
  private readonly logger: Logger;

  constructor(config: ClientConfig = {}) {
    const apiKey = config.apiKey ?? process.env[ENV_VAR_API_KEY];
    if (!apiKey) {
      throw new AuthenticationError(
        `No API key provided. Either pass apiKey to the constructor or set the ${ENV_VAR_API_KEY} environment variable.`,
      );
    }

    const maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigurationError("maxRetries must be an integer >= 0");
    }

    this.config = {
      apiKey,
      baseURL: config.baseURL ?? DEFAULT_BASE_URL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      maxRetries,
      retryDelay: config.retryDelay ?? DEFAULT_RETRY_DELAY,
      maxRetryDelay: config.maxRetryDelay ?? DEFAULT_MAX_RETRY_DELAY,
      retryMultiplier: config.retryMultiplier ?? 2,
      debug: config.debug ?? isLoggingEnabledByEnv(),
      httpClient: config.httpClient,
    };

    this.logger = createLogger(this.config.debug);
    this.transport = new HTTPTransport({
      apiKey,
      timeout: this.config.timeout,
      logger: this.logger,
      httpClient: createHttpInstance({
        baseURL: this.config.baseURL,
        timeout: this.config.timeout,
        logger: this.logger,
        instance: this.config.httpClient,
      }),
      retryPolicy: createRetryPolicy({
        maxRetries: this.config.maxRetries,
        initialDelay: this.config.retryDelay,
        maxDelay: this.config.maxRetryDelay,
        multiplier: this.config.retryMultiplier,
      }),
    });
  }

  get baseURL(): string {
    return this.config.baseURL;
  }

  get maxRetries(): number {
    return this.config.maxRetries;
  }

  /**
   * Send a request and return the raw response envelope, leaving the body
   * undecoded until `parse()` is called.
   */
  execute<T>(
    descriptor: RequestDescriptor,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<RawResponse<T>> {
    return this.transport.execute(descriptor, decode, options);
  }

  /**
   * Send a request and decode its body
   */
  async request<T>(
    descriptor: RequestDescriptor,
    decode: Decoder<T>,
    options?: RequestOptions,
  ): Promise<T> {
    const response = await this.transport.execute(descriptor, decode, options);
    return response.parse();
  }

  /**
   * Fetch one page of a list endpoint. The returned page fetches its
   * successors with the same descriptor, only changing `page`.
   */
  async getPage<T>(
    descriptor: RequestDescriptor,
    decodeItem: Decoder<T>,
    options: ListOptions = {},
  ): Promise<Page<T>> {
    const { page = 1, limit, ...requestOptions } = options;
    const query = {
      ...descriptor.query,
      page,
      ...(limit !== undefined && { limit }),
    };

    const response = await this.transport.execute(
      { ...descriptor, query },
      (body) =>
        decodePage(body, decodeItem, (next) =>
          this.getPage(descriptor, decodeItem, { ...options, page: next }),
        ),
      requestOptions,
    );
    return response.parse();
  }

  /**
   * Poll an asynchronous operation until it succeeds or fails
   */
  waitForCompletion<S extends OperationStatus>(
    initial: S,
    fetchStatus: (operationId: string) => Promise<S>,
    options?: PollOptions<S>,
  ): Promise<S> {
    return waitForCompletion(initial, fetchStatus, options);
  }

  toString(): string {
    return `Docuflow(apiKey=${maskApiKey(this.config.apiKey)}, baseURL=${this.config.baseURL})`;
  }
}
