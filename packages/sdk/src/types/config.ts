import type { AxiosInstance } from "axios";

/**
 * Client configuration options
 */
export interface ClientConfig {
  /** API key. Default: the DOCUFLOW_API_KEY environment variable */
  apiKey?: string;

  /** Base API URL. Default: https://api.docuflow.dev */
  baseURL?: string;

  /** Per-attempt request timeout in milliseconds. Default: 60000 (60s) */
  timeout?: number;

  /** Maximum retry attempts for transient errors. Default: 2 */
  maxRetries?: number;

  /** Initial delay between retries in ms. Default: 500 */
  retryDelay?: number;

  /** Upper bound for a single retry delay in ms. Default: 8000 */
  maxRetryDelay?: number;

  /** Backoff multiplier for exponential retry. Default: 2 */
  retryMultiplier?: number;

  /** Custom Axios instance (advanced) */
  httpClient?: AxiosInstance;

  /** Enable debug logging. Default: set when DOCUFLOW_LOG is 1, true or debug */
  debug?: boolean;
}

/**
 * Client configuration after defaults are applied
 */
export type ResolvedClientConfig = Required<Omit<ClientConfig, "httpClient">> & {
  httpClient?: AxiosInstance;
};
