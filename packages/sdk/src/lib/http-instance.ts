import Axios, { type AxiosInstance } from "axios";
import type { Logger } from "../utils/logger.js";

export interface HttpInstanceOptions {
  baseURL: string;
  timeout: number;
  logger: Logger;
  /** Existing instance to configure instead of creating one */
  instance?: AxiosInstance;
}

// Instances already carrying debug interceptors; a shared instance gets one pair
const instrumented = new WeakSet<AxiosInstance>();

/**
 * Create (or configure) the Axios instance a client sends its requests
 * through. Each client owns its instance; nothing is configured globally.
 */
export function createHttpInstance(options: HttpInstanceOptions): AxiosInstance {
  const instance =
    options.instance ??
    Axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout,
    });

  if (options.instance && !instance.defaults.baseURL) {
    instance.defaults.baseURL = options.baseURL;
  }

  if (options.logger.enabled && !instrumented.has(instance)) {
    setupInterceptors(instance, options.logger);
    instrumented.add(instance);
  }

  return instance;
}

/**
 * Setup request/response interceptors for debugging
 */
function setupInterceptors(instance: AxiosInstance, logger: Logger): void {
  instance.interceptors.request.use(
    (config) => {
      logger.debug("Request:", {
        method: config.method?.toUpperCase(),
        url: config.url,
        params: config.params,
      });
      return config;
    },
    (error) => {
      logger.error("Request Error:", error);
      return Promise.reject(error);
    },
  );

  instance.interceptors.response.use(
    (response) => {
      logger.debug("Response:", {
        status: response.status,
        requestId: response.headers["x-request-id"],
      });
      return response;
    },
    (error) => {
      logger.error("Response Error:", error);
      return Promise.reject(error);
    },
  );
}
