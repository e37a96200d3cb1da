/**
 * Default API base URL
 */
export const DEFAULT_BASE_URL = "https://api.docuflow.dev";

/**
 * Environment variable holding the API key
 */
export const ENV_VAR_API_KEY = "DOCUFLOW_API_KEY";

/**
 * Environment variable enabling debug logging
 */
export const ENV_VAR_LOG = "DOCUFLOW_LOG";

/**
 * Default per-attempt request timeout (60 seconds)
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Maximum file size (100MB)
 */
export const MAX_FILE_SIZE = 100 * 1024 * 1024;

/**
 * Form field the API reads every upload from, PDFs included
 */
export const UPLOAD_FIELD_NAME = "image";

/**
 * File name given to bytes and streams uploaded without one
 */
export const DEFAULT_UPLOAD_NAME = "document";

/**
 * Content types by file extension
 */
export const EXTENSION_TO_CONTENT_TYPE: Readonly<Record<string, string>> = {
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
  ".tiff": "image/tiff",
  ".tif": "image/tiff",
};

/**
 * Supported file extensions
 */
export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_TO_CONTENT_TYPE);

/**
 * Default retry count (3 attempts in total)
 */
export const DEFAULT_MAX_RETRIES = 2;

/**
 * Delay before the first retry (500ms)
 */
export const DEFAULT_RETRY_DELAY = 500;

/**
 * Upper bound for a single backoff delay (8 seconds)
 */
export const DEFAULT_MAX_RETRY_DELAY = 8000;

/**
 * HTTP status codes that trigger a retry
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
]);

/**
 * Default polling interval (2 seconds)
 */
export const DEFAULT_POLL_INTERVAL = 2000;

/**
 * Default polling timeout (5 minutes)
 */
export const DEFAULT_POLL_TIMEOUT = 300000;

/**
 * SDK version
 */
export const SDK_VERSION = "0.1.0";
