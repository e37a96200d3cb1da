/**
 * Type definitions for the Docuflow SDK
 */

export type { ClientConfig, ResolvedClientConfig } from "./config.js";
export type {
  HttpMethod,
  QueryValue,
  FilePart,
  RequestBody,
  RequestDescriptor,
  RequestOptions,
  RetryContext,
  RetryPolicy,
} from "./http.js";
export type {
  OperationState,
  OperationStatus,
  PollOptions,
} from "./operations.js";
export type {
  PaginationInfo,
  PaginatedResponse,
  PageFetcher,
} from "./pagination.js";
