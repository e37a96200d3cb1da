/**
 * Pagination metadata of a list response
 */
export interface PaginationInfo {
  /** Total number of items matching the query */
  total: number;
  /** Current page number (1-indexed) */
  page: number;
  /** Number of items per page */
  limit: number;
}

/**
 * Wire shape of a list endpoint response
 */
export interface PaginatedResponse<T> {
  data: T[];
  pagination: PaginationInfo;
}

/**
 * Fetches a given page of the same list query
 */
export type PageFetcher<P> = (page: number) => Promise<P>;
