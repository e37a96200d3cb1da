import { DecodeError, NoMorePagesError } from "../errors/index.js";
import type { PageFetcher, PaginatedResponse, PaginationInfo } from "../types/pagination.js";
import { zodDecoder, type Decoder } from "./response.js";
import { paginatedResponseSchema } from "./schemas.js";

/**
 * Decode the list envelope, leaving items undecoded
 */
export const decodePaginatedResponse: Decoder<PaginatedResponse<unknown>> =
  zodDecoder(paginatedResponseSchema);

/**
 * A page of results from a paginated API endpoint.
 *
 * A page holds a bound fetcher for the same query, so it can produce its
 * successor on its own. Walking forward never mutates earlier pages.
 *
 * @example
 * ```typescript
 * // Access current page data
 * const page = await client.getPage(listRequest, zodDecoder(itemSchema));
 * for (const item of page) {
 *   console.log(item.name);
 * }
 *
 * // Iterate through all pages
 * for await (const p of page.iterPages()) {
 *   console.log(`Page ${p.page}: ${p.length} items`);
 * }
 *
 * // Iterate through all items across pages
 * for await (const item of page.autoPagingIter()) {
 *   console.log(item.name);
 * }
 * ```
 */
export class Page<T> implements Iterable<T>, AsyncIterable<T> {
  constructor(
    readonly data: readonly T[],
    readonly pagination: Readonly<PaginationInfo>,
    private readonly fetchPage: PageFetcher<Page<T>>,
  ) {}

  /** Total number of items across all pages */
  get total(): number {
    return this.pagination.total;
  }

  /** Current page number (1-indexed) */
  get page(): number {
    return this.pagination.page;
  }

  /** Number of items per page */
  get limit(): number {
    return this.pagination.limit;
  }

  get totalPages(): number {
    return this.limit > 0 ? Math.ceil(this.total / this.limit) : 0;
  }

  /** Number of items in this page */
  get length(): number {
    return this.data.length;
  }

  hasNextPage(): boolean {
    return this.page * this.limit < this.total;
  }

  /**
   * Fetch the next page of results
   *
   * @throws {NoMorePagesError} If this is the last page
   */
  async nextPage(): Promise<Page<T>> {
    if (!this.hasNextPage()) {
      throw new NoMorePagesError(this.page);
    }
    return this.fetchPage(this.page + 1);
  }

  /**
   * Iterate through all pages starting from this page.
   * Forward-only: once consumed, start again from a fresh list call.
   */
  async *iterPages(): AsyncGenerator<Page<T>, void, undefined> {
    let current: Page<T> = this;
    while (true) {
      yield current;
      if (!current.hasNextPage()) {
        return;
      }
      current = await current.nextPage();
    }
  }

  /**
   * Iterate through all items across all pages. The next page is only
   * fetched once the items of the current one are exhausted.
   */
  async *autoPagingIter(): AsyncGenerator<T, void, undefined> {
    for await (const page of this.iterPages()) {
      yield* page.data;
    }
  }

  /**
   * Iterate over items in this page only.
   * For iterating across all pages, use iterPages() or autoPagingIter().
   */
  [Symbol.iterator](): Iterator<T> {
    return this.data[Symbol.iterator]();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.autoPagingIter();
  }
}

/**
 * Decode a list response body into a Page bound to `fetchPage`
 *
 * @throws {DecodeError} If the body or one of its items does not fit
 */
export function decodePage<T>(
  body: unknown,
  decodeItem: Decoder<T>,
  fetchPage: PageFetcher<Page<T>>,
): Page<T> {
  const envelope = decodePaginatedResponse(body);
  const { total, page, limit } = envelope.pagination;
  if (envelope.data.length > limit) {
    throw new DecodeError(
      `Page ${page} holds ${envelope.data.length} items, more than its limit of ${limit}`,
    );
  }
  return new Page(envelope.data.map(decodeItem), { total, page, limit }, fetchPage);
}
