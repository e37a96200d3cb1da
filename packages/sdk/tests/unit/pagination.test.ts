import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { DecodeError, NoMorePagesError } from "../../src/errors/index.js";
import { Page, decodePage, decodePaginatedResponse } from "../../src/lib/pagination.js";
import { zodDecoder } from "../../src/lib/response.js";
import type { PaginatedResponse } from "../../src/types/pagination.js";

const itemSchema = z.object({ id: z.number() }).passthrough();
const decodeItem = zodDecoder(itemSchema);

type Item = z.infer<typeof itemSchema>;

/**
 * Serves `total` items in pages of `limit`, like a list endpoint would
 */
function createListing(total: number, limit: number) {
  const items = Array.from({ length: total }, (_, i) => ({ id: i + 1 }));

  const body = (page: number) => ({
    data: items.slice((page - 1) * limit, page * limit),
    pagination: { total, page, limit },
  });

  const fetchPage = vi.fn<(page: number) => Promise<Page<Item>>>();
  fetchPage.mockImplementation(async (page) => decodePage(body(page), decodeItem, fetchPage));

  return { first: decodePage(body(1), decodeItem, fetchPage), fetchPage };
}

describe("Page", () => {
  it("should expose pagination metadata", () => {
    const { first } = createListing(25, 10);

    expect(first.total).toBe(25);
    expect(first.page).toBe(1);
    expect(first.limit).toBe(10);
    expect(first.totalPages).toBe(3);
    expect(first.length).toBe(10);
    expect(first.hasNextPage()).toBe(true);
  });

  it("should iterate over the current page only", () => {
    const { first, fetchPage } = createListing(25, 10);

    expect([...first].map((item) => item.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("should fetch the next page", async () => {
    const { first, fetchPage } = createListing(25, 10);

    const second = await first.nextPage();

    expect(fetchPage).toHaveBeenCalledWith(2);
    expect(second.page).toBe(2);
    expect(second.data[0]).toEqual({ id: 11 });
    expect(first.page).toBe(1);
  });

  it("should walk every page", async () => {
    const { first, fetchPage } = createListing(25, 10);
    const sizes: number[] = [];
    const hasNext: boolean[] = [];

    for await (const page of first.iterPages()) {
      sizes.push(page.length);
      hasNext.push(page.hasNextPage());
    }

    expect(sizes).toEqual([10, 10, 5]);
    expect(hasNext).toEqual([true, true, false]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it("should yield every item across pages", async () => {
    const { first } = createListing(25, 10);
    const ids: number[] = [];

    for await (const item of first.autoPagingIter()) {
      ids.push(item.id);
    }

    expect(ids).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
  });

  it("should support for await on the page itself", async () => {
    const { first } = createListing(7, 3);
    const ids: number[] = [];

    for await (const item of first) {
      ids.push(item.id);
    }

    expect(ids).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("should fetch the next page only once the current one is exhausted", async () => {
    const { first, fetchPage } = createListing(25, 10);
    const iterator = first.autoPagingIter();

    for (let i = 0; i < 10; i++) {
      await iterator.next();
    }
    expect(fetchPage).not.toHaveBeenCalled();

    const eleventh = await iterator.next();
    expect(eleventh.value).toEqual({ id: 11 });
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("should stop when iteration breaks early", async () => {
    const { first, fetchPage } = createListing(25, 10);

    for await (const item of first.autoPagingIter()) {
      if (item.id === 3) break;
    }

    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("should throw NoMorePagesError on the last page", async () => {
    const { first } = createListing(5, 10);

    expect(first.hasNextPage()).toBe(false);
    await expect(first.nextPage()).rejects.toBeInstanceOf(NoMorePagesError);
    await expect(first.nextPage()).rejects.toThrow("No more pages after page 1");
  });

  it("should handle an empty listing", async () => {
    const { first, fetchPage } = createListing(0, 10);
    const pages: Page<Item>[] = [];

    for await (const page of first.iterPages()) {
      pages.push(page);
    }

    expect(first.totalPages).toBe(0);
    expect(first.hasNextPage()).toBe(false);
    expect(pages).toHaveLength(1);
    expect(pages[0]?.length).toBe(0);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it("should stop on an exact multiple of the limit", async () => {
    const { first } = createListing(20, 10);
    const sizes: number[] = [];

    for await (const page of first.iterPages()) {
      sizes.push(page.length);
    }

    expect(sizes).toEqual([10, 10]);
  });
});

describe("decodePage", () => {
  const fetchPage = vi.fn();

  it("should reject a body without pagination", () => {
    expect(() => decodePage({ data: [] }, decodeItem, fetchPage)).toThrow(DecodeError);
  });

  it("should reject a page holding more items than its limit", () => {
    const body = { data: [{ id: 1 }, { id: 2 }, { id: 3 }], pagination: { total: 3, page: 1, limit: 2 } };

    expect(() => decodePage(body, decodeItem, fetchPage)).toThrow(
      "Page 1 holds 3 items, more than its limit of 2",
    );
  });

  it("should reject items the item decoder refuses", () => {
    const body = { data: [{ id: "one" }], pagination: { total: 1, page: 1, limit: 10 } };

    expect(() => decodePage(body, decodeItem, fetchPage)).toThrow(DecodeError);
  });

  it("should keep unknown item fields", () => {
    const body = { data: [{ id: 1, label: "Invoice" }], pagination: { total: 1, page: 1, limit: 10 } };

    const page = decodePage(body, decodeItem, fetchPage);

    expect(page.data).toEqual([{ id: 1, label: "Invoice" }]);
  });
});

describe("decodePaginatedResponse", () => {
  it("should decode the envelope and leave items as they are", () => {
    const wire: PaginatedResponse<{ id: string }> = {
      data: [{ id: "dt_1" }, { id: "dt_2" }],
      pagination: { total: 5, page: 1, limit: 2 },
    };

    const envelope: PaginatedResponse<unknown> = decodePaginatedResponse(wire);

    expect(envelope.data).toEqual([{ id: "dt_1" }, { id: "dt_2" }]);
    expect(envelope.pagination).toEqual({ total: 5, page: 1, limit: 2 });
  });

  it("should reject a negative total", () => {
    expect(() =>
      decodePaginatedResponse({ data: [], pagination: { total: -1, page: 1, limit: 10 } }),
    ).toThrow(DecodeError);
  });
});
