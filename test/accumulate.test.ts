import { describe, expect, it, vi } from "vitest";
import { accumulatePages, MAX_PAGE_SIZE, Page } from "../src/core/pagination/accumulate.js";
import { CliError, TransportError } from "../src/core/errors.js";

type Item = { key: string };

function items(...keys: string[]): Item[] {
  return keys.map((key) => ({ key }));
}

describe("accumulatePages", () => {
  it("stops at the limit and reports more when a cursor is pending", async () => {
    const fetchPage = vi.fn(async (_query: string, _maxCount: number, cursor?: string): Promise<Page<Item>> => {
      if (!cursor) {
        return { items: items("PROJ-1", "PROJ-2"), total: 5, nextCursor: "page-2" };
      }
      return { items: [], total: 5 };
    });

    const result = await accumulatePages(fetchPage, "project = PROJ", 2);

    expect(result.items).toEqual(items("PROJ-1", "PROJ-2"));
    expect(result.totalAvailable).toBe(5);
    expect(result.hasMore).toBe(true);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(fetchPage).toHaveBeenCalledWith("project = PROJ", 2, undefined);
  });

  it("reports no more items once the source is exhausted", async () => {
    const fetchPage = vi.fn(async (_query: string, _maxCount: number, cursor?: string): Promise<Page<Item>> => {
      if (!cursor) {
        return { items: items("A-1", "A-2"), total: 3, nextCursor: "p2" };
      }
      return { items: items("A-3"), total: 3 };
    });

    const result = await accumulatePages(fetchPage, "q", 10);

    expect(result.items).toEqual(items("A-1", "A-2", "A-3"));
    expect(result.totalAvailable).toBe(3);
    expect(result.hasMore).toBe(false);
    expect(fetchPage.mock.calls).toEqual([
      ["q", 10, undefined],
      ["q", 8, "p2"],
    ]);
  });

  it("caps every request at the page size limit", async () => {
    let served = 0;
    const fetchPage = vi.fn(async (_query: string, maxCount: number, _cursor?: string): Promise<Page<Item>> => {
      const page = Array.from({ length: maxCount }, (_, index) => ({ key: `K-${served + index + 1}` }));
      served += maxCount;
      return { items: page, total: 1000, nextCursor: `after-${served}` };
    });

    const result = await accumulatePages(fetchPage, "q", 250);

    expect(fetchPage.mock.calls.map((call) => call[1])).toEqual([MAX_PAGE_SIZE, MAX_PAGE_SIZE, 50]);
    expect(fetchPage.mock.calls.map((call) => call[2])).toEqual([undefined, "after-100", "after-200"]);
    expect(result.items).toHaveLength(250);
    expect(result.items[249]).toEqual({ key: "K-250" });
    expect(result.hasMore).toBe(true);
  });

  it("truncates a page that returns more than requested", async () => {
    const fetchPage = async (): Promise<Page<Item>> => ({ items: items("B-1", "B-2", "B-3"), total: 3 });

    const result = await accumulatePages(fetchPage, "q", 2);

    expect(result.items).toEqual(items("B-1", "B-2"));
    expect(result.totalAvailable).toBe(3);
    expect(result.hasMore).toBe(true);
  });

  it("stops on an empty page even when a cursor comes back", async () => {
    const fetchPage = vi.fn(async (): Promise<Page<Item>> => ({ items: [], total: 0, nextCursor: "again" }));

    const result = await accumulatePages(fetchPage, "q", 5);

    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(result.items).toEqual([]);
    expect(result.hasMore).toBe(true);
  });

  it("keeps the last reported total when a page omits it", async () => {
    const fetchPage = async (_query: string, _maxCount: number, cursor?: string): Promise<Page<Item>> =>
      cursor ? { items: items("C-3") } : { items: items("C-1", "C-2"), total: 4, nextCursor: "c" };

    const result = await accumulatePages(fetchPage, "q", 10);

    expect(result.items).toHaveLength(3);
    expect(result.totalAvailable).toBe(4);
    expect(result.hasMore).toBe(true);
  });

  it("discards partial results when a later page fails", async () => {
    const fetchPage = async (_query: string, _maxCount: number, cursor?: string): Promise<Page<Item>> => {
      if (cursor) {
        throw new Error("socket hang up");
      }
      return { items: items("D-1"), total: 2, nextCursor: "d" };
    };

    await expect(accumulatePages(fetchPage, "q", 2)).rejects.toThrow(TransportError);
    await expect(accumulatePages(fetchPage, "q", 2)).rejects.toThrow("page fetch failed: socket hang up");
  });

  it("passes transport errors through unchanged", async () => {
    const failure = new TransportError("jira api error (502 Bad Gateway): upstream", 502);
    const fetchPage = async (): Promise<Page<Item>> => {
      throw failure;
    };

    await expect(accumulatePages(fetchPage, "q", 1)).rejects.toBe(failure);
  });

  it("rejects a non-positive limit", async () => {
    const fetchPage = vi.fn(async (): Promise<Page<Item>> => ({ items: [] }));

    await expect(accumulatePages(fetchPage, "q", 0)).rejects.toThrow(CliError);
    expect(fetchPage).not.toHaveBeenCalled();
  });
});
