import { CliError, TransportError } from "../errors.js";

/** Upper bound on a single upstream call, however large the requested limit. */
export const MAX_PAGE_SIZE = 100;

export type Page<T> = {
  items: T[];
  /** Server-reported total; absent when the endpoint does not report one. */
  total?: number;
  nextCursor?: string;
};

export type PageFetcher<T> = (query: string, maxCount: number, cursor?: string) => Promise<Page<T>>;

export type PageResult<T> = {
  readonly items: readonly T[];
  readonly totalAvailable: number;
  readonly hasMore: boolean;
};

/**
 * Fetches pages one after another until `requestedLimit` items are collected
 * or the source runs dry. Each request depends on the previous cursor, so the
 * loop is strictly sequential.
 *
 * `total` is a hint: a pending cursor always means more items, whatever the
 * last reported total says.
 */
export async function accumulatePages<T>(
  fetchPage: PageFetcher<T>,
  query: string,
  requestedLimit: number
): Promise<PageResult<T>> {
  if (!Number.isSafeInteger(requestedLimit) || requestedLimit <= 0) {
    throw new CliError(`limit must be a positive integer, got: ${requestedLimit}`);
  }

  const accumulated: T[] = [];
  let total = 0;
  let cursor: string | undefined;

  while (accumulated.length < requestedLimit) {
    const maxCount = Math.min(requestedLimit - accumulated.length, MAX_PAGE_SIZE);
    const page = await fetchOnePage(fetchPage, query, maxCount, cursor);

    if (page.total !== undefined) {
      total = page.total;
    }
    accumulated.push(...page.items);
    cursor = page.nextCursor ? page.nextCursor : undefined;

    if (page.items.length === 0 || !cursor) {
      break;
    }
  }

  const items = accumulated.length > requestedLimit ? accumulated.slice(0, requestedLimit) : accumulated;
  return {
    items,
    totalAvailable: total,
    hasMore: cursor !== undefined || items.length < total,
  };
}

async function fetchOnePage<T>(
  fetchPage: PageFetcher<T>,
  query: string,
  maxCount: number,
  cursor: string | undefined
): Promise<Page<T>> {
  try {
    return await fetchPage(query, maxCount, cursor);
  } catch (error) {
    if (error instanceof CliError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError(`page fetch failed: ${reason}`, undefined, error);
  }
}
