import type { Connection } from "./types";

// GitHub's maximum page size for connection fields
export const PAGE_SIZE = 100;

export type PageFetcher<T> = (cursor: string | null) => Promise<Connection<T>>;

export interface CollectPagesOptions {
  /** Stop once this many items have been collected and cut the result to it. */
  limit?: number;
}

/**
 * Walks a cursor-paginated connection until `hasNextPage` is false.
 *
 * Pages are requested one after another and their nodes appended in the order
 * received. With a `limit`, no further page is requested once the accumulated
 * count reaches it, and the result is the first `limit` items.
 */
export async function collectPages<T>(
  fetchPage: PageFetcher<T>,
  options: CollectPagesOptions = {}
): Promise<T[]> {
  const { limit } = options;
  const items: T[] = [];
  let cursor: string | null = null;

  while (limit === undefined || items.length < limit) {
    const page = await fetchPage(cursor);
    items.push(...page.nodes);

    // A null cursor would restart from the first page.
    if (!page.pageInfo.hasNextPage || page.pageInfo.endCursor === null) break;
    cursor = page.pageInfo.endCursor;
  }

  return limit === undefined ? items : items.slice(0, limit);
}
