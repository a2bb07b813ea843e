/**
 * Generic cursor pagination for APIs that hand back the next cursor with
 * every page. Pages are fetched strictly one after another since each
 * request needs the previous response's cursor.
 */

export interface PageResult<T, C> {
  items: T[];
  /** Cursor to send with the next request */
  nextCursor: C;
  /** Server flag; pagination stops once this is false */
  hasMore: boolean;
}

export interface PageProgress {
  /** 1-based number of the page just fetched */
  page: number;
  /** Items collected so far, including this page */
  collected: number;
}

interface PaginateOptions<T, C> {
  /**
   * Function to fetch a single page of items.
   * @param cursor - Cursor for this page (initialCursor for the first page)
   */
  fetchPage: (cursor: C) => Promise<PageResult<T, C>>;

  /**
   * Cursor sent with the first request
   */
  initialCursor: C;

  /**
   * Called after each page has been appended
   */
  onPage?: (progress: PageProgress) => void;
}

/**
 * Paginate through API responses until the server reports no more pages.
 * Empty pages do not end pagination; only hasMore does.
 *
 * @returns All items, concatenated in page order
 * @throws Error if any page fetch fails (no partial results)
 */
export async function paginate<T, C>(
  options: PaginateOptions<T, C>,
): Promise<T[]> {
  const { fetchPage, initialCursor, onPage } = options;

  const collected: T[] = [];
  let cursor = initialCursor;
  let hasMore = true;
  let page = 0;

  while (hasMore) {
    const response = await fetchPage(cursor);

    collected.push(...response.items);
    cursor = response.nextCursor;
    hasMore = response.hasMore;
    page += 1;

    onPage?.({ page, collected: collected.length });
  }

  return collected;
}
