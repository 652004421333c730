/**
 * pagewise - Offset Page Source
 * Pages of an offset-addressable dataset, identified by their offset
 */

import type { AsyncRowFetcher, Page, PageSource } from "../types";
import { DEFAULT_PAGE_SIZE } from "../constants";

export interface OffsetPageSourceConfig {
  /** Maximum number of elements in a page (default: 50) */
  pageSize?: number;
}

/**
 * Create a page source whose page identifiers are row offsets.
 *
 * The total count is read once, on the first page request, and decides
 * where the dataset ends.
 */
export const createOffsetPageSource = <T>(
  fetcher: AsyncRowFetcher<T>,
  config: OffsetPageSourceConfig = {},
): PageSource<T, number> => {
  const { pageSize = DEFAULT_PAGE_SIZE } = config;

  if (!Number.isInteger(pageSize) || pageSize <= 0) {
    throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
  }

  let totalCount: Promise<number> | undefined;

  const getTotalCount = (): Promise<number> => {
    if (!totalCount) {
      const pending = Promise.resolve().then(() => fetcher.count());
      totalCount = pending;
      // A failed count is read again next time
      void pending.catch(() => {
        if (totalCount === pending) totalCount = undefined;
      });
    }
    return totalCount;
  };

  return {
    firstPageIdentifier: () => 0,

    page: async (offset, { signal }): Promise<Page<T, number>> => {
      const count = await getTotalCount();
      if (offset >= count) {
        return { elements: [] };
      }

      const elements = await fetcher.read({ offset, limit: pageSize }, { signal });
      const nextOffset = offset + pageSize;

      return {
        elements,
        nextPageIdentifier: nextOffset < count ? nextOffset : undefined,
      };
    },
  };
};
