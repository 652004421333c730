/**
 * pagewise - Fetched Results
 * A huge dataset presented as a flat random-access sequence
 *
 * Elements are fetched by pages of `pageSize`, kept in an LRU page cache, and
 * the pages around the last accessed element are prefetched in the
 * background. Reading an element whose page is missing blocks: background
 * work is cancelled and the page is read synchronously.
 *
 * ```ts
 * const players = await createFetchedResults(playerRows, { pageSize: 100 })
 * for (let i = 0; i < players.count; i++) render(players.get(i))
 * ```
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[pagewise:fetched]", ...args);
};

import type { RowFetcher, RowWindow } from "../types";
import {
  DEFAULT_ADJACENT_PAGE_COUNT,
  DEFAULT_CACHED_PAGE_COUNT_LIMIT,
  DEFAULT_MAX_CONCURRENT_READS,
  DEFAULT_PAGE_SIZE,
  LOG_PREFIX,
} from "../constants";
import { createPageCache } from "./cache";
import { createFetchQueue, type FetchTask } from "./queue";
import { prefetchWindow } from "./window";

// =============================================================================
// Types
// =============================================================================

/** Fetched results configuration */
export interface FetchedResultsConfig<T> {
  /** Number of elements per page (default: 50) */
  pageSize?: number;

  /** Number of pages prefetched around the accessed element (default: 20) */
  adjacentPageCount?: number;

  /** Maximum number of cached pages, 0 for no limit (default: 0) */
  cachedPageCountLimit?: number;

  /** Callback when a page is fetched, in the background or not */
  onPageLoaded?: (pageIndex: number, elements: readonly T[]) => void;

  /** Callback when a background prefetch fails (default: logged) */
  onPrefetchError?: (error: unknown, pageIndex: number) => void;
}

export interface FetchedResultsStats {
  count: number;
  pageSize: number;
  pageCount: number;

  /** Pages in the LRU cache */
  cachedPages: number;

  /** Pages of the current prefetch window, scheduled or fetched */
  trackedPages: number;

  /** Pages of the current prefetch window not fetched yet */
  scheduledPages: number;
}

/** Fetched results instance */
export interface FetchedResults<T> {
  /** Number of elements */
  readonly count: number;
  readonly pageSize: number;
  readonly pageCount: number;

  /**
   * Element at index. Reads its page synchronously when it is not
   * cached; throws if that read fails.
   */
  get: (index: number) => T;

  /** Elements from `start` (inclusive) to `end` (exclusive) */
  slice: (start?: number, end?: number) => T[];

  isPageCached: (pageIndex: number) => boolean;

  /** Page indexes of the current prefetch window, scheduled or fetched */
  getTrackedPageIndexes: () => number[];

  getStats: () => FetchedResultsStats;

  /** Cancel background work and drop cached pages */
  destroy: () => void;
}

type TrackedPage<T> =
  | { status: "scheduled"; task: FetchTask }
  | { status: "fetched"; elements: readonly T[] };

// =============================================================================
// Implementation
// =============================================================================

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
};

/**
 * Create fetched results. The total count is read once, now.
 */
export const createFetchedResults = async <T>(
  fetcher: RowFetcher<T>,
  config: FetchedResultsConfig<T> = {},
): Promise<FetchedResults<T>> => {
  const {
    pageSize = DEFAULT_PAGE_SIZE,
    adjacentPageCount = DEFAULT_ADJACENT_PAGE_COUNT,
    cachedPageCountLimit = DEFAULT_CACHED_PAGE_COUNT_LIMIT,
    onPageLoaded,
    onPrefetchError = (error: unknown, pageIndex: number): void => {
      console.error(`${LOG_PREFIX} Prefetch of page ${pageIndex} failed:`, error);
    },
  } = config;

  assertPositiveInteger("pageSize", pageSize);
  assertPositiveInteger("adjacentPageCount", adjacentPageCount);

  const count = await fetcher.count();
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }

  const pageCount = Math.ceil(count / pageSize);
  const cache = createPageCache<readonly T[]>({ capacity: cachedPageCountLimit });
  const queue = createFetchQueue({
    concurrency: fetcher.maxConcurrentReads ?? DEFAULT_MAX_CONCURRENT_READS,
    onTaskError: (error, task) => log(`task ${task.id} failed`, error),
  });

  // Fetch state of the pages of the current prefetch window
  const trackedPages = new Map<number, TrackedPage<T>>();

  // True until the first prefetch
  let needsInitialPrefetch = true;
  let isDestroyed = false;

  // ==========================================================================
  // Pages
  // ==========================================================================

  const pageIndexOf = (index: number): number => Math.floor(index / pageSize);

  const windowOf = (pageIndex: number): RowWindow => ({
    offset: pageIndex * pageSize,
    limit: pageSize,
  });

  const getPage = (pageIndex: number): readonly T[] | undefined => {
    const cached = cache.get(pageIndex);
    if (cached) return cached;

    const tracked = trackedPages.get(pageIndex);
    if (tracked?.status === "fetched") return tracked.elements;

    return undefined;
  };

  const setPage = (pageIndex: number, elements: readonly T[]): void => {
    trackedPages.set(pageIndex, { status: "fetched", elements });
    cache.set(pageIndex, elements);
    onPageLoaded?.(pageIndex, elements);
  };

  const elementOf = (
    elements: readonly T[],
    pageIndex: number,
    elementIndex: number,
  ): T => {
    const element = elements[elementIndex];
    if (element === undefined) {
      throw new RangeError(
        `Page ${pageIndex} holds ${elements.length} elements, element ${elementIndex} is missing`,
      );
    }
    return element;
  };

  // ==========================================================================
  // Prefetching
  // ==========================================================================

  const prefetchPage = async (
    pageIndex: number,
    signal: AbortSignal,
  ): Promise<void> => {
    const isTracked = (): boolean => {
      const tracked = trackedPages.get(pageIndex);
      return tracked?.status === "scheduled" && tracked.task.signal === signal;
    };

    try {
      const elements = await fetcher.read(windowOf(pageIndex), { signal });
      if (signal.aborted) return;

      log("did prefetch", pageIndex);
      cache.set(pageIndex, elements);
      if (isTracked()) {
        trackedPages.set(pageIndex, { status: "fetched", elements });
      }
      onPageLoaded?.(pageIndex, elements);
    } catch (error) {
      if (signal.aborted) throw error;

      // A later access retries
      if (isTracked()) {
        trackedPages.delete(pageIndex);
      }
      onPrefetchError(error, pageIndex);
      throw error;
    }
  };

  /**
   * Schedule the pages in the order of `pageIndexes`. With a single reader,
   * each fetch waits for the previous one so that pages arrive in order.
   */
  const prefetchPages = (pageIndexes: readonly number[]): void => {
    const serial = queue.concurrency === 1;
    let previous: FetchTask | undefined;

    for (const pageIndex of pageIndexes) {
      if (trackedPages.has(pageIndex)) {
        // Already fetched or scheduled
        continue;
      }

      const cached = cache.get(pageIndex);
      if (cached) {
        trackedPages.set(pageIndex, { status: "fetched", elements: cached });
        continue;
      }

      log("prefetch", pageIndex);
      const task = queue.schedule((signal) => prefetchPage(pageIndex, signal), {
        after: serial ? previous : undefined,
      });
      trackedPages.set(pageIndex, { status: "scheduled", task });
      previous = task;
    }
  };

  const prefetchAround = (index: number): void => {
    if (isDestroyed) return;
    needsInitialPrefetch = false;

    const pageIndexes = prefetchWindow(pageIndexOf(index), pageCount, adjacentPageCount);
    const wanted = new Set(pageIndexes);

    // Abandon pages outside the window; the LRU cache keeps what it keeps
    for (const [pageIndex, tracked] of trackedPages) {
      if (!wanted.has(pageIndex)) {
        if (tracked.status === "scheduled") {
          tracked.task.cancel();
        }
        trackedPages.delete(pageIndex);
      }
    }

    prefetchPages(pageIndexes);
  };

  /** Fetching a missing page has the highest priority */
  const cancelPrefetches = (): void => {
    queue.cancelAll();
    for (const [pageIndex, tracked] of trackedPages) {
      if (tracked.status === "scheduled") {
        trackedPages.delete(pageIndex);
      }
    }
    fetcher.interrupt?.();
  };

  // ==========================================================================
  // Access
  // ==========================================================================

  const get = (index: number): T => {
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      throw new RangeError(`Index ${index} is out of bounds [0, ${count})`);
    }

    const pageIndex = pageIndexOf(index);
    const elementIndex = index - pageIndex * pageSize;

    const page = getPage(pageIndex);
    if (page) {
      if (needsInitialPrefetch || elementIndex === 0) {
        prefetchAround(index);
      }
      return elementOf(page, pageIndex, elementIndex);
    }

    log("block", pageIndex);
    cancelPrefetches();
    const elements = fetcher.readSync(windowOf(pageIndex));
    setPage(pageIndex, elements);
    prefetchAround(index);

    return elementOf(elements, pageIndex, elementIndex);
  };

  const slice = (start = 0, end = count): T[] => {
    const from = Math.max(0, Math.min(start, count));
    const to = Math.max(from, Math.min(end, count));
    const result: T[] = [];
    for (let index = from; index < to; index++) {
      result.push(get(index));
    }
    return result;
  };

  // ==========================================================================
  // Statistics & Lifecycle
  // ==========================================================================

  const getStats = (): FetchedResultsStats => {
    let scheduledPages = 0;
    for (const tracked of trackedPages.values()) {
      if (tracked.status === "scheduled") scheduledPages++;
    }
    return {
      count,
      pageSize,
      pageCount,
      cachedPages: cache.size,
      trackedPages: trackedPages.size,
      scheduledPages,
    };
  };

  const destroy = (): void => {
    isDestroyed = true;
    queue.cancelAll();
    trackedPages.clear();
    cache.clear();
  };

  return {
    count,
    pageSize,
    pageCount,
    get,
    slice,
    isPageCached: (pageIndex) => cache.has(pageIndex),
    getTrackedPageIndexes: () => Array.from(trackedPages.keys()),
    getStats,
    destroy,
  };
};
