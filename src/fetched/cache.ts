/**
 * pagewise - Page Cache
 * Least-recently-used storage of fetched pages
 */

// =============================================================================
// Types
// =============================================================================

/** Configuration for the page cache */
export interface PageCacheConfig<V> {
  /** Maximum number of pages kept (0 = unbounded) */
  capacity: number;

  /** Callback when a page is evicted to respect the capacity */
  onEvict?: (pageIndex: number, page: V) => void;
}

/** Page cache instance */
export interface PageCache<V> {
  readonly capacity: number;

  /** Number of cached pages */
  readonly size: number;

  /** Get a page and mark it as recently used */
  get: (pageIndex: number) => V | undefined;

  /** Get a page without touching its recency */
  peek: (pageIndex: number) => V | undefined;

  /** Store a page as the most recently used, then evict down to capacity */
  set: (pageIndex: number, page: V) => void;

  has: (pageIndex: number) => boolean;

  delete: (pageIndex: number) => boolean;

  /** Cached page indexes, least recently used first */
  keys: () => number[];

  clear: () => void;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create an LRU page cache.
 * Recency is the insertion order of the backing map: a hit moves the entry
 * to the end, eviction takes from the front.
 */
export const createPageCache = <V>(config: PageCacheConfig<V>): PageCache<V> => {
  const { capacity, onEvict } = config;

  if (!Number.isInteger(capacity) || capacity < 0) {
    throw new RangeError(`capacity must be a non-negative integer, got ${capacity}`);
  }

  const pages = new Map<number, V>();

  const evictToCapacity = (): void => {
    if (capacity === 0) return;

    while (pages.size > capacity) {
      const oldest = pages.entries().next();
      if (oldest.done) break;

      const [pageIndex, page] = oldest.value;
      pages.delete(pageIndex);
      onEvict?.(pageIndex, page);
    }
  };

  const get = (pageIndex: number): V | undefined => {
    const page = pages.get(pageIndex);
    if (page !== undefined) {
      pages.delete(pageIndex);
      pages.set(pageIndex, page);
    }
    return page;
  };

  const set = (pageIndex: number, page: V): void => {
    pages.delete(pageIndex);
    pages.set(pageIndex, page);
    evictToCapacity();
  };

  return {
    capacity,
    get size() {
      return pages.size;
    },
    get,
    peek: (pageIndex) => pages.get(pageIndex),
    set,
    has: (pageIndex) => pages.has(pageIndex),
    delete: (pageIndex) => pages.delete(pageIndex),
    keys: () => Array.from(pages.keys()),
    clear: () => pages.clear(),
  };
};
