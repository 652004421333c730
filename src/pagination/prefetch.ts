/**
 * pagewise - Prefetch Strategies
 * Stateless decisions about when to fetch a page before it is asked for
 */

import { DEFAULT_OFFSCREEN_ELEMENT_COUNT } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** Controls how paginated results prefetch pages */
export interface PrefetchStrategy {
  /** Whether the first page is fetched on creation */
  needsInitialPrefetch: () => boolean;

  /** Whether another page is fetched right after a page was merged */
  needsPrefetchAfterPageLoaded: (elementCount: number) => boolean;

  /** Whether the element at `index` triggers a fetch when it appears */
  needsPrefetchOnElementAppear: (index: number, elementCount: number) => boolean;
}

// =============================================================================
// Top (minimum element count)
// =============================================================================

/**
 * Prefetches pages until at least `count` elements are loaded.
 * Further pages are only fetched on demand.
 */
export const minimumElementCount = (count: number): PrefetchStrategy => ({
  needsInitialPrefetch: () => count > 0,
  needsPrefetchAfterPageLoaded: (elementCount) => elementCount < count,
  needsPrefetchOnElementAppear: () => false,
});

/** Never prefetches */
export const noPrefetch = (): PrefetchStrategy => minimumElementCount(0);

// =============================================================================
// Bottom (infinite scroll)
// =============================================================================

export interface InfiniteScrollOptions {
  /** Elements kept loaded below the last visible one (default: 1) */
  offscreenElementCount?: number;
}

/**
 * Infinite scroll: fetches the first page, then a new page whenever an
 * element closer than `offscreenElementCount` to the end appears.
 */
export const infiniteScroll = (
  options: InfiniteScrollOptions = {},
): PrefetchStrategy => {
  const { offscreenElementCount = DEFAULT_OFFSCREEN_ELEMENT_COUNT } = options;

  return {
    needsInitialPrefetch: () => true,
    needsPrefetchAfterPageLoaded: () => false,
    needsPrefetchOnElementAppear: (index, elementCount) =>
      elementCount - index <= offscreenElementCount,
  };
};

/** Only prefetches the first page */
export const firstPage = (): PrefetchStrategy =>
  infiniteScroll({ offscreenElementCount: 0 });
