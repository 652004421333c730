/**
 * pagewise - Constants
 * All default values in one place
 */

// =============================================================================
// Logging
// =============================================================================

/** Prefix of every console message */
export const LOG_PREFIX = "[pagewise]";

// =============================================================================
// Paginated Collection
// =============================================================================

/**
 * Default distance to the end of the collection under which an element
 * asks for a prefetch when it appears (1 = the last element)
 */
export const DEFAULT_PREFETCH_DISTANCE = 1;

/** Default number of offscreen elements kept ahead by infinite scroll */
export const DEFAULT_OFFSCREEN_ELEMENT_COUNT = 1;

// =============================================================================
// Fetched Results
// =============================================================================

/** Default number of elements per page */
export const DEFAULT_PAGE_SIZE = 50;

/** Default number of pages kept prefetched around the last accessed index */
export const DEFAULT_ADJACENT_PAGE_COUNT = 20;

/** Default maximum number of cached pages (0 = unbounded) */
export const DEFAULT_CACHED_PAGE_COUNT_LIMIT = 0;

/** Default number of concurrent background reads */
export const DEFAULT_MAX_CONCURRENT_READS = 1;
