/**
 * pagewise - Core Types
 * Page sources, row fetchers, and the event contract shared by every module
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Pages
// =============================================================================

/** A batch of elements plus the token of the batch that follows */
export interface Page<T, PageID> {
  /** Elements of the page, in order */
  elements: T[];

  /** Identifier of the next page, undefined at the end of the dataset */
  nextPageIdentifier?: PageID | undefined;
}

/** Options passed to every page request */
export interface PageRequestOptions {
  /** Aborted when the request is no longer needed (refresh, destroy) */
  signal: AbortSignal;
}

/**
 * A source of pages, fetched one after the other.
 *
 * Page identifiers are opaque to the library: an offset, a cursor string,
 * anything the source understands.
 */
export interface PageSource<T, PageID> {
  /** Identifier of the first page, undefined when there is no page at all */
  firstPageIdentifier: () => PageID | undefined | Promise<PageID | undefined>;

  /** Fetch the page at the given identifier */
  page: (
    pageIdentifier: PageID,
    options: PageRequestOptions,
  ) => Promise<Page<T, PageID>>;
}

/** Derives the map key of a page identifier (object cursors, mostly) */
export type PageKeyFn<PageID> = (pageIdentifier: PageID) => unknown;

// =============================================================================
// Row Fetchers
// =============================================================================

/** A contiguous window of rows */
export interface RowWindow {
  /** Starting offset */
  offset: number;

  /** Number of rows to fetch */
  limit: number;
}

/** Options passed to asynchronous row reads */
export interface RowReadOptions {
  /** Aborted when the read is cancelled */
  signal: AbortSignal;
}

/** Asynchronous access to an offset-addressable dataset */
export interface AsyncRowFetcher<T> {
  /** Total number of rows */
  count: () => number | Promise<number>;

  /** Rows of a window (fewer at the end of the dataset) */
  read: (window: RowWindow, options: RowReadOptions) => Promise<T[]>;
}

/**
 * Row access for fetched results: asynchronous reads for background
 * prefetch, a synchronous read for the cache-miss path.
 */
export interface RowFetcher<T> extends AsyncRowFetcher<T> {
  /** Rows of a window, read synchronously (may block the caller) */
  readSync: (window: RowWindow) => T[];

  /** Interrupt every read in progress */
  interrupt?: () => void;

  /** Number of reads the underlying store serves at once (default: 1) */
  readonly maxConcurrentReads?: number;
}

// =============================================================================
// Pagination
// =============================================================================

/** Pagination state of a paginated results */
export type PaginationState = "notCompleted" | "fetchingNextPage" | "completed";

/** Operations that can fail and be retried */
export type PaginationAction = "fetchNextPage" | "refresh" | "removeAllAndRefresh";

/** Extracts the identity of an element */
export type IdFn<T, ID> = (element: T) => ID;

/** An element read from a paginated collection */
export interface PaginatedElement<T, ID> {
  /** Identity of the value */
  id: ID;

  /** The value */
  value: T;

  /** Whether a page should be prefetched when this element appears on screen */
  needsPrefetchOnAppear: boolean;
}

/** Any element carrying its own `id` */
export interface Identifiable<ID = unknown> {
  id: ID;
}
