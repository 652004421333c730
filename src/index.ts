/**
 * pagewise - Client-side pagination
 * Paginated results over page sources, and windowed random access over huge datasets
 *
 * @packageDocumentation
 */

// Paginated results
export {
  createPaginatedResults,
  createPageLoader,
  createOffsetPageSource,
  minimumElementCount,
  noPrefetch,
  infiniteScroll,
  firstPage,
} from "./pagination";

export type {
  PaginatedResults,
  PaginatedResultsConfig,
  PaginatedResultsEvents,
  PaginatedResultsState,
  PageLoader,
  PageLoaderConfig,
  PageStatus,
  LoadedPage,
  PrefetchStrategy,
  InfiniteScrollOptions,
  OffsetPageSourceConfig,
} from "./pagination";

// Collection
export {
  createPaginatedCollection,
  byId,
  applyAppendStrategy,
  customAppend,
} from "./collection";

export type {
  PaginatedCollection,
  PaginatedCollectionConfig,
  AppendStrategy,
  CustomAppendFn,
  CustomAppendStrategy,
} from "./collection";

// Fetched results
export {
  createFetchedResults,
  createPageCache,
  createFetchQueue,
  prefetchWindow,
} from "./fetched";

export type {
  FetchedResults,
  FetchedResultsConfig,
  FetchedResultsStats,
  PageCache,
  PageCacheConfig,
  FetchQueue,
  FetchQueueConfig,
  FetchQueueStats,
  FetchTask,
  FetchTaskRun,
  FetchTaskStatus,
  ScheduleOptions,
} from "./fetched";

// Errors
export {
  CancellationError,
  PaginationError,
  FetchNextPageError,
  RefreshError,
  RemoveAllAndRefreshError,
  createPaginationError,
  isCancellation,
  isPaginationError,
} from "./errors";

// Events
export { createPublisher, type Publisher, type PublisherConfig } from "./events";

// Core Types
export type {
  // Pages
  Page,
  PageSource,
  PageRequestOptions,
  PageKeyFn,

  // Row fetchers
  RowWindow,
  RowReadOptions,
  AsyncRowFetcher,
  RowFetcher,

  // Pagination
  PaginationState,
  PaginationAction,
  IdFn,
  PaginatedElement,
  Identifiable,

  // Events
  EventMap,
  EventHandler,
  Unsubscribe,
} from "./types";
