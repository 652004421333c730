/**
 * pagewise - Pagination Domain
 * Page loading, prefetch strategies and the paginated results state machine
 */

export {
  createPaginatedResults,
  type PaginatedResults,
  type PaginatedResultsConfig,
  type PaginatedResultsEvents,
  type PaginatedResultsState,
} from "./results";

export {
  createPageLoader,
  type PageLoader,
  type PageLoaderConfig,
  type PageStatus,
  type LoadedPage,
} from "./loader";

export {
  minimumElementCount,
  noPrefetch,
  infiniteScroll,
  firstPage,
  type PrefetchStrategy,
  type InfiniteScrollOptions,
} from "./prefetch";

export { createOffsetPageSource, type OffsetPageSourceConfig } from "./source";
