/**
 * pagewise - Fetched Domain
 * Windowed random-access results over a row fetcher
 */

export {
  createFetchedResults,
  type FetchedResults,
  type FetchedResultsConfig,
  type FetchedResultsStats,
} from "./results";

export { createPageCache, type PageCache, type PageCacheConfig } from "./cache";

export {
  createFetchQueue,
  type FetchQueue,
  type FetchQueueConfig,
  type FetchQueueStats,
  type FetchTask,
  type FetchTaskRun,
  type FetchTaskStatus,
  type ScheduleOptions,
} from "./queue";

export { prefetchWindow } from "./window";
