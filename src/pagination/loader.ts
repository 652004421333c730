/**
 * pagewise - Page Loader
 * Schedules page fetches: one in-flight request per page identifier
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[pagewise:loader]", ...args);
};

import type { Page, PageKeyFn, PageSource } from "../types";
import { CancellationError } from "../errors";

// =============================================================================
// Types
// =============================================================================

/** A page as seen by the paginated results (the page identifier is hidden) */
export interface LoadedPage<T> {
  elements: T[];
  hasNextPage: boolean;
}

/** Fetch state of a page identifier (absent = idle) */
export type PageStatus = "idle" | "loading" | "loaded";

type PageState<T> =
  | {
      status: "loading";
      controller: AbortController;
      promise: Promise<LoadedPage<T>>;
    }
  | { status: "loaded" };

/** Page loader configuration */
export interface PageLoaderConfig<PageID> {
  /** Map key of a page identifier (default: the identifier itself) */
  pageKey?: PageKeyFn<PageID>;
}

/** Page loader instance */
export interface PageLoader<T, PageID> {
  /**
   * Fetch the page after the last loaded one (the first page initially).
   * Cancels a refresh in progress. Resolves undefined when that page is
   * already loaded.
   */
  fetchNextPage: () => Promise<LoadedPage<T> | undefined>;

  /**
   * Fetch the first page. Loaded pages and the next page identifier are
   * forgotten only once it arrives; a failed or cancelled refresh leaves
   * them as they were.
   */
  refresh: () => Promise<LoadedPage<T> | undefined>;

  /** Whether some page is being fetched */
  isLoading: () => boolean;

  getPageStatus: (pageIdentifier: PageID) => PageStatus;

  getNextPageIdentifier: () => PageID | undefined;

  /** Abort every fetch in progress and forget every page */
  cancelAll: () => void;
}

// =============================================================================
// Implementation
// =============================================================================

export const createPageLoader = <T, PageID>(
  source: PageSource<T, PageID>,
  config: PageLoaderConfig<PageID> = {},
): PageLoader<T, PageID> => {
  const { pageKey = (pageIdentifier: PageID): unknown => pageIdentifier } = config;

  const pageStates = new Map<unknown, PageState<T>>();
  let nextPageIdentifier: PageID | undefined;

  // The refresh in flight, kept apart from pageStates until it succeeds
  let refreshController: AbortController | undefined;
  let refreshGeneration = 0;

  const isLoading = (): boolean => {
    if (refreshController !== undefined) return true;
    for (const state of pageStates.values()) {
      if (state.status === "loading") return true;
    }
    return false;
  };

  const getPageStatus = (pageIdentifier: PageID): PageStatus =>
    pageStates.get(pageKey(pageIdentifier))?.status ?? "idle";

  const cancelRefresh = (): void => {
    refreshGeneration += 1;
    refreshController?.abort();
    refreshController = undefined;
  };

  const abortLoads = (): void => {
    for (const [key, state] of pageStates) {
      if (state.status === "loading") {
        state.controller.abort();
        pageStates.delete(key);
      }
    }
  };

  const cancelAll = (): void => {
    cancelRefresh();
    abortLoads();
    pageStates.clear();
    nextPageIdentifier = undefined;
  };

  const toLoadedPage = (page: Page<T, PageID>): LoadedPage<T> => ({
    elements: page.elements,
    hasNextPage: page.nextPageIdentifier !== undefined,
  });

  /**
   * Start (or join) the fetch of a page.
   * State checks and updates run synchronously, so concurrent callers
   * never start two requests for the same key.
   */
  const fetchPage = (
    pageIdentifier: PageID | undefined,
  ): Promise<LoadedPage<T> | undefined> => {
    if (pageIdentifier === undefined) {
      nextPageIdentifier = undefined;
      return Promise.resolve({ elements: [], hasNextPage: false });
    }

    const key = pageKey(pageIdentifier);
    const existing = pageStates.get(key);

    if (existing?.status === "loaded") {
      log("already loaded", pageIdentifier);
      return Promise.resolve(undefined);
    }

    if (existing?.status === "loading") {
      log("joining", pageIdentifier);
      return existing.promise;
    }

    const controller = new AbortController();
    const { signal } = controller;

    const ownsKey = (): boolean => {
      const state = pageStates.get(key);
      return state?.status === "loading" && state.controller === controller;
    };

    // The source is invoked on the next microtask, after the state is set
    const promise = Promise.resolve()
      .then(() => {
        if (signal.aborted) throw new CancellationError();
        log("fetching", pageIdentifier);
        return source.page(pageIdentifier, { signal });
      })
      .then(
        (page): LoadedPage<T> => {
          if (signal.aborted || !ownsKey()) {
            throw new CancellationError();
          }
          pageStates.set(key, { status: "loaded" });
          nextPageIdentifier = page.nextPageIdentifier;
          return toLoadedPage(page);
        },
        (error: unknown) => {
          if (ownsKey()) {
            pageStates.delete(key);
          }
          if (signal.aborted) {
            throw new CancellationError();
          }
          log("failed", pageIdentifier, error);
          throw error;
        },
      );

    pageStates.set(key, { status: "loading", controller, promise });
    return promise;
  };

  const fetchNextPage = async (): Promise<LoadedPage<T> | undefined> => {
    cancelRefresh();
    const pageIdentifier =
      nextPageIdentifier ?? (await source.firstPageIdentifier());
    return fetchPage(pageIdentifier);
  };

  const refresh = async (): Promise<LoadedPage<T> | undefined> => {
    cancelRefresh();
    abortLoads();
    const generation = refreshGeneration;

    const pageIdentifier = await source.firstPageIdentifier();
    if (generation !== refreshGeneration) {
      throw new CancellationError();
    }

    const commit = (): void => {
      abortLoads();
      pageStates.clear();
    };

    if (pageIdentifier === undefined) {
      commit();
      nextPageIdentifier = undefined;
      return { elements: [], hasNextPage: false };
    }

    const controller = new AbortController();
    const { signal } = controller;
    refreshController = controller;

    const isCurrent = (): boolean => refreshController === controller;

    try {
      log("refreshing", pageIdentifier);
      const page = await source.page(pageIdentifier, { signal });
      if (signal.aborted || !isCurrent()) {
        throw new CancellationError();
      }

      commit();
      pageStates.set(pageKey(pageIdentifier), { status: "loaded" });
      nextPageIdentifier = page.nextPageIdentifier;
      return toLoadedPage(page);
    } catch (error) {
      if (signal.aborted) {
        throw new CancellationError();
      }
      log("refresh failed", error);
      throw error;
    } finally {
      if (isCurrent()) {
        refreshController = undefined;
      }
    }
  };

  return {
    fetchNextPage,
    refresh,
    isLoading,
    getPageStatus,
    getNextPageIdentifier: () => nextPageIdentifier,
    cancelAll,
  };
};
