/**
 * pagewise - Paginated Results
 * Observable pagination state machine on top of a page source
 *
 * ```ts
 * const results = createPaginatedResults(playersSource, {
 *   id: (player) => player.id,
 *   prefetchStrategy: infiniteScroll({ offscreenElementCount: 20 }),
 * })
 *
 * results.on('elements:change', () => render(results.elements.toArray()))
 * results.on('state:change', ({ state }) => renderFooter(state))
 * ```
 *
 * Every action supersedes the one in flight. A superseded action resolves
 * without effect and without error.
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[pagewise:results]", ...args);
};

import type {
  EventHandler,
  EventMap,
  IdFn,
  PageKeyFn,
  PageSource,
  PaginatedElement,
  PaginationAction,
  PaginationState,
  Unsubscribe,
} from "../types";
import { createPublisher } from "../events";
import {
  createPaginatedCollection,
  type AppendStrategy,
  type PaginatedCollection,
} from "../collection";
import {
  createPaginationError,
  isCancellation,
  type PaginationError,
} from "../errors";
import { createPageLoader, type LoadedPage } from "./loader";
import { infiniteScroll, type PrefetchStrategy } from "./prefetch";

// =============================================================================
// Types
// =============================================================================

/** Snapshot of the observable state */
export interface PaginatedResultsState {
  paginationState: PaginationState;
  paginationError: PaginationError | undefined;
  isFetchingPage: boolean;
  count: number;
}

/** Events published by paginated results, in the order they happen */
export interface PaginatedResultsEvents extends EventMap {
  /** Pagination state changed */
  "state:change": { state: PaginationState; previous: PaginationState };

  /** An error was recorded or cleared */
  "error:change": { error: PaginationError | undefined };

  /** Elements were merged or removed */
  "elements:change": { count: number };

  /** A fetch started or ended */
  "fetching:change": { isFetchingPage: boolean };
}

/** Paginated results configuration */
export interface PaginatedResultsConfig<T, ID, PageID> {
  /** Extracts the identity of an element */
  id: IdFn<T, ID>;

  /** How new pages are merged (default: updateOrAppend) */
  appendStrategy?: AppendStrategy<T, ID>;

  /** When pages are prefetched (default: infinite scroll, 1 offscreen element) */
  prefetchStrategy?: PrefetchStrategy;

  /** Elements displayed before the first page is fetched */
  initialElements?: readonly T[];

  /** Map key of a page identifier (default: the identifier itself) */
  pageKey?: PageKeyFn<PageID>;

  /** Called after every change of the observable state */
  onStateChange?: (state: PaginatedResultsState) => void;
}

/** Paginated results instance */
export interface PaginatedResults<T, ID> {
  /** The paginated elements */
  readonly elements: PaginatedCollection<T, ID>;

  readonly paginationState: PaginationState;

  /** The error of the last failed action, until an action succeeds */
  readonly paginationError: PaginationError | undefined;

  /** Whether a page is being fetched */
  readonly isFetchingPage: boolean;

  getState: () => PaginatedResultsState;

  /**
   * Fetch the next page.
   * Rejects with the page source error; resolves when superseded.
   */
  fetchNextPage: () => Promise<void>;

  /** Fetch the first page, then replace the elements with it */
  refresh: () => Promise<void>;

  /** Remove all elements now, then fetch the first page */
  removeAllAndRefresh: () => Promise<void>;

  /** Perform again the action that failed with `error` */
  retry: (error: PaginationError) => Promise<void>;

  /**
   * Fetch the next page if idle, complete-able and error-free.
   * Never rejects.
   */
  prefetch: () => Promise<void>;

  /** Call when an element appears on screen */
  prefetchIfNeeded: (element: PaginatedElement<T, ID>) => Promise<void>;

  on: <K extends keyof PaginatedResultsEvents>(
    event: K,
    handler: EventHandler<PaginatedResultsEvents[K]>,
  ) => Unsubscribe;

  off: <K extends keyof PaginatedResultsEvents>(
    event: K,
    handler: EventHandler<PaginatedResultsEvents[K]>,
  ) => void;

  once: <K extends keyof PaginatedResultsEvents>(
    event: K,
    handler: EventHandler<PaginatedResultsEvents[K]>,
  ) => Unsubscribe;

  /** Abort fetches and drop listeners */
  destroy: () => void;
}

// =============================================================================
// Implementation
// =============================================================================

export const createPaginatedResults = <T, ID, PageID>(
  source: PageSource<T, PageID>,
  config: PaginatedResultsConfig<T, ID, PageID>,
): PaginatedResults<T, ID> => {
  const {
    id,
    appendStrategy = "updateOrAppend",
    prefetchStrategy = infiniteScroll(),
    initialElements,
    pageKey,
    onStateChange,
  } = config;

  const loader = createPageLoader<T, PageID>(source, { pageKey });
  const elements = createPaginatedCollection<T, ID>({
    id,
    appendStrategy,
    needsPrefetch: prefetchStrategy.needsPrefetchOnElementAppear,
  });

  let paginationState: PaginationState = "notCompleted";
  let paginationError: PaginationError | undefined;
  let isDestroyed = false;

  // Token of the action in flight; older tokens are superseded
  let taskCounter = 0;
  let activeTask: number | undefined;

  // ==========================================================================
  // State Publication
  // ==========================================================================

  const getState = (): PaginatedResultsState => ({
    paginationState,
    paginationError,
    isFetchingPage: activeTask !== undefined,
    count: elements.count,
  });

  const publisher = createPublisher<PaginatedResultsEvents, PaginatedResultsState>({
    snapshot: getState,
    onSnapshot: onStateChange,
  });

  const setPaginationState = (state: PaginationState): void => {
    if (state === paginationState) return;
    const previous = paginationState;
    paginationState = state;
    publisher.publish("state:change", { state, previous });
  };

  const setPaginationError = (error: PaginationError | undefined): void => {
    if (error === paginationError) return;
    paginationError = error;
    publisher.publish("error:change", { error });
  };

  const elementsDidChange = (): void => {
    publisher.publish("elements:change", { count: elements.count });
  };

  const setActiveTask = (task: number | undefined): void => {
    const wasFetching = activeTask !== undefined;
    activeTask = task;
    const isFetching = activeTask !== undefined;
    if (wasFetching !== isFetching) {
      publisher.publish("fetching:change", { isFetchingPage: isFetching });
    }
  };

  // ==========================================================================
  // Tasks
  // ==========================================================================

  const startTask = (): number => {
    taskCounter += 1;
    setActiveTask(taskCounter);
    return taskCounter;
  };

  const isCurrent = (task: number): boolean => activeTask === task;

  /** The state to come back to if the action fails */
  const restorableState = (): PaginationState =>
    paginationState === "fetchingNextPage" ? "notCompleted" : paginationState;

  const schedulePrefetch = (): void => {
    queueMicrotask(() => {
      void prefetch();
    });
  };

  const pageDidLoad = (page: LoadedPage<T>, replace: boolean): void => {
    setPaginationError(undefined);

    if (replace) {
      elements.removeAll();
    }
    elements.append(page.elements);
    elementsDidChange();

    if (page.hasNextPage) {
      setPaginationState("notCompleted");
      if (prefetchStrategy.needsPrefetchAfterPageLoaded(elements.count)) {
        schedulePrefetch();
      }
    } else {
      setPaginationState("completed");
    }
  };

  /**
   * Run a loader action and apply its outcome, unless superseded.
   */
  const perform = async (
    task: number,
    load: () => Promise<LoadedPage<T> | undefined>,
    options: {
      replace: boolean;
      restoreState: PaginationState;
      action: PaginationAction;
    },
  ): Promise<void> => {
    let page: LoadedPage<T> | undefined;

    try {
      page = await load();
    } catch (error) {
      if (!isCurrent(task)) {
        log("discarding superseded failure", task);
        return;
      }
      setPaginationState(options.restoreState);
      if (!isCancellation(error)) {
        setPaginationError(createPaginationError(options.action, error));
      }
      if (isCurrent(task)) {
        setActiveTask(undefined);
      }

      if (isCancellation(error)) return;
      throw error;
    }

    if (!isCurrent(task)) {
      log("discarding superseded page", task);
      return;
    }

    if (page === undefined) {
      // Page already loaded: nothing new
      setPaginationState(options.restoreState);
    } else {
      pageDidLoad(page, options.replace);
    }

    // A listener may have started another action meanwhile
    if (isCurrent(task)) {
      setActiveTask(undefined);
    }
  };

  // ==========================================================================
  // Actions
  // ==========================================================================

  const fetchNextPage = async (): Promise<void> => {
    if (isDestroyed) return;

    const restoreState = restorableState();
    const task = startTask();
    setPaginationState("fetchingNextPage");

    // Also cancels a refresh in flight: its page is not merged
    await perform(task, loader.fetchNextPage, {
      replace: false,
      restoreState,
      action: "fetchNextPage",
    });
  };

  const refresh = async (): Promise<void> => {
    if (isDestroyed) return;

    const restoreState = restorableState();
    const task = startTask();

    await perform(task, loader.refresh, {
      replace: true,
      restoreState,
      action: "refresh",
    });
  };

  const removeAllAndRefresh = async (): Promise<void> => {
    if (isDestroyed) return;

    const task = startTask();
    elements.removeAll();
    elementsDidChange();
    setPaginationError(undefined);
    setPaginationState("fetchingNextPage");

    // The elements are gone: so are the loaded pages
    const load = (): Promise<LoadedPage<T> | undefined> => {
      loader.cancelAll();
      return loader.refresh();
    };

    await perform(task, load, {
      replace: true,
      restoreState: "notCompleted",
      action: "removeAllAndRefresh",
    });
  };

  const retry = async (error: PaginationError): Promise<void> => {
    switch (error.kind) {
      case "fetchNextPage":
        return fetchNextPage();
      case "refresh":
        return refresh();
      case "removeAllAndRefresh":
        return removeAllAndRefresh();
    }
  };

  const prefetch = async (): Promise<void> => {
    if (isDestroyed) return;

    // Nothing left to fetch
    if (paginationState === "completed") return;

    // A recorded error stops automatic fetches until an action succeeds
    if (paginationError !== undefined) return;

    // Not idle
    if (activeTask !== undefined) return;

    try {
      await fetchNextPage();
    } catch (error) {
      // Already recorded in paginationError
      log("prefetch failed", error);
    }
  };

  const prefetchIfNeeded = async (
    element: PaginatedElement<T, ID>,
  ): Promise<void> => {
    if (element.needsPrefetchOnAppear) {
      await prefetch();
    }
  };

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;
    setActiveTask(undefined);
    loader.cancelAll();
    publisher.clear();
  };

  // ==========================================================================
  // Initialization
  // ==========================================================================

  if (initialElements && initialElements.length > 0) {
    elements.append(initialElements);
  }

  if (prefetchStrategy.needsInitialPrefetch()) {
    schedulePrefetch();
  }

  return {
    get elements() {
      return elements;
    },
    get paginationState() {
      return paginationState;
    },
    get paginationError() {
      return paginationError;
    },
    get isFetchingPage() {
      return activeTask !== undefined;
    },
    getState,

    fetchNextPage,
    refresh,
    removeAllAndRefresh,
    retry,
    prefetch,
    prefetchIfNeeded,

    on: publisher.on,
    off: publisher.off,
    once: publisher.once,

    destroy,
  };
};
