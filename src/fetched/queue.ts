/**
 * pagewise - Fetch Queue
 * Bounded pool of cancellable background fetches
 */

import { LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

export type FetchTaskStatus =
  | "pending"
  | "running"
  | "done"
  | "failed"
  | "cancelled";

/** The work of a task; it should stop when `signal` is aborted */
export type FetchTaskRun = (signal: AbortSignal) => Promise<void>;

/** A scheduled fetch */
export interface FetchTask {
  readonly id: number;
  readonly status: FetchTaskStatus;
  readonly signal: AbortSignal;

  /** Resolves once the task is done, failed or cancelled (never rejects) */
  readonly done: Promise<void>;

  /** Drop the task if pending, abort it if running */
  cancel: () => void;
}

export interface ScheduleOptions {
  /** The task only starts once this one has settled */
  after?: FetchTask;
}

/** Fetch queue configuration */
export interface FetchQueueConfig {
  /** Maximum number of running tasks (default: 1) */
  concurrency?: number;

  /** Callback when a task fails (default: logged) */
  onTaskError?: (error: unknown, task: FetchTask) => void;
}

export interface FetchQueueStats {
  pending: number;
  running: number;
}

/** Fetch queue instance */
export interface FetchQueue {
  readonly concurrency: number;

  /** Queue a task; tasks start in scheduling order */
  schedule: (run: FetchTaskRun, options?: ScheduleOptions) => FetchTask;

  /** Cancel every pending task and abort every running one */
  cancelAll: () => void;

  getStats: () => FetchQueueStats;
}

interface Entry {
  task: FetchTask;
  run: FetchTaskRun;
  after: FetchTask | undefined;
  controller: AbortController;
  status: FetchTaskStatus;
  settle: () => void;
}

// =============================================================================
// Implementation
// =============================================================================

const isSettled = (status: FetchTaskStatus): boolean =>
  status === "done" || status === "failed" || status === "cancelled";

export const createFetchQueue = (config: FetchQueueConfig = {}): FetchQueue => {
  const {
    concurrency = 1,
    onTaskError = (error: unknown, task: FetchTask): void => {
      console.error(`${LOG_PREFIX} Fetch task ${task.id} failed:`, error);
    },
  } = config;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const pending: Entry[] = [];
  const running = new Set<Entry>();
  let taskCounter = 0;

  const finish = (entry: Entry, status: FetchTaskStatus): void => {
    if (isSettled(entry.status)) return;
    entry.status = status;
    running.delete(entry);
    entry.settle();
    pump();
  };

  const start = (entry: Entry): void => {
    entry.status = "running";
    running.add(entry);
    const { signal } = entry.controller;

    Promise.resolve()
      .then(() => (signal.aborted ? undefined : entry.run(signal)))
      .then(
        () => finish(entry, signal.aborted ? "cancelled" : "done"),
        (error: unknown) => {
          if (signal.aborted) {
            finish(entry, "cancelled");
            return;
          }
          finish(entry, "failed");
          onTaskError(error, entry.task);
        },
      )
      .catch((error: unknown) => {
        console.error(`${LOG_PREFIX} Error in fetch task error handler:`, error);
      });
  };

  /** Start pending tasks while there is room, in order */
  const pump = (): void => {
    while (running.size < concurrency) {
      const index = pending.findIndex(
        (entry) => entry.after === undefined || isSettled(entry.after.status),
      );
      if (index === -1) return;

      const [entry] = pending.splice(index, 1);
      if (!entry) return;
      start(entry);
    }
  };

  const cancelEntry = (entry: Entry): void => {
    if (entry.status === "pending") {
      const index = pending.indexOf(entry);
      if (index !== -1) pending.splice(index, 1);
      entry.controller.abort();
      finish(entry, "cancelled");
    } else if (entry.status === "running") {
      // Settles as cancelled when the run returns
      entry.controller.abort();
    }
  };

  const schedule = (run: FetchTaskRun, options: ScheduleOptions = {}): FetchTask => {
    taskCounter += 1;
    const controller = new AbortController();
    let settle = (): void => {};
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });

    const entry: Entry = {
      task: {
        id: taskCounter,
        get status() {
          return entry.status;
        },
        signal: controller.signal,
        done,
        cancel: () => cancelEntry(entry),
      },
      run,
      after: options.after,
      controller,
      status: "pending",
      settle,
    };

    pending.push(entry);
    pump();
    return entry.task;
  };

  const cancelAll = (): void => {
    const dropped = pending.splice(0);
    for (const entry of running) {
      entry.controller.abort();
    }
    for (const entry of dropped) {
      entry.controller.abort();
      finish(entry, "cancelled");
    }
  };

  return {
    concurrency,
    schedule,
    cancelAll,
    getStats: () => ({ pending: pending.length, running: running.size }),
  };
};
