/**
 * pagewise - Test Helpers
 * In-memory page sources and row fetchers, promise plumbing
 */

import { vi } from "vitest";
import type { Page, PageSource, RowFetcher, RowWindow } from "../src/types";

// =============================================================================
// Promises
// =============================================================================

/** Let every pending promise callback run */
export const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, 0));

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolvePromise: (value: T) => void = () => undefined;
  let rejectPromise: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((resolve, reject) => {
    resolvePromise = resolve;
    rejectPromise = reject;
  });
  return {
    promise,
    resolve: (value) => resolvePromise(value),
    reject: (error) => rejectPromise(error),
  };
};

// =============================================================================
// Data
// =============================================================================

export interface Player {
  id: number;
  name: string;
}

export const createPlayers = (count: number, startId = 0): Player[] =>
  Array.from({ length: count }, (_, i) => ({
    id: startId + i,
    name: `Player ${startId + i}`,
  }));

// =============================================================================
// Page Sources
// =============================================================================

/** Offset-paged source over an in-memory array */
export const createArraySource = <T>(items: T[], pageSize: number) => {
  const page = async (offset: number): Promise<Page<T, number>> => {
    const nextOffset = offset + pageSize;
    return {
      elements: items.slice(offset, nextOffset),
      nextPageIdentifier: nextOffset < items.length ? nextOffset : undefined,
    };
  };

  const source: PageSource<T, number> = {
    firstPageIdentifier: () => 0,
    page,
  };

  return source;
};

export interface PageRequest<T, PageID> extends Deferred<Page<T, PageID>> {
  pageIdentifier: PageID;
  signal: AbortSignal;
}

/**
 * A source whose requests stay pending until the test settles them.
 */
export const createControlledSource = <T, PageID>(firstPageIdentifier: PageID) => {
  const requests: PageRequest<T, PageID>[] = [];

  const source: PageSource<T, PageID> = {
    firstPageIdentifier: () => firstPageIdentifier,
    page: (pageIdentifier, { signal }) => {
      const request = deferred<Page<T, PageID>>();
      requests.push({ ...request, pageIdentifier, signal });
      return request.promise;
    },
  };

  const request = (index: number): PageRequest<T, PageID> => {
    const found = requests[index];
    if (!found) {
      throw new Error(`No request #${index}, ${requests.length} were made`);
    }
    return found;
  };

  return { source, requests, request };
};

// =============================================================================
// Row Fetchers
// =============================================================================

export interface RowRead {
  window: RowWindow;
  signal: AbortSignal;
  settled: boolean;
  resolve: (rows: number[]) => void;
  reject: (error: unknown) => void;
}

/**
 * Fetcher over the rows `0..count-1` (each row is its own index).
 * Asynchronous reads stay pending until the test settles them, or reject
 * with an AbortError when aborted.
 */
export const createControlledFetcher = (
  count: number,
  options: { maxConcurrentReads?: number } = {},
) => {
  const reads: RowRead[] = [];
  const syncReads: RowWindow[] = [];
  let syncError: Error | undefined;

  const rowsOf = ({ offset, limit }: RowWindow): number[] => {
    const end = Math.min(count, offset + limit);
    return Array.from({ length: Math.max(0, end - offset) }, (_, i) => offset + i);
  };

  const interrupt = vi.fn();

  const fetcher: RowFetcher<number> = {
    count: () => count,
    read: (window, { signal }) => {
      const pending = deferred<number[]>();
      const read: RowRead = {
        window,
        signal,
        settled: false,
        resolve: (rows) => {
          read.settled = true;
          pending.resolve(rows);
        },
        reject: (error) => {
          read.settled = true;
          pending.reject(error);
        },
      };
      reads.push(read);
      signal.addEventListener("abort", () => {
        if (read.settled) return;
        const error = new Error("The read was aborted");
        error.name = "AbortError";
        read.reject(error);
      });
      return pending.promise;
    },
    readSync: (window) => {
      syncReads.push(window);
      if (syncError) throw syncError;
      return rowsOf(window);
    },
    interrupt,
    maxConcurrentReads: options.maxConcurrentReads,
  };

  /** Reads neither settled nor aborted */
  const pendingReads = (): RowRead[] =>
    reads.filter((read) => !read.settled && !read.signal.aborted);

  /** Offsets of the reads made so far, in order */
  const readOffsets = (): number[] => reads.map((read) => read.window.offset);

  /** Settle the first pending read with its rows */
  const completeNextRead = (): RowRead => {
    const [read] = pendingReads();
    if (!read) throw new Error("No pending read");
    read.resolve(rowsOf(read.window));
    return read;
  };

  return {
    fetcher,
    reads,
    syncReads,
    interrupt,
    rowsOf,
    pendingReads,
    readOffsets,
    completeNextRead,
    failSyncReadsWith: (error: Error | undefined) => {
      syncError = error;
    },
  };
};
