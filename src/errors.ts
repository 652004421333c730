/**
 * pagewise - Errors
 * Pagination error taxonomy and the cancellation marker
 */

import type { PaginationAction } from "./types";

// =============================================================================
// Helpers
// =============================================================================

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Thrown by superseded or aborted work. Never recorded as a pagination
 * error, never surfaced to callers of the paginated results.
 */
export class CancellationError extends Error {
  public constructor(message = "The operation was cancelled") {
    super(message);
    this.name = "CancellationError";
  }
}

/** Whether a value is a cancellation (ours, or an aborted fetch) */
export const isCancellation = (error: unknown): boolean =>
  error instanceof CancellationError ||
  (error instanceof Error && error.name === "AbortError");

// =============================================================================
// Pagination Errors
// =============================================================================

/**
 * An error that prevented a pagination action from completing.
 *
 * The page source error is kept unchanged in `underlyingError` (and in
 * `cause`). `kind` names the action that failed, so that it can be retried.
 */
export abstract class PaginationError extends Error {
  public abstract readonly kind: PaginationAction;
  public readonly underlyingError: unknown;

  protected constructor(label: string, underlyingError: unknown) {
    super(`${label}: ${describe(underlyingError)}`, { cause: underlyingError });
    this.underlyingError = underlyingError;
  }
}

/** Fetching the next page failed */
export class FetchNextPageError extends PaginationError {
  public override readonly kind = "fetchNextPage";

  public constructor(underlyingError: unknown) {
    super("Could not fetch the next page", underlyingError);
    this.name = "FetchNextPageError";
  }
}

/** Refreshing failed */
export class RefreshError extends PaginationError {
  public override readonly kind = "refresh";

  public constructor(underlyingError: unknown) {
    super("Could not refresh", underlyingError);
    this.name = "RefreshError";
  }
}

/** Refreshing after removing all elements failed */
export class RemoveAllAndRefreshError extends PaginationError {
  public override readonly kind = "removeAllAndRefresh";

  public constructor(underlyingError: unknown) {
    super("Could not refresh", underlyingError);
    this.name = "RemoveAllAndRefreshError";
  }
}

/** Build the tagged error for an action */
export const createPaginationError = (
  kind: PaginationAction,
  underlyingError: unknown,
): PaginationError => {
  switch (kind) {
    case "fetchNextPage":
      return new FetchNextPageError(underlyingError);
    case "refresh":
      return new RefreshError(underlyingError);
    case "removeAllAndRefresh":
      return new RemoveAllAndRefreshError(underlyingError);
  }
};

export const isPaginationError = (value: unknown): value is PaginationError =>
  value instanceof PaginationError;
