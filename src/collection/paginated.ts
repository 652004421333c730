/**
 * pagewise - Paginated Collection
 * Ordered, identity-keyed elements with positional access
 */

import type { IdFn, Identifiable, PaginatedElement } from "../types";
import { DEFAULT_PREFETCH_DISTANCE } from "../constants";
import { applyAppendStrategy, type AppendStrategy } from "./strategy";

// =============================================================================
// Types
// =============================================================================

/** Paginated collection configuration */
export interface PaginatedCollectionConfig<T, ID> {
  /** Extracts the identity of an element */
  id: IdFn<T, ID>;

  /** Default append strategy (default: updateOrAppend) */
  appendStrategy?: AppendStrategy<T, ID>;

  /**
   * Distance to the end of the collection that makes an element ask for
   * a prefetch when it appears (default: 1)
   */
  prefetchDistance?: number;

  /** Overrides `prefetchDistance` */
  needsPrefetch?: (index: number, count: number) => boolean;
}

/** Paginated collection instance */
export interface PaginatedCollection<T, ID> extends Iterable<PaginatedElement<T, ID>> {
  /** Number of elements */
  readonly count: number;

  /** Element at position, undefined out of bounds */
  get: (position: number) => PaginatedElement<T, ID> | undefined;

  /** Raw value by identity */
  getById: (id: ID) => T | undefined;

  /** Position of an identity (-1 if absent) */
  indexOf: (id: ID) => number;

  has: (id: ID) => boolean;

  /** Values, in order */
  getValues: () => readonly T[];

  /** Identities, in order */
  getIds: () => readonly ID[];

  /** Every element with its prefetch flag */
  toArray: () => PaginatedElement<T, ID>[];

  /** The backing ordered dictionary */
  getDictionary: () => ReadonlyMap<ID, T>;

  /** Merge a page (uses the configured strategy unless one is given) */
  append: (newElements: readonly T[], strategy?: AppendStrategy<T, ID>) => void;

  removeAll: () => void;
}

// =============================================================================
// Implementation
// =============================================================================

export const createPaginatedCollection = <T, ID>(
  config: PaginatedCollectionConfig<T, ID>,
): PaginatedCollection<T, ID> => {
  const {
    id,
    appendStrategy = "updateOrAppend",
    prefetchDistance = DEFAULT_PREFETCH_DISTANCE,
    needsPrefetch = (index: number, count: number): boolean =>
      count - index <= prefetchDistance,
  } = config;

  const dictionary = new Map<ID, T>();

  // Positional snapshots, rebuilt lazily after a mutation
  let ids: ID[] | null = null;
  let values: T[] | null = null;

  const invalidate = (): void => {
    ids = null;
    values = null;
  };

  const getIds = (): readonly ID[] => {
    if (ids === null) {
      ids = Array.from(dictionary.keys());
    }
    return ids;
  };

  const getValues = (): readonly T[] => {
    if (values === null) {
      values = Array.from(dictionary.values());
    }
    return values;
  };

  const makeElement = (
    position: number,
    value: T,
    count: number,
  ): PaginatedElement<T, ID> => ({
    id: id(value),
    value,
    needsPrefetchOnAppear: needsPrefetch(position, count),
  });

  const get = (position: number): PaginatedElement<T, ID> | undefined => {
    if (!Number.isInteger(position) || position < 0 || position >= dictionary.size) {
      return undefined;
    }
    const value = getValues()[position];
    if (value === undefined) {
      return undefined;
    }
    return makeElement(position, value, dictionary.size);
  };

  const toArray = (): PaginatedElement<T, ID>[] => {
    const count = dictionary.size;
    return getValues().map((value, position) => makeElement(position, value, count));
  };

  const append = (
    newElements: readonly T[],
    strategy: AppendStrategy<T, ID> = appendStrategy,
  ): void => {
    applyAppendStrategy(dictionary, newElements, strategy, id);
    invalidate();
  };

  const removeAll = (): void => {
    dictionary.clear();
    invalidate();
  };

  return {
    get count() {
      return dictionary.size;
    },
    get,
    getById: (key) => dictionary.get(key),
    indexOf: (key) => (dictionary.has(key) ? getIds().indexOf(key) : -1),
    has: (key) => dictionary.has(key),
    getValues,
    getIds,
    toArray,
    getDictionary: () => dictionary,
    append,
    removeAll,
    [Symbol.iterator]: () => toArray()[Symbol.iterator](),
  };
};

/** Identity of elements that carry an `id` field */
export const byId = <T extends Identifiable>(element: T): T["id"] => element.id;
