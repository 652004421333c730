/**
 * pagewise - Append Strategies
 * How a new page is merged into the elements fetched so far
 *
 * Starting from `1: Red, 2: Green, 3: Blue` and appending `1: Orange, 4: Yellow`:
 *
 * - removeAndAppend: `2: Green, 3: Blue, 1: Orange, 4: Yellow`
 * - updateOrAppend:  `1: Orange, 2: Green, 3: Blue, 4: Yellow`
 * - ignoreOrAppend:  `1: Red, 2: Green, 3: Blue, 4: Yellow`
 */

import type { IdFn } from "../types";

// =============================================================================
// Types
// =============================================================================

/** Merges `newElements` into the ordered dictionary, in place */
export type CustomAppendFn<T, ID> = (
  newElements: readonly T[],
  dictionary: Map<ID, T>,
  id: IdFn<T, ID>,
) => void;

/** A custom append strategy */
export interface CustomAppendStrategy<T, ID> {
  type: "custom";
  append: CustomAppendFn<T, ID>;
}

/** Strategy for appending a page to previously fetched elements */
export type AppendStrategy<T, ID> =
  | "removeAndAppend"
  | "updateOrAppend"
  | "ignoreOrAppend"
  | CustomAppendStrategy<T, ID>;

// =============================================================================
// Factories
// =============================================================================

export const customAppend = <T, ID>(
  append: CustomAppendFn<T, ID>,
): CustomAppendStrategy<T, ID> => ({ type: "custom", append });

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge `newElements` into `dictionary` according to `strategy`.
 * Within a page, duplicate identifiers follow map semantics.
 */
export const applyAppendStrategy = <T, ID>(
  dictionary: Map<ID, T>,
  newElements: readonly T[],
  strategy: AppendStrategy<T, ID>,
  id: IdFn<T, ID>,
): void => {
  if (typeof strategy === "object") {
    strategy.append(newElements, dictionary, id);
    return;
  }

  switch (strategy) {
    case "removeAndAppend":
      for (const element of newElements) {
        dictionary.delete(id(element));
      }
      for (const element of newElements) {
        dictionary.set(id(element), element);
      }
      break;

    case "updateOrAppend":
      for (const element of newElements) {
        dictionary.set(id(element), element);
      }
      break;

    case "ignoreOrAppend":
      for (const element of newElements) {
        const key = id(element);
        if (!dictionary.has(key)) {
          dictionary.set(key, element);
        }
      }
      break;
  }
};
