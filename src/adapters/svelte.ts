// src/adapters/svelte.ts
/**
 * pagewise/svelte - Svelte bindings for paginated results
 *
 * Provides a `prefetchOnAppear` action that asks the paginated results to
 * prefetch when a row becomes visible.
 *
 * Works with both Svelte 4 and Svelte 5 (actions are framework-stable).
 * No Svelte imports needed: actions are plain functions.
 *
 * @packageDocumentation
 */

import type { PaginatedElement } from "../types";
import type { PaginatedResults } from "../pagination";

// =============================================================================
// Types
// =============================================================================

/** Options passed to the prefetchOnAppear action */
export interface PrefetchOnAppearOptions<T, ID> {
  /** The row's element, as read from `results.elements.get(index)` */
  element: PaginatedElement<T, ID>;

  /** The paginated results the element belongs to */
  results: Pick<PaginatedResults<T, ID>, "prefetchIfNeeded">;

  /** IntersectionObserver root margin, to prefetch a bit before (default: "0px") */
  rootMargin?: string;
}

/** Svelte action return type */
export interface PrefetchOnAppearReturn<T, ID> {
  /** Called by Svelte when the action parameter changes */
  update?: (newOptions: PrefetchOnAppearOptions<T, ID>) => void;

  /** Called by Svelte when the element is removed from the DOM */
  destroy?: () => void;
}

// =============================================================================
// Action
// =============================================================================

/**
 * Svelte action that triggers `results.prefetchIfNeeded(element)` each time
 * the node enters the viewport.
 *
 * Rows that do not need a prefetch are not observed at all. Without
 * IntersectionObserver (server rendering, old browsers) the row counts as
 * visible as soon as it mounts.
 *
 * ```svelte
 * <script>
 *   import { prefetchOnAppear } from 'pagewise/svelte';
 *   export let results;
 * </script>
 *
 * {#each results.elements.toArray() as element (element.id)}
 *   <div use:prefetchOnAppear={{ element, results, rootMargin: '200px' }}>
 *     {element.value.name}
 *   </div>
 * {/each}
 * ```
 *
 * @param node - The DOM element Svelte binds the action to
 * @param options - Element, results and observer options
 * @returns Action lifecycle object (update + destroy)
 */
export function prefetchOnAppear<T, ID>(
  node: HTMLElement,
  options: PrefetchOnAppearOptions<T, ID>,
): PrefetchOnAppearReturn<T, ID> {
  let current = options;
  let observer: IntersectionObserver | undefined;

  const appear = (): void => {
    // Failures are recorded in results.paginationError
    void current.results.prefetchIfNeeded(current.element);
  };

  const disconnect = (): void => {
    observer?.disconnect();
    observer = undefined;
  };

  const observe = (): void => {
    disconnect();

    if (!current.element.needsPrefetchOnAppear) return;

    if (typeof IntersectionObserver === "undefined") {
      appear();
      return;
    }

    observer = new IntersectionObserver(
      (entries) => {
        if (entries.some((entry) => entry.isIntersecting)) {
          appear();
        }
      },
      { rootMargin: current.rootMargin ?? "0px" },
    );
    observer.observe(node);
  };

  observe();

  return {
    update(newOptions: PrefetchOnAppearOptions<T, ID>) {
      current = newOptions;
      observe();
    },

    destroy() {
      disconnect();
    },
  };
}
