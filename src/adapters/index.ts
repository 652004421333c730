// src/adapters/index.ts
/**
 * pagewise adapters - Framework integration wrappers
 *
 * Each adapter is exported from its own subpath:
 *   - `pagewise/svelte`: Svelte action
 *
 * @packageDocumentation
 */

// Svelte adapter
export { prefetchOnAppear } from "./svelte";
export type { PrefetchOnAppearOptions, PrefetchOnAppearReturn } from "./svelte";
