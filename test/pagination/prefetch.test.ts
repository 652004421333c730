/**
 * pagewise - Prefetch Strategy Tests
 */

import { describe, it, expect } from "vitest";
import {
  firstPage,
  infiniteScroll,
  minimumElementCount,
  noPrefetch,
} from "../../src/pagination";

describe("minimumElementCount", () => {
  it("should prefetch until the count is reached", () => {
    const strategy = minimumElementCount(30);

    expect(strategy.needsInitialPrefetch()).toBe(true);
    expect(strategy.needsPrefetchAfterPageLoaded(20)).toBe(true);
    expect(strategy.needsPrefetchAfterPageLoaded(30)).toBe(false);
  });

  it("should never prefetch on appear", () => {
    const strategy = minimumElementCount(30);

    expect(strategy.needsPrefetchOnElementAppear(19, 20)).toBe(false);
  });
});

describe("noPrefetch", () => {
  it("should never prefetch", () => {
    const strategy = noPrefetch();

    expect(strategy.needsInitialPrefetch()).toBe(false);
    expect(strategy.needsPrefetchAfterPageLoaded(0)).toBe(false);
    expect(strategy.needsPrefetchOnElementAppear(0, 1)).toBe(false);
  });
});

describe("infiniteScroll", () => {
  it("should prefetch the first page and nothing after a page", () => {
    const strategy = infiniteScroll();

    expect(strategy.needsInitialPrefetch()).toBe(true);
    expect(strategy.needsPrefetchAfterPageLoaded(0)).toBe(false);
  });

  it("should prefetch when the last element appears by default", () => {
    const strategy = infiniteScroll();

    expect(strategy.needsPrefetchOnElementAppear(18, 20)).toBe(false);
    expect(strategy.needsPrefetchOnElementAppear(19, 20)).toBe(true);
  });

  it("should prefetch within the offscreen element count", () => {
    const strategy = infiniteScroll({ offscreenElementCount: 5 });

    expect(strategy.needsPrefetchOnElementAppear(14, 20)).toBe(false);
    expect(strategy.needsPrefetchOnElementAppear(15, 20)).toBe(true);
  });
});

describe("firstPage", () => {
  it("should only prefetch the first page", () => {
    const strategy = firstPage();

    expect(strategy.needsInitialPrefetch()).toBe(true);
    expect(strategy.needsPrefetchAfterPageLoaded(20)).toBe(false);
    expect(strategy.needsPrefetchOnElementAppear(19, 20)).toBe(false);
  });
});
