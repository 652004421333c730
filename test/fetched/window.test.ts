/**
 * pagewise - Prefetch Window Tests
 */

import { describe, it, expect } from "vitest";
import { prefetchWindow } from "../../src/fetched";

const range = (from: number, to: number): number[] => {
  const step = from <= to ? 1 : -1;
  const result: number[] = [];
  for (let i = from; i !== to + step; i += step) result.push(i);
  return result;
};

describe("prefetchWindow", () => {
  it("should favor following pages in the middle of the dataset", () => {
    expect(prefetchWindow(50, 100, 20)).toEqual([...range(50, 60), ...range(49, 41)]);
  });

  it("should fill with following pages near the start", () => {
    expect(prefetchWindow(5, 100, 20)).toEqual([
      ...range(5, 15),
      ...range(4, 0),
      ...range(16, 19),
    ]);
  });

  it("should fill with previous pages near the end", () => {
    expect(prefetchWindow(98, 100, 20)).toEqual([98, 99, ...range(97, 80)]);
  });

  it("should hold every page of a small dataset", () => {
    expect(prefetchWindow(1, 3, 20)).toEqual([1, 2, 0]);
  });

  it("should hold only the page for a window of one", () => {
    expect(prefetchWindow(7, 100, 1)).toEqual([7]);
  });

  it("should split a small window", () => {
    expect(prefetchWindow(5, 100, 4)).toEqual([5, 6, 7, 4]);
  });

  it("should be empty without pages", () => {
    expect(prefetchWindow(0, 0, 20)).toEqual([]);
  });
});
