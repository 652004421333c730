/**
 * pagewise - Page Cache Tests
 * Least-recently-used eviction
 */

import { describe, it, expect, vi } from "vitest";
import { createPageCache } from "../../src/fetched";

describe("createPageCache", () => {
  describe("eviction", () => {
    it("should evict the least recently stored page", () => {
      const onEvict = vi.fn();
      const cache = createPageCache<string>({ capacity: 2, onEvict });

      cache.set(0, "page 0");
      cache.set(1, "page 1");
      cache.set(2, "page 2");

      expect(cache.keys()).toEqual([1, 2]);
      expect(cache.get(0)).toBeUndefined();
      expect(onEvict).toHaveBeenCalledTimes(1);
      expect(onEvict).toHaveBeenCalledWith(0, "page 0");
    });

    it("should keep a page that was read recently", () => {
      const cache = createPageCache<string>({ capacity: 2 });

      cache.set(0, "page 0");
      cache.set(1, "page 1");
      expect(cache.get(0)).toBe("page 0");
      cache.set(2, "page 2");

      expect(cache.keys()).toEqual([0, 2]);
    });

    it("should not refresh a page on peek", () => {
      const cache = createPageCache<string>({ capacity: 2 });

      cache.set(0, "page 0");
      cache.set(1, "page 1");
      expect(cache.peek(0)).toBe("page 0");
      cache.set(2, "page 2");

      expect(cache.keys()).toEqual([1, 2]);
    });

    it("should move a replaced page to the end", () => {
      const cache = createPageCache<string>({ capacity: 3 });

      cache.set(0, "page 0");
      cache.set(1, "page 1");
      cache.set(0, "page 0 again");

      expect(cache.keys()).toEqual([1, 0]);
      expect(cache.peek(0)).toBe("page 0 again");
    });

    it("should never evict with a capacity of 0", () => {
      const cache = createPageCache<number>({ capacity: 0 });

      for (let i = 0; i < 500; i++) cache.set(i, i);

      expect(cache.size).toBe(500);
    });
  });

  describe("removal", () => {
    it("should delete and clear pages", () => {
      const cache = createPageCache<string>({ capacity: 0 });
      cache.set(0, "page 0");
      cache.set(1, "page 1");

      expect(cache.delete(0)).toBe(true);
      expect(cache.has(0)).toBe(false);

      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  it("should reject an invalid capacity", () => {
    expect(() => createPageCache({ capacity: -1 })).toThrow(RangeError);
    expect(() => createPageCache({ capacity: 2.5 })).toThrow(
      "capacity must be a non-negative integer, got 2.5",
    );
  });
});
