/**
 * pagewise - Prefetch Window
 * The pages worth keeping around the last accessed element
 */

/**
 * Returns the page indexes to prefetch around `pageIndex`, in the order
 * they should be fetched.
 *
 * The containing page comes first, then following pages up to half the
 * window, then previous pages, then more following pages when the start of
 * the dataset leaves room. Reading forward is favored, reading backward is
 * still covered.
 *
 * The result always holds `min(pageCount, adjacentPageCount)` indexes.
 */
export const prefetchWindow = (
  pageIndex: number,
  pageCount: number,
  adjacentPageCount: number,
): number[] => {
  const pageIndexes: number[] = [];
  const half = Math.floor(adjacentPageCount / 2);

  // Page and next pages
  let next = pageIndex;
  while (pageIndexes.length <= half && next < pageCount) {
    pageIndexes.push(next);
    next++;
  }

  // Previous pages
  let previous = pageIndex - 1;
  while (pageIndexes.length < adjacentPageCount && previous >= 0) {
    pageIndexes.push(previous);
    previous--;
  }

  // Next pages, if there were not enough previous pages
  while (pageIndexes.length < adjacentPageCount && next < pageCount) {
    pageIndexes.push(next);
    next++;
  }

  return pageIndexes;
};
