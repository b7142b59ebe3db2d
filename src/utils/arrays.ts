/**
 * Grow `arr` in place so that index `min_length - 1` is addressable,
 * filling every new slot with `fill`. No-op if already long enough.
 */
export function extend_number_array(
  arr: number[],
  min_length: number,
  fill: number,
): void {
  for (let i = arr.length; i < min_length; i++) arr.push(fill);
}

/**
 * Pop trailing entries equal to `value`. Returns how many were removed.
 */
export function trim_trailing(arr: number[], value: number): number {
  let removed = 0;
  while (arr.length > 0 && arr[arr.length - 1] === value) {
    arr.pop();
    removed++;
  }
  return removed;
}

/**
 * Insert `item` into an array already sorted by `compare`, after every
 * element that compares less than or equal to it. O(log n) search.
 */
export function sorted_insert<T>(
  arr: T[],
  item: T,
  compare: (a: T, b: T) => number,
): number {
  let lo = 0;
  let hi = arr.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(arr[mid], item) <= 0) lo = mid + 1;
    else hi = mid;
  }
  arr.splice(lo, 0, item);
  return lo;
}
