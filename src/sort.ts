import type { Person } from "./types";

/**
 * Negative when `a` sorts first, positive when `b` does, 0 when equal.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Epsilon-tolerant three-way comparison of two floats.
 *
 * `NaN` sorts below every number and equal to another `NaN`. Equal infinities
 * compare equal.
 */
export function compareFloats(a: number, b: number, epsilon: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) {
    if (aNaN && bNaN) return 0;
    return aNaN ? -1 : 1;
  }
  if (a === b) return 0;
  if (Math.abs(a - b) < epsilon) return 0;
  if (a > b) return 1;
  return -1;
}

/**
 * Epsilon-tolerant `value >= threshold`.
 */
export function isAtLeast(
  value: number,
  threshold: number,
  epsilon: number
): boolean {
  return value >= threshold || Math.abs(value - threshold) < epsilon;
}

export const compareById: Comparator<Person> = (a, b) => a.id - b.id;

export function compareByProbability(epsilon: number): Comparator<Person> {
  return (a, b) => compareFloats(a.probability, b.probability, epsilon);
}

function merge<T>(
  items: T[],
  scratch: T[],
  start: number,
  mid: number,
  end: number,
  compare: Comparator<T>
): void {
  for (let i = start; i < end; i += 1) scratch[i] = items[i];

  let left = start;
  let right = mid;
  let out = start;

  while (left < mid && right < end) {
    // Ties take from the left half so equal keys keep their input order.
    if (compare(scratch[left], scratch[right]) <= 0) {
      items[out] = scratch[left];
      left += 1;
    } else {
      items[out] = scratch[right];
      right += 1;
    }
    out += 1;
  }

  while (left < mid) {
    items[out] = scratch[left];
    left += 1;
    out += 1;
  }
  while (right < end) {
    items[out] = scratch[right];
    right += 1;
    out += 1;
  }
}

function sortRange<T>(
  items: T[],
  scratch: T[],
  start: number,
  length: number,
  compare: Comparator<T>
): void {
  if (length <= 1) return;

  const leftLength = Math.floor(length / 2);
  const rightLength = length - leftLength;
  const mid = start + leftLength;

  sortRange(items, scratch, start, leftLength, compare);
  sortRange(items, scratch, mid, rightLength, compare);
  merge(items, scratch, start, mid, start + length, compare);
}

/**
 * Stable merge sort. Returns a sorted copy and leaves `items` untouched.
 *
 * O(n log n) comparisons, one scratch array of length n.
 */
export function mergeSort<T>(items: readonly T[], compare: Comparator<T>): T[] {
  const out = items.slice();
  if (out.length <= 1) return out;

  const scratch = out.slice();
  sortRange(out, scratch, 0, out.length, compare);
  return out;
}
