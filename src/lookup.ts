import { NotFoundError } from "./errors";
import type { Person, PersonId } from "./types";

/**
 * Binary search for `target` in `people[lo..hi]` (inclusive), which must be
 * sorted by id ascending.
 *
 * Returns the index of the unique person with that id. Throws `NotFoundError`
 * when the range is empty, when no person has the id, or when a neighbour of
 * the match carries the same id.
 */
export function findById(
  people: readonly Person[],
  target: PersonId,
  lo = 0,
  hi = people.length - 1
): number {
  let start = Math.max(lo, 0);
  let end = Math.min(hi, people.length - 1);

  while (start <= end) {
    const mid = start + Math.floor((end - start) / 2);
    const id = people[mid].id;

    if (id === target) {
      const before = mid > lo ? people[mid - 1] : undefined;
      const after = mid < hi ? people[mid + 1] : undefined;
      if (before?.id === target || after?.id === target) {
        throw new NotFoundError(target, "is not unique");
      }
      return mid;
    }

    if (target < id) end = mid - 1;
    else start = mid + 1;
  }

  throw new NotFoundError(target);
}
