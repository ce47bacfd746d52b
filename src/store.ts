import { MalformedRecordError, rethrowAsResourceError } from "./errors";
import { compareById, compareByProbability, mergeSort, type Comparator } from "./sort";
import { EPSILON } from "./config";
import type { Person, RosterRecord, SortKey, Store } from "./types";

/**
 * Creates the store from parsed roster rows, in roster order, with every
 * probability at 0.
 */
export function buildStore(records: readonly RosterRecord[]): Store {
  try {
    const people: Person[] = records.map((r) => ({
      name: r.name,
      id: r.id,
      age: r.age,
      probability: 0,
    }));
    return { people, sortedBy: null };
  } catch (err) {
    return rethrowAsResourceError("build the record store", err);
  }
}

function comparatorFor(key: SortKey, epsilon: number): Comparator<Person> {
  return key === "id" ? compareById : compareByProbability(epsilon);
}

/**
 * Reorders the store by `key` with a stable merge sort and records the order.
 *
 * After an id sort, two people with the same id are reported as a malformed
 * roster since every later lookup would be ambiguous.
 */
export function sortStore(
  store: Store,
  key: SortKey,
  epsilon = EPSILON
): Store {
  let sorted: Person[];
  try {
    sorted = mergeSort(store.people, comparatorFor(key, epsilon));
  } catch (err) {
    return rethrowAsResourceError(`sort the record store by ${key}`, err);
  }

  if (key === "id") {
    for (let i = 1; i < sorted.length; i += 1) {
      if (sorted[i].id === sorted[i - 1].id) {
        throw new MalformedRecordError(
          "roster",
          null,
          `duplicate id ${sorted[i].id} (${sorted[i - 1].name}, ${sorted[i].name})`
        );
      }
    }
  }

  for (let i = 0; i < sorted.length; i += 1) store.people[i] = sorted[i];
  store.sortedBy = key;
  return store;
}
