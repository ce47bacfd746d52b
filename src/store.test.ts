import { describe, expect, test } from "vitest";
import { MalformedRecordError } from "./errors";
import { buildStore, sortStore } from "./store";
import type { RosterRecord } from "./types";

const roster: RosterRecord[] = [
  { name: "Carol", id: 3, age: 40, line: 1 },
  { name: "Alice", id: 1, age: 30, line: 2 },
  { name: "Bob", id: 2, age: 70, line: 3 },
];

describe("buildStore", () => {
  test("creates one person per record with probability 0", () => {
    const store = buildStore(roster);
    expect(store.sortedBy).toBeNull();
    expect(store.people).toEqual([
      { name: "Carol", id: 3, age: 40, probability: 0 },
      { name: "Alice", id: 1, age: 30, probability: 0 },
      { name: "Bob", id: 2, age: 70, probability: 0 },
    ]);
  });

  test("handles an empty roster", () => {
    expect(buildStore([])).toEqual({ people: [], sortedBy: null });
  });
});

describe("sortStore", () => {
  test("sorts by id in place", () => {
    const store = buildStore(roster);
    const people = store.people;
    sortStore(store, "id");
    expect(store.people).toBe(people);
    expect(store.people.map((p) => p.id)).toEqual([1, 2, 3]);
    expect(store.sortedBy).toBe("id");
  });

  test("sorts by probability ascending, ties in current order", () => {
    const store = buildStore(roster);
    sortStore(store, "id");
    store.people[0].probability = 0.5;
    store.people[2].probability = 0.5;
    sortStore(store, "probability");
    expect(store.people.map((p) => p.name)).toEqual(["Bob", "Alice", "Carol"]);
    expect(store.sortedBy).toBe("probability");
  });

  test("rejects duplicate ids", () => {
    const store = buildStore([
      { name: "Alice", id: 1, age: 30, line: 1 },
      { name: "Alias", id: 1, age: 31, line: 2 },
    ]);
    expect(() => sortStore(store, "id")).toThrow(MalformedRecordError);
    expect(() => sortStore(store, "id")).toThrow(
      "Malformed roster record: duplicate id 1 (Alice, Alias)"
    );
  });
});
