import { describe, expect, test } from "vitest";
import { NotFoundError } from "./errors";
import { findById } from "./lookup";
import type { Person } from "./types";

function people(ids: number[]): Person[] {
  return ids.map((id) => ({ name: `p${id}`, id, age: 30, probability: 0 }));
}

describe("findById", () => {
  const sorted = people([2, 4, 6, 8, 10]);

  test("finds every present id", () => {
    sorted.forEach((p, i) => {
      expect(findById(sorted, p.id)).toBe(i);
    });
  });

  test("throws NotFoundError for absent ids", () => {
    expect(() => findById(sorted, 5)).toThrow(NotFoundError);
    expect(() => findById(sorted, 0)).toThrow(NotFoundError);
    expect(() => findById(sorted, 12)).toThrow("Id 12 not present");
  });

  test("throws on an empty store", () => {
    expect(() => findById([], 1)).toThrow(NotFoundError);
  });

  test("rejects an id that appears twice", () => {
    expect(() => findById(people([1, 3, 3, 5]), 3)).toThrow("Id 3 is not unique");
  });

  test("searches only within lo..hi", () => {
    expect(findById(sorted, 8, 2, 4)).toBe(3);
    expect(() => findById(sorted, 8, 0, 2)).toThrow(NotFoundError);
  });

  test("an inverted range is empty", () => {
    expect(() => findById(sorted, 6, 3, 1)).toThrow(NotFoundError);
  });
});
