import { describe, expect, test } from "vitest";
import { OUTPUT_FILE } from "./config";
import { USAGE_MSG, UsageError } from "./errors";
import { getArgValue, getPositionals, resolveOptions } from "./options";

describe("argv helpers", () => {
  test("getArgValue reads both flag styles", () => {
    expect(getArgValue(["--out", "r.txt"], "--out")).toBe("r.txt");
    expect(getArgValue(["--out=a=b.txt"], "--out")).toBe("a=b.txt");
    expect(getArgValue(["--out", "--clamp"], "--out")).toBeNull();
    expect(getArgValue(["x"], "--out")).toBeNull();
  });

  test("getPositionals skips flags and flag values", () => {
    expect(getPositionals(["--out", "r.txt", "a", "--clamp", "b"])).toEqual(["a", "b"]);
    expect(getPositionals(["a", "--out=r.txt", "b"])).toEqual(["a", "b"]);
  });
});

describe("resolveOptions", () => {
  test("defaults", () => {
    expect(resolveOptions(["people.in", "meetings.in"], {})).toEqual({
      rosterPath: "people.in",
      meetingsPath: "meetings.in",
      outPath: OUTPUT_FILE,
      clamp: false,
      verbose: false,
    });
  });

  test("flags", () => {
    expect(
      resolveOptions(["--out", "r.txt", "a", "b", "--clamp", "--verbose"], {})
    ).toEqual({
      rosterPath: "a",
      meetingsPath: "b",
      outPath: "r.txt",
      clamp: true,
      verbose: true,
    });
  });

  test("environment variables", () => {
    expect(
      resolveOptions(["a", "b"], {
        EXPOSURE_OUT: "env.out",
        EXPOSURE_CLAMP: "yes",
        EXPOSURE_VERBOSE: "0",
      })
    ).toMatchObject({ outPath: "env.out", clamp: true, verbose: false });
  });

  test("flags win over the environment", () => {
    expect(
      resolveOptions(["a", "b", "--out=flag.out"], { EXPOSURE_OUT: "env.out" }).outPath
    ).toBe("flag.out");
  });

  test("exactly two input paths are required", () => {
    expect(() => resolveOptions(["a"], {})).toThrow(UsageError);
    expect(() => resolveOptions(["a", "b", "c"], {})).toThrow(USAGE_MSG);
    expect(() => resolveOptions([], {})).toThrow(UsageError);
  });
});
