import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG, createConfig } from "./config";

describe("createConfig", () => {
  test("defaults match the fixed domain constants", () => {
    expect(createConfig()).toMatchObject({
      minDistance: 1,
      maxTime: 30,
      epsilon: 1e-9,
      hospitalizationThreshold: 0.3,
      quarantineThreshold: 0.1,
      riskAge: 65,
      clampTransmission: false,
    });
  });

  test("overrides one message and keeps the others", () => {
    const config = createConfig({ messages: { quarantine: (n, id) => `Q ${n} ${id}` } });
    expect(config.messages.quarantine("Bob", 2)).toBe("Q Bob 2");
    expect(config.messages.clean("Bob", 2)).toBe("No serious chance for infection: Bob 2.");
  });

  test("returns a frozen config", () => {
    expect(Object.isFrozen(createConfig({ clampTransmission: true }))).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });
});
