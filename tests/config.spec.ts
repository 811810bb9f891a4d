import { describe, expect, it } from "vitest";
import { config } from "../src/config.js";
import { DEFAULT_DECK_SIZE } from "../src/domain/policy.js";

describe("config", () => {
  it("falls back to the policy deck size", () => {
    expect(process.env.DECK_SIZE).toBeUndefined();
    expect(config.DECK_SIZE).toBe(DEFAULT_DECK_SIZE);
  });
});
