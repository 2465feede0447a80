import { describe, it, expect } from "vitest";
import { backoffDelayMs } from "../backoff.js";

describe("backoffDelayMs", () => {
  it("grows with the square of the attempt", () => {
    expect([1, 2, 3].map((n) => backoffDelayMs(n, 2000))).toEqual([2000, 8000, 18000]);
  });

  it("scales with the configured base", () => {
    expect(backoffDelayMs(2, 100)).toBe(400);
  });
});
