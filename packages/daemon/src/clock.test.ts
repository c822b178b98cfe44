import { describe, expect, it } from "vitest";
import { systemClock } from "./clock.js";

describe("systemClock", () => {
  it("reads epoch milliseconds", () => {
    expect(Math.abs(systemClock.now() - Date.now())).toBeLessThan(1_000);
  });

  it("never goes backwards", () => {
    let previous = systemClock.now();
    for (let i = 0; i < 1_000; i++) {
      const current = systemClock.now();
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});
