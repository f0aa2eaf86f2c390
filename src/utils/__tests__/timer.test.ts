import { describe, it, expect } from "vitest";
import { Timer, formatSeconds } from "../timer.js";

describe("Timer", () => {
  it("reports a non-negative elapsed time", () => {
    const timer = new Timer();
    expect(timer.elapsedMs()).toBeGreaterThanOrEqual(0);
  });

  it("formats short durations in milliseconds", () => {
    const timer = new Timer();
    expect(timer.elapsed()).toMatch(/^\d+ms$/);
  });
});

describe("formatSeconds", () => {
  it("shows millisecond precision", () => {
    expect(formatSeconds(42)).toBe("0.042s");
  });

  it("rounds to three decimals", () => {
    expect(formatSeconds(1234.5678)).toBe("1.235s");
  });

  it("formats zero", () => {
    expect(formatSeconds(0)).toBe("0.000s");
  });

  it("clamps negative durations to zero", () => {
    expect(formatSeconds(-5)).toBe("0.000s");
  });
});
