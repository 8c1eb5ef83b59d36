import { describe, it, expect } from "vitest";
import { clamp, formatClock, formatProgressLabel } from "@/core/utils";

describe("formatClock", () => {
  it("formats whole minutes and seconds", () => {
    expect(formatClock(0)).toBe("00:00");
    expect(formatClock(61.9)).toBe("01:01");
    expect(formatClock(3600)).toBe("60:00");
  });

  it("renders invalid input as zero", () => {
    expect(formatClock(-5)).toBe("00:00");
    expect(formatClock(Number.NaN)).toBe("00:00");
    expect(formatClock(Number.POSITIVE_INFINITY)).toBe("00:00");
  });
});

describe("formatProgressLabel", () => {
  it("shows elapsed over total", () => {
    expect(formatProgressLabel(75, 180)).toBe("01:15/03:00");
  });

  it("caps the elapsed part at the total", () => {
    expect(formatProgressLabel(200, 180)).toBe("03:00/03:00");
    expect(formatProgressLabel(180.4, 180.9)).toBe("03:00/03:00");
  });

  it("shows dashes while the length is unknown", () => {
    expect(formatProgressLabel(5, null)).toBe("00:05/--:--");
  });
});

describe("clamp", () => {
  it("limits to the range", () => {
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.25, 0, 1)).toBe(0.25);
    expect(clamp(2, 0, 1)).toBe(1);
  });
});
