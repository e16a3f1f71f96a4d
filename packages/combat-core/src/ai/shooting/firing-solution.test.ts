import { describe, expect, it } from "vitest";
import { firingSolution } from "./firing-solution.ts";

const origin = { x: 0, y: 0 };

describe("firingSolution", () => {
  it("aims straight at a stationary target", () => {
    expect(firingSolution(origin, { x: 100, y: 0 }, { x: 0, y: 0 }, 10)).toBe(0);
    expect(firingSolution(origin, { x: 0, y: 100 }, { x: 0, y: 0 }, 10)).toBeCloseTo(90, 10);
  });

  it("leads a target drifting across the line of sight", () => {
    // Cross-track 3 is matched, leaving 4 to close with at speed 5.
    const bearing = firingSolution(origin, { x: 0, y: 100 }, { x: 3, y: 0 }, 5);
    expect(bearing).toBeCloseTo(53.13010235415598, 10);
  });

  it("needs no lead for motion along the line of sight", () => {
    expect(firingSolution(origin, { x: 0, y: 100 }, { x: 0, y: 7 }, 5)).toBeCloseTo(90, 10);
  });

  it("has no solution when shooter and target coincide", () => {
    expect(firingSolution(origin, { x: 0, y: 0 }, { x: 1, y: 1 }, 10)).toBeNull();
  });

  it("has no solution when the target crosses faster than the shot", () => {
    expect(firingSolution(origin, { x: 0, y: 100 }, { x: 6, y: 0 }, 5)).toBeNull();
  });
});
