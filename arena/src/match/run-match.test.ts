import { describe, expect, it } from "vitest";
import { buildMatchSpec } from "./match-spec.ts";
import { runMatch } from "./run-match.ts";

const smallSpec = buildMatchSpec(4242, { combatantCount: 6, baseCount: 2, maxSimSeconds: 5, tickMs: 50 });

describe("runMatch", () => {
  it("is deterministic for a seed", () => {
    expect(runMatch(smallSpec)).toEqual(runMatch(smallSpec));
  });

  it("accounts for every combatant and every unit of stolen antimatter", () => {
    const result = runMatch(smallSpec);
    expect(result.combatants.start).toBe(6);
    expect(result.combatants.destroyed + result.combatants.remaining).toBe(6);
    const drained = result.bases.reduce((sum, base) => sum + base.antimatterStart - base.antimatterEnd, 0);
    expect(result.antimatterStolen).toBeCloseTo(drained, 6);
    expect(result.bases.map((base) => base.id)).toEqual(["base-1", "base-2"]);
    if (!result.outcome.cleared) {
      expect(result.simSecondsElapsed).toBe(5);
      expect(result.logs[result.logs.length - 1]).toBe("[5.0s] Arena deadline reached");
    }
  });

  it("ends at once with an empty roster", () => {
    const result = runMatch({ ...smallSpec, combatantCount: 0 });
    expect(result.outcome).toEqual({ cleared: true, reason: "All combatants destroyed" });
    expect(result.simSecondsElapsed).toBe(0);
    expect(result.logs).toEqual(["[0.0s] All combatants destroyed"]);
    expect(result.shotsFired).toEqual({ kinetic: 0, phaser: 0, torpedo: 0 });
  });

  it("rejects a non-positive tick", () => {
    expect(() => runMatch({ ...smallSpec, tickMs: 0 })).toThrow("tickMs must be positive, got 0");
  });
});
