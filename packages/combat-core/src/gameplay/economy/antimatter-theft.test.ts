import { describe, expect, it } from "vitest";
import { SHIP_DOCKING_DISTANCE } from "../../config/balance/battlefield.ts";
import { spawn } from "../roster/combatant-factory.ts";
import { makeWorld } from "../../testing/fixtures.ts";
import { combatantsStealAntimatter, planThefts, resolveThefts, stealAntimatter } from "./antimatter-theft.ts";
import type { Base, World } from "../../types.ts";

function base(id: string, x: number, y: number, antimatter: number): Base {
  return { id, x, y, antimatter };
}

function totalAntimatter(world: World): number {
  let sum = 0;
  for (const combatant of world.combatants) {
    sum += combatant.antimatter;
  }
  for (const entry of world.bases) {
    sum += entry.antimatter;
  }
  return sum;
}

describe("stealAntimatter", () => {
  it("takes the thief's deficit when the base can cover it", () => {
    const { thief, victim, amount } = stealAntimatter({ ...spawn(0, 0), antimatter: 400 }, base("b1", 0, 0, 1_000));
    expect(amount).toBe(600);
    expect(thief.antimatter).toBe(1_000);
    expect(victim.antimatter).toBe(400);
  });

  it("takes the whole reserve when it is smaller than the deficit", () => {
    const { thief, victim, amount } = stealAntimatter({ ...spawn(0, 0), antimatter: 400 }, base("b1", 0, 0, 250));
    expect(amount).toBe(250);
    expect(thief.antimatter).toBe(650);
    expect(victim.antimatter).toBe(0);
  });

  it("never pays antimatter back to a base", () => {
    const { amount } = stealAntimatter({ ...spawn(0, 0), antimatter: 1_200 }, base("b1", 0, 0, 300));
    expect(amount).toBe(0);
  });
});

describe("two thieves docked at one base", () => {
  const world = makeWorld({
    combatants: [{ ...spawn(100, 0), antimatter: 600 }, { ...spawn(0, 100), antimatter: 500 }],
    bases: [base("b1", 0, 0, 700)],
  });

  it("lets only the first thief in roster order rob it under the exclusive policy", () => {
    const next = combatantsStealAntimatter(world, "exclusive");
    expect(next.combatants.map((c) => c.antimatter)).toEqual([1_000, 500]);
    expect(next.bases[0].antimatter).toBe(300);
    expect(totalAntimatter(next)).toBe(totalAntimatter(world));
  });

  it("drains it in roster order against the running balance under the cumulative policy", () => {
    const next = combatantsStealAntimatter(world, "cumulative");
    expect(next.combatants.map((c) => c.antimatter)).toEqual([1_000, 800]);
    expect(next.bases[0].antimatter).toBe(0);
    expect(totalAntimatter(next)).toBe(totalAntimatter(world));
  });
});

describe("one thief docked at two bases", () => {
  const world = makeWorld({
    combatants: [{ ...spawn(0, 0), antimatter: 0 }],
    bases: [base("far", 3_000, 0, 500), base("near", 1_000, 0, 300)],
  });

  it("robs only the nearest base under the exclusive policy", () => {
    const { world: next, thefts } = resolveThefts(world, "exclusive");
    expect(thefts).toEqual([{ combatantIndex: 0, baseIndex: 1, baseId: "near", amount: 300 }]);
    expect(next.combatants[0].antimatter).toBe(300);
    expect(next.bases.map((b) => b.antimatter)).toEqual([500, 0]);
  });

  it("robs both in base order under the cumulative policy", () => {
    const { world: next, thefts } = resolveThefts(world, "cumulative");
    expect(thefts.map((t) => t.amount)).toEqual([500, 300]);
    expect(next.combatants[0].antimatter).toBe(800);
    expect(next.bases.map((b) => b.antimatter)).toEqual([0, 0]);
  });
});

describe("a full thief docked beside a needy one", () => {
  it("does not starve the needy one over repeated passes", () => {
    let world = makeWorld({
      combatants: [spawn(10, 0), { ...spawn(0, 10), antimatter: 100 }],
      bases: [base("b", 0, 0, 5_000)],
    });
    const { thefts } = resolveThefts(world);
    expect(thefts).toEqual([{ combatantIndex: 1, baseIndex: 0, baseId: "b", amount: 900 }]);
    for (let pass = 0; pass < 10; pass += 1) {
      world = combatantsStealAntimatter(world);
    }
    expect(world.combatants.map((c) => c.antimatter)).toEqual([1_000, 1_000]);
    expect(world.bases[0].antimatter).toBe(4_100);
  });
});

describe("planThefts", () => {
  it("hands a second thief the base the first one left", () => {
    const combatants = [{ ...spawn(0, 0), antimatter: 0 }, { ...spawn(10, 0), antimatter: 0 }];
    const bases = [base("a", 500, 0, 1), base("b", 100, 0, 1)];
    expect(planThefts(combatants, bases, "exclusive")).toEqual([
      { combatantIndex: 0, baseIndex: 1 },
      { combatantIndex: 1, baseIndex: 0 },
    ]);
  });

  it("leaves a base to a needy thief when the one earlier in the roster is full", () => {
    const combatants = [spawn(10, 0), { ...spawn(0, 10), antimatter: 100 }];
    expect(planThefts(combatants, [base("b", 0, 0, 5_000)], "exclusive")).toEqual([{ combatantIndex: 1, baseIndex: 0 }]);
  });

  it("skips an empty base for the next nearest one", () => {
    const thief = { ...spawn(0, 0), antimatter: 0 };
    expect(planThefts([thief], [base("empty", 10, 0, 0), base("stocked", 500, 0, 40)], "exclusive")).toEqual([
      { combatantIndex: 0, baseIndex: 1 },
    ]);
  });

  it("ignores a base exactly at docking distance", () => {
    expect(planThefts([spawn(0, 0)], [base("a", SHIP_DOCKING_DISTANCE, 0, 1)], "cumulative")).toEqual([]);
  });

  it("returns the same world when nobody is docked", () => {
    const world = makeWorld({ combatants: [spawn(0, 0)], bases: [base("a", 90_000, 0, 10)] });
    expect(combatantsStealAntimatter(world)).toBe(world);
  });
});
