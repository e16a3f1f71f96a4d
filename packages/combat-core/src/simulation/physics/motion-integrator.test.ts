import { describe, expect, it } from "vitest";
import { spawn } from "../../gameplay/roster/combatant-factory.ts";
import { makeShip, makeWorld } from "../../testing/fixtures.ts";
import { accelerate, calcDrag, drag, move, thrustIfBattle, updateCombatantMotion } from "./motion-integrator.ts";

const ship = makeShip({ x: 1_000, y: 0 });

describe("thrustIfBattle", () => {
  it("thrusts straight at the ship outside of battle", () => {
    const next = thrustIfBattle(ship, spawn(0, 0));
    expect(next.thrust.x).toBeCloseTo(0.004, 12);
    expect(next.thrust.y).toBeCloseTo(0, 12);
  });

  it("turns the thrust by the battle state offset", () => {
    const flanking = thrustIfBattle(ship, { ...spawn(0, 0), battleState: "flank-left" });
    expect(flanking.thrust.x).toBeCloseTo(0, 12);
    expect(flanking.thrust.y).toBeCloseTo(0.004, 12);

    const retreating = thrustIfBattle(ship, { ...spawn(0, 0), battleState: "retreating" });
    expect(retreating.thrust.x).toBeCloseTo(0.004 * Math.cos((190 * Math.PI) / 180), 12);
    expect(retreating.thrust.y).toBeCloseTo(0.004 * Math.sin((190 * Math.PI) / 180), 12);
  });

  it("weakens with shields and is capped by antimatter", () => {
    expect(thrustIfBattle(ship, { ...spawn(0, 0), shields: 100 }).thrust.x).toBeCloseTo(0.002, 12);
    expect(thrustIfBattle(ship, { ...spawn(0, 0), antimatter: 0.001 }).thrust.x).toBeCloseTo(0.001, 12);
  });

  it("keeps the previous thrust beyond tactical range", () => {
    const far = { ...spawn(0, 0), thrust: { x: 1, y: 2 } };
    expect(thrustIfBattle(makeShip({ x: 60_000, y: 0 }), far)).toBe(far);
  });
});

describe("integration", () => {
  it("accelerates, moves, then drags", () => {
    const start = { ...spawn(0, 0), velocity: { x: 1, y: 0 }, thrust: { x: 0.01, y: 0 } };
    const accelerated = accelerate(10, start);
    expect(accelerated.velocity.x).toBeCloseTo(1.1, 12);
    const moved = move(10, accelerated);
    expect(moved.x).toBeCloseTo(11, 12);
    const dragged = drag(10, moved);
    expect(dragged.velocity.x).toBeCloseTo(1.1 * 0.9950112350131177, 12);
  });

  it("applies no drag over zero elapsed time", () => {
    expect(calcDrag(0)).toBe(1);
  });

  it("drags identically whether a second is taken in one step or two", () => {
    expect(calcDrag(500) * calcDrag(500)).toBeCloseTo(calcDrag(1_000), 12);
  });

  it("runs the whole stage over every combatant", () => {
    const world = makeWorld({ ship, combatants: [spawn(0, 0)] });
    const next = updateCombatantMotion(100, world);
    expect(next.combatants[0].velocity.x).toBeCloseTo(0.4 * Math.pow(0.9995, 100), 12);
    expect(next.combatants[0].x).toBeCloseTo(40, 12);
    expect(world.combatants[0].x).toBe(0);
  });
});
