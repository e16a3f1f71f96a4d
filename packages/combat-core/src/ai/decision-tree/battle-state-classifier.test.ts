import { describe, expect, it } from "vitest";
import {
  COMBATANT_BATTLE_STATE_TRANSITION_AGE,
  COMBATANT_EVASION_LIMIT,
  COMBATANT_TACTICAL_RANGE,
} from "../../config/balance/combatant.ts";
import { spawn } from "../../gameplay/roster/combatant-factory.ts";
import { makeShip, makeWorld, scriptedRandom } from "../../testing/fixtures.ts";
import { classifyBattleState, updateCombatantState, updateCombatantsState } from "./battle-state-classifier.ts";

const ship = makeShip();
const noDraws = scriptedRandom([]);

describe("classifyBattleState", () => {
  it("is no-battle at exactly the tactical range and beyond", () => {
    expect(classifyBattleState(spawn(COMBATANT_TACTICAL_RANGE, 0), ship, noDraws)).toBe("no-battle");
    expect(classifyBattleState(spawn(COMBATANT_TACTICAL_RANGE + 0.001, 0), ship, noDraws)).toBe("no-battle");
  });

  it("advances between the evasion limit and the tactical range", () => {
    expect(classifyBattleState(spawn(COMBATANT_TACTICAL_RANGE - 0.001, 0), ship, noDraws)).toBe("advancing");
    expect(classifyBattleState(spawn(COMBATANT_EVASION_LIMIT, 0), ship, noDraws)).toBe("advancing");
  });

  it("keeps an unexpired state inside the evasion limit without drawing", () => {
    const combatant = { ...spawn(1_000, 0), battleState: "flank-left" as const, battleStateAge: 500 };
    expect(classifyBattleState(combatant, ship, noDraws)).toBe("flank-left");
  });

  it("re-rolls an expired state uniformly from the state list", () => {
    const combatant = { ...spawn(1_000, 0), battleStateAge: COMBATANT_BATTLE_STATE_TRANSITION_AGE };
    expect(classifyBattleState(combatant, ship, scriptedRandom([0.6]))).toBe("advancing");
    expect(classifyBattleState(combatant, ship, scriptedRandom([0.99]))).toBe("retreating");
    expect(classifyBattleState(combatant, ship, scriptedRandom([0]))).toBe("no-battle");
  });

  it("forces a retreat when antimatter runs low within tactical range", () => {
    expect(classifyBattleState({ ...spawn(1_000, 0), antimatter: 100 }, ship, noDraws)).toBe("retreating");
    expect(classifyBattleState({ ...spawn(COMBATANT_TACTICAL_RANGE, 0), antimatter: 100 }, ship, noDraws)).toBe("retreating");
    expect(classifyBattleState({ ...spawn(COMBATANT_TACTICAL_RANGE + 1, 0), antimatter: 100 }, ship, noDraws)).toBe("no-battle");
  });
});

describe("updateCombatantState", () => {
  it("ages the current state by the elapsed time", () => {
    const next = updateCombatantState(16, ship, { ...spawn(1_000, 0), battleStateAge: 100 }, noDraws);
    expect(next.battleStateAge).toBe(116);
    expect(next.battleState).toBe("no-battle");
  });

  it("resets the age once the transition age is reached, even out of range", () => {
    const far = { ...spawn(60_000, 0), battleStateAge: COMBATANT_BATTLE_STATE_TRANSITION_AGE };
    const next = updateCombatantState(16, ship, far, noDraws);
    expect(next.battleState).toBe("no-battle");
    expect(next.battleStateAge).toBe(0);
  });

  it("leaves the input world untouched", () => {
    const world = makeWorld({ combatants: [spawn(30_000, 0)] });
    const next = updateCombatantsState(10, world, noDraws);
    expect(world.combatants[0].battleState).toBe("no-battle");
    expect(next.combatants[0].battleState).toBe("advancing");
    expect(next.combatants[0].battleStateAge).toBe(10);
  });
});
