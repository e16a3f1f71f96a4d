import type { BattleState } from "../../types.ts";

export const COMBATANT_SHIELDS = 200;
export const COMBATANT_ANTIMATTER = 1_000;
export const COMBATANT_KINETICS = 20;
export const COMBATANT_TORPEDOS = 5;

// Shields: units per ms, antimatter per shield unit
export const COMBATANT_SHIELD_RECHARGE_RATE = 0.002;
export const COMBATANT_SHIELD_RECHARGE_COST = 5;

// Motion
export const COMBATANT_THRUST = 0.004;
export const COMBATANT_DRAG = 0.9995;

// Tactics
export const COMBATANT_TACTICAL_RANGE = 50_000;
export const COMBATANT_EVASION_LIMIT = 25_000;
export const COMBATANT_BATTLE_STATE_TRANSITION_AGE = 10_000;
export const COMBATANT_ANTIMATTER_RUNAWAY_THRESHOLD = 100;

export const BATTLE_STATES: ReadonlyArray<BattleState> = [
  "no-battle",
  "flank-left",
  "flank-right",
  "advancing",
  "retreating",
];

export const BATTLE_STATE_THRUST_OFFSET_DEG: Readonly<Record<BattleState, number>> = {
  "no-battle": 0,
  "flank-left": 90,
  "flank-right": -90,
  advancing: 10,
  retreating: 190,
};

// Wreckage
export const COMBATANT_DEBRIS = 100;

// Percent of ticks on which firing is held back.
export const COMBATANT_FIRE_SUPPRESSION_PERCENT = 95;
