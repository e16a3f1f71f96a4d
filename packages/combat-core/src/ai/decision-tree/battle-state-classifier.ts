import {
  BATTLE_STATES,
  COMBATANT_ANTIMATTER_RUNAWAY_THRESHOLD,
  COMBATANT_BATTLE_STATE_TRANSITION_AGE,
  COMBATANT_EVASION_LIMIT,
  COMBATANT_TACTICAL_RANGE,
} from "../../config/balance/combatant.ts";
import { pickOne, type RandomSource } from "../../core/rng/seeded-rng.ts";
import { distance } from "../../simulation/physics/geometry.ts";
import type { BattleState, Combatant, Ship, World } from "../../types.ts";

export function isBattleStateExpired(combatant: Combatant): boolean {
  return combatant.battleStateAge >= COMBATANT_BATTLE_STATE_TRANSITION_AGE;
}

export function randomBattleState(rng: RandomSource): BattleState {
  return pickOne(rng, BATTLE_STATES);
}

export function changeExpiredBattleState(combatant: Combatant, rng: RandomSource): BattleState {
  return isBattleStateExpired(combatant) ? randomBattleState(rng) : combatant.battleState;
}

export function classifyBattleState(combatant: Combatant, ship: Ship, rng: RandomSource): BattleState {
  const dist = distance(combatant, ship);
  let next: BattleState;
  if (dist >= COMBATANT_TACTICAL_RANGE) {
    next = "no-battle";
  } else if (dist >= COMBATANT_EVASION_LIMIT) {
    next = "advancing";
  } else {
    next = changeExpiredBattleState(combatant, rng);
  }
  // Low on antimatter and within reach of the ship: run, whatever else applies.
  if (combatant.antimatter <= COMBATANT_ANTIMATTER_RUNAWAY_THRESHOLD && dist <= COMBATANT_TACTICAL_RANGE) {
    return "retreating";
  }
  return next;
}

export function updateCombatantState(ms: number, ship: Ship, combatant: Combatant, rng: RandomSource): Combatant {
  const battleState = classifyBattleState(combatant, ship, rng);
  const battleStateAge = isBattleStateExpired(combatant) ? 0 : combatant.battleStateAge + ms;
  return { ...combatant, battleState, battleStateAge };
}

export function updateCombatantsState(ms: number, world: World, rng: RandomSource): World {
  const combatants = world.combatants.map((combatant) => updateCombatantState(ms, world.ship, combatant, rng));
  return { ...world, combatants };
}
