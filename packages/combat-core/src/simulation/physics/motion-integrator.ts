import {
  BATTLE_STATE_THRUST_OFFSET_DEG,
  COMBATANT_DRAG,
  COMBATANT_SHIELDS,
  COMBATANT_TACTICAL_RANGE,
  COMBATANT_THRUST,
} from "../../config/balance/combatant.ts";
import { angleDegrees, distance, toRadians } from "./geometry.ts";
import { add, fromAngular, scale } from "./vector-math.ts";
import type { Combatant, Ship, World } from "../../types.ts";

export function thrustIfBattle(ship: Ship, combatant: Combatant): Combatant {
  if (distance(combatant, ship) > COMBATANT_TACTICAL_RANGE) {
    return combatant;
  }
  const degrees = angleDegrees(combatant, ship) + BATTLE_STATE_THRUST_OFFSET_DEG[combatant.battleState];
  const efficiency = combatant.shields / COMBATANT_SHIELDS;
  const effectiveThrust = Math.min(combatant.antimatter, COMBATANT_THRUST * efficiency);
  return { ...combatant, thrust: fromAngular(effectiveThrust, toRadians(degrees)) };
}

export function accelerate(ms: number, combatant: Combatant): Combatant {
  return { ...combatant, velocity: add(combatant.velocity, scale(combatant.thrust, ms)) };
}

export function move(ms: number, combatant: Combatant): Combatant {
  return { ...combatant, x: combatant.x + combatant.velocity.x * ms, y: combatant.y + combatant.velocity.y * ms };
}

// Exponential decay per ms, so the result does not depend on frame rate.
export function calcDrag(ms: number): number {
  return Math.pow(COMBATANT_DRAG, ms);
}

export function drag(ms: number, combatant: Combatant): Combatant {
  return { ...combatant, velocity: scale(combatant.velocity, calcDrag(ms)) };
}

export function updateCombatantMotion(ms: number, world: World): World {
  const combatants = world.combatants.map((combatant) =>
    drag(ms, move(ms, accelerate(ms, thrustIfBattle(world.ship, combatant)))));
  return { ...world, combatants };
}
