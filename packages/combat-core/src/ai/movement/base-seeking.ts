import { COMBATANT_THRUST } from "../../config/balance/combatant.ts";
import { angleDegrees, distance, toRadians, type Positioned } from "../../simulation/physics/geometry.ts";
import { fromAngular } from "../../simulation/physics/vector-math.ts";
import type { Base, Combatant, World } from "../../types.ts";

export function findNearest<T extends Positioned>(from: Positioned, candidates: ReadonlyArray<T>): T | null {
  let nearest: T | null = null;
  let nearestDistance = Infinity;
  for (const candidate of candidates) {
    const d = distance(from, candidate);
    if (d < nearestDistance) {
      nearest = candidate;
      nearestDistance = d;
    }
  }
  return nearest;
}

export function thrustToNearestBase(combatant: Combatant, bases: ReadonlyArray<Base>): Combatant {
  if (combatant.battleState !== "no-battle") {
    return combatant;
  }
  const nearest = findNearest(combatant, bases);
  if (!nearest) {
    return combatant;
  }
  const thrust = fromAngular(COMBATANT_THRUST, toRadians(angleDegrees(combatant, nearest)));
  return { ...combatant, thrust };
}

export function updateThrustTowardsNearestBase(world: World): World {
  if (world.bases.length === 0) {
    return world;
  }
  return { ...world, combatants: world.combatants.map((combatant) => thrustToNearestBase(combatant, world.bases)) };
}
