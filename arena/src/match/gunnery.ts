import { distance } from "../../../packages/combat-core/src/simulation/physics/geometry.ts";
import type { World } from "../../../packages/combat-core/src/types.ts";

/**
 * Stands in for the player's fire control: the nearest unhit combatant within
 * `range` of the ship takes a single phaser beam at its current distance.
 */
export function attachPhaserHit(world: World, range: number): { world: World; targetIndex: number | null } {
  let targetIndex: number | null = null;
  let targetDistance = Infinity;
  for (let index = 0; index < world.combatants.length; index += 1) {
    const combatant = world.combatants[index];
    if (combatant.hit) {
      continue;
    }
    const d = distance(combatant, world.ship);
    if (d <= range && d < targetDistance) {
      targetIndex = index;
      targetDistance = d;
    }
  }
  if (targetIndex === null) {
    return { world, targetIndex };
  }
  const hitIndex = targetIndex;
  const combatants = world.combatants.map((combatant, index) =>
    index === hitIndex ? { ...combatant, hit: { weapon: "phaser" as const, ranges: [targetDistance] } } : combatant);
  return { world: { ...world, combatants }, targetIndex };
}
