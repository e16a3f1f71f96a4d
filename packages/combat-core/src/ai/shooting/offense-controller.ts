import { COMBATANT_FIRE_SUPPRESSION_PERCENT, COMBATANT_SHIELDS } from "../../config/balance/combatant.ts";
import { COMBATANT_KINETIC_FIRING_DISTANCE, COMBATANT_WEAPONS } from "../../config/balance/weapons.ts";
import { randomBelow, type RandomSource } from "../../core/rng/seeded-rng.ts";
import { distance } from "../../simulation/physics/geometry.ts";
import { makeShot } from "../../simulation/combat/shot-factory.ts";
import { firingSolution } from "./firing-solution.ts";
import { selectReadyWeapon } from "./weapon-readiness.ts";
import type { Combatant, CombatantWeapon, Ship, Shot, World } from "../../types.ts";

export function chargeWeapons(ms: number, combatant: Combatant, ship: Ship): Combatant {
  if (distance(combatant, ship) >= COMBATANT_KINETIC_FIRING_DISTANCE) {
    return combatant;
  }
  const efficiency = combatant.shields / COMBATANT_SHIELDS;
  return { ...combatant, weaponCharge: combatant.weaponCharge + ms * efficiency };
}

export function shouldDelayShooting(rng: RandomSource): boolean {
  return randomBelow(rng, 100) < COMBATANT_FIRE_SUPPRESSION_PERCENT;
}

export function applyWeaponCosts(combatant: Combatant, weapon: CombatantWeapon): Combatant {
  const stats = COMBATANT_WEAPONS[weapon];
  const paid: Combatant = {
    ...combatant,
    weaponCharge: combatant.weaponCharge - stats.threshold,
    antimatter: combatant.antimatter - stats.power,
  };
  switch (stats.inventory) {
    case "kinetics":
      return { ...paid, kinetics: paid.kinetics - 1 };
    case "torpedos":
      return { ...paid, torpedos: paid.torpedos - 1 };
    case null:
      return paid;
  }
}

export function fireChargedWeapons(
  combatants: ReadonlyArray<Combatant>,
  ship: Ship,
): { combatants: Combatant[]; shots: Shot[] } {
  const fired: Combatant[] = [];
  const shots: Shot[] = [];
  for (const combatant of combatants) {
    const weapon = selectReadyWeapon(combatant, ship);
    const bearing = weapon
      ? firingSolution(combatant, ship, ship.velocity, COMBATANT_WEAPONS[weapon].shotSpeed)
      : null;
    if (!weapon || bearing === null) {
      fired.push(combatant);
      continue;
    }
    shots.push(makeShot(combatant.x, combatant.y, bearing, weapon));
    fired.push(applyWeaponCosts(combatant, weapon));
  }
  return { combatants: fired, shots };
}

export function updateCombatantOffense(ms: number, world: World, rng: RandomSource): World {
  if (world.gameOver) {
    return world;
  }
  const charged = world.combatants.map((combatant) => chargeWeapons(ms, combatant, world.ship));
  if (shouldDelayShooting(rng)) {
    return { ...world, combatants: charged };
  }
  const { combatants, shots } = fireChargedWeapons(charged, world.ship);
  return { ...world, combatants, shots: [...world.shots, ...shots] };
}
