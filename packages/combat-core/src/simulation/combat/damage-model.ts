import {
  COMBATANT_BATTLE_STATE_TRANSITION_AGE,
  COMBATANT_DEBRIS,
  COMBATANT_SHIELDS,
  COMBATANT_SHIELD_RECHARGE_COST,
  COMBATANT_SHIELD_RECHARGE_RATE,
} from "../../config/balance/combatant.ts";
import { PHASER_DAMAGE, PHASER_RANGE } from "../../config/balance/weapons.ts";
import { randomBelow, type RandomSource } from "../../core/rng/seeded-rng.ts";
import { makeCombatantExplosion, makeDebrisCloud } from "./wreckage.ts";
import type { Combatant, DebrisCloud, Hit, World } from "../../types.ts";

export function damageByPhasers(ranges: ReadonlyArray<number>): number {
  let total = 0;
  for (const range of ranges) {
    total += PHASER_DAMAGE * (1 - range / PHASER_RANGE);
  }
  return total;
}

export function hitDamage(hit: Hit): number {
  switch (hit.weapon) {
    case "kinetic":
    case "torpedo":
      return hit.damage;
    case "phaser":
      return damageByPhasers(hit.ranges);
  }
}

export function hitCombatant(combatant: Combatant): Combatant {
  const { hit, ...rest } = combatant;
  if (!hit) {
    return rest;
  }
  return {
    ...rest,
    shields: rest.shields - hitDamage(hit),
    // Past the transition age, so the next tick re-rolls the battle state.
    battleStateAge: COMBATANT_BATTLE_STATE_TRANSITION_AGE + 1,
  };
}

export function rechargeShield(ms: number, combatant: Combatant): Combatant {
  const shieldDeficit = COMBATANT_SHIELDS - combatant.shields;
  const maxCharge = ms * COMBATANT_SHIELD_RECHARGE_RATE;
  const charge = Math.min(shieldDeficit, maxCharge, combatant.antimatter / COMBATANT_SHIELD_RECHARGE_COST);
  return {
    ...combatant,
    antimatter: combatant.antimatter - COMBATANT_SHIELD_RECHARGE_COST * charge,
    shields: combatant.shields + charge,
  };
}

function debrisCloudFor(combatant: Combatant, rng: RandomSource): DebrisCloud {
  return makeDebrisCloud(combatant.x, combatant.y, randomBelow(rng, 1) * COMBATANT_DEBRIS);
}

export function updateCombatantDefense(ms: number, world: World, rng: RandomSource): World {
  const damaged = world.combatants.map(hitCombatant);
  const dead = damaged.filter((combatant) => combatant.shields < 0);
  const survivors = damaged.filter((combatant) => combatant.shields >= 0).map((combatant) => rechargeShield(ms, combatant));
  if (dead.length === 0) {
    return { ...world, combatants: survivors };
  }
  return {
    ...world,
    combatants: survivors,
    explosions: [...world.explosions, ...dead.map(makeCombatantExplosion)],
    clouds: [...world.clouds, ...dead.map((combatant) => debrisCloudFor(combatant, rng))],
  };
}
