import { SHIP_DOCKING_DISTANCE } from "../../config/balance/battlefield.ts";
import { COMBATANT_ANTIMATTER } from "../../config/balance/combatant.ts";
import { distance } from "../../simulation/physics/geometry.ts";
import type { Base, Combatant, TheftPolicy, World } from "../../types.ts";

export interface TheftPairing {
  combatantIndex: number;
  baseIndex: number;
}

export interface Theft extends TheftPairing {
  baseId: string;
  amount: number;
}

export function isDocked(combatant: Combatant, base: Base): boolean {
  return distance(combatant, base) < SHIP_DOCKING_DISTANCE;
}

/**
 * Which (combatant, base) pairs steal this pass, in resolution order.
 *
 * "exclusive": combatants in roster order each claim the nearest docked base
 * nobody has claimed yet, so every party appears at most once. Full
 * combatants and empty bases take no part, so they never hold a claim.
 * "cumulative": every docked pair, combatant-major.
 */
export function planThefts(
  combatants: ReadonlyArray<Combatant>,
  bases: ReadonlyArray<Base>,
  policy: TheftPolicy,
): TheftPairing[] {
  const pairings: TheftPairing[] = [];
  if (policy === "cumulative") {
    combatants.forEach((combatant, combatantIndex) => {
      bases.forEach((base, baseIndex) => {
        if (isDocked(combatant, base)) {
          pairings.push({ combatantIndex, baseIndex });
        }
      });
    });
    return pairings;
  }

  const claimed = new Set<number>();
  combatants.forEach((combatant, combatantIndex) => {
    if (COMBATANT_ANTIMATTER - combatant.antimatter <= 0) {
      return;
    }
    let bestIndex = -1;
    let bestDistance = Infinity;
    bases.forEach((base, baseIndex) => {
      if (claimed.has(baseIndex) || base.antimatter <= 0 || !isDocked(combatant, base)) {
        return;
      }
      const d = distance(combatant, base);
      if (d < bestDistance) {
        bestIndex = baseIndex;
        bestDistance = d;
      }
    });
    if (bestIndex >= 0) {
      claimed.add(bestIndex);
      pairings.push({ combatantIndex, baseIndex: bestIndex });
    }
  });
  return pairings;
}

export function stealAntimatter(thief: Combatant, victim: Base): { thief: Combatant; victim: Base; amount: number } {
  const amountNeeded = COMBATANT_ANTIMATTER - thief.antimatter;
  const amount = Math.max(0, Math.min(amountNeeded, victim.antimatter));
  return {
    thief: { ...thief, antimatter: thief.antimatter + amount },
    victim: { ...victim, antimatter: victim.antimatter - amount },
    amount,
  };
}

export function resolveThefts(world: World, policy: TheftPolicy = "exclusive"): { world: World; thefts: Theft[] } {
  const pairings = planThefts(world.combatants, world.bases, policy);
  if (pairings.length === 0) {
    return { world, thefts: [] };
  }
  const combatants = [...world.combatants];
  const bases = [...world.bases];
  const thefts: Theft[] = [];
  for (const { combatantIndex, baseIndex } of pairings) {
    const { thief, victim, amount } = stealAntimatter(combatants[combatantIndex], bases[baseIndex]);
    combatants[combatantIndex] = thief;
    bases[baseIndex] = victim;
    thefts.push({ combatantIndex, baseIndex, baseId: victim.id, amount });
  }
  return { world: { ...world, combatants, bases }, thefts };
}

export function combatantsStealAntimatter(world: World, policy: TheftPolicy = "exclusive"): World {
  return resolveThefts(world, policy).world;
}
