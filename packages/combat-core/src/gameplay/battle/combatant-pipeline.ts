import { updateCombatantsState } from "../../ai/decision-tree/battle-state-classifier.ts";
import { updateThrustTowardsNearestBase } from "../../ai/movement/base-seeking.ts";
import { updateCombatantOffense } from "../../ai/shooting/offense-controller.ts";
import { updateCombatantDefense } from "../../simulation/combat/damage-model.ts";
import { updateCombatantMotion } from "../../simulation/physics/motion-integrator.ts";
import { combatantsStealAntimatter } from "../economy/antimatter-theft.ts";
import type { RandomSource } from "../../core/rng/seeded-rng.ts";
import type { TheftPolicy, World } from "../../types.ts";

export type TickStage = (ms: number, world: World, rng: RandomSource) => World;

export interface NamedTickStage {
  name: "state" | "defense" | "offense" | "motion";
  run: TickStage;
}

/**
 * Order is load-bearing: battle state gates thrust direction and firing,
 * damage must land before weapons are charged, and motion reads the state
 * that was just chosen.
 */
export const PER_TICK_STAGES: ReadonlyArray<NamedTickStage> = [
  { name: "state", run: updateCombatantsState },
  { name: "defense", run: updateCombatantDefense },
  { name: "offense", run: updateCombatantOffense },
  { name: "motion", run: (ms, world) => updateCombatantMotion(ms, world) },
];

export function updatePerTick(ms: number, world: World, rng: RandomSource): World {
  let next = world;
  for (const stage of PER_TICK_STAGES) {
    next = stage.run(ms, next, rng);
  }
  return next;
}

export interface PerSecondOptions {
  theftPolicy?: TheftPolicy;
}

export function updatePerSecond(world: World, options: PerSecondOptions = {}): World {
  return combatantsStealAntimatter(updateThrustTowardsNearestBase(world), options.theftPolicy ?? "exclusive");
}
