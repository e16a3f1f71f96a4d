export * from "./types.ts";

export * from "./config/balance/battlefield.ts";
export * from "./config/balance/combatant.ts";
export * from "./config/balance/weapons.ts";

export * from "./core/rng/seeded-rng.ts";

export * from "./ai/decision-tree/battle-state-classifier.ts";
export * from "./ai/movement/base-seeking.ts";
export * from "./ai/shooting/firing-solution.ts";
export * from "./ai/shooting/offense-controller.ts";
export * from "./ai/shooting/weapon-readiness.ts";

export * from "./simulation/combat/damage-model.ts";
export * from "./simulation/combat/shot-factory.ts";
export * from "./simulation/combat/wreckage.ts";
export * from "./simulation/physics/geometry.ts";
export * from "./simulation/physics/motion-integrator.ts";
export * from "./simulation/physics/vector-math.ts";

export * from "./gameplay/battle/combatant-pipeline.ts";
export * from "./gameplay/economy/antimatter-theft.ts";
export * from "./gameplay/roster/combatant-factory.ts";

export * from "./state/world-validation.ts";
