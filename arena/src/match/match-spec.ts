import type { TheftPolicy } from "../../../packages/combat-core/src/types.ts";
import { asTheftPolicy, type ArenaDefaults } from "../config/arena-config.ts";
import type { MatchSpec } from "./match-types.ts";
import { DEFAULT_MATCH_SPEC } from "./run-match.ts";

export type MatchOverrides = {
  maxSimSeconds?: number;
  tickMs?: number;
  combatantCount?: number;
  baseCount?: number;
  baseAntimatter?: number;
  theftPolicy?: TheftPolicy;
  gunneryCadenceMs?: number;
  gunneryRange?: number;
  patrolSpeed?: number;
};

function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}

/** Overrides win over arena defaults, which win over the built-in match spec. */
export function buildMatchSpec(seed: number, overrides: MatchOverrides = {}, defaults: ArenaDefaults = {}): MatchSpec {
  const base = DEFAULT_MATCH_SPEC;
  return {
    seed: Math.floor(seed) >>> 0,
    maxSimSeconds: finiteOr(overrides.maxSimSeconds ?? defaults.maxSimSeconds, base.maxSimSeconds),
    tickMs: finiteOr(overrides.tickMs ?? defaults.tickMs, base.tickMs),
    combatantCount: Math.max(0, Math.floor(finiteOr(overrides.combatantCount ?? defaults.combatantCount, base.combatantCount))),
    baseCount: Math.max(0, Math.floor(finiteOr(overrides.baseCount ?? defaults.baseCount, base.baseCount))),
    baseAntimatter: finiteOr(overrides.baseAntimatter ?? defaults.baseAntimatter, base.baseAntimatter),
    theftPolicy: overrides.theftPolicy ?? defaults.theftPolicy ?? base.theftPolicy,
    gunnery: {
      cadenceMs: finiteOr(overrides.gunneryCadenceMs ?? defaults.gunneryCadenceMs, base.gunnery.cadenceMs),
      range: finiteOr(overrides.gunneryRange ?? defaults.gunneryRange, base.gunnery.range),
    },
    patrol: {
      speed: finiteOr(overrides.patrolSpeed ?? defaults.patrolSpeed, base.patrol.speed),
      turnRateDegPerMs: base.patrol.turnRateDegPerMs,
    },
  };
}

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === "object" ? Reflect.get(value, key) : undefined;
}

function requireNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${path} must be a finite number`);
  }
  return value;
}

/** Reads a match spec back from a stored result or spec file. */
export function parseMatchSpec(value: unknown): MatchSpec {
  const theftPolicy = asTheftPolicy(field(value, "theftPolicy"));
  if (!theftPolicy) {
    throw new Error("spec.theftPolicy must be \"exclusive\" or \"cumulative\"");
  }
  const gunnery = field(value, "gunnery");
  const patrol = field(value, "patrol");
  return {
    seed: requireNumber(field(value, "seed"), "spec.seed"),
    maxSimSeconds: requireNumber(field(value, "maxSimSeconds"), "spec.maxSimSeconds"),
    tickMs: requireNumber(field(value, "tickMs"), "spec.tickMs"),
    combatantCount: requireNumber(field(value, "combatantCount"), "spec.combatantCount"),
    baseCount: requireNumber(field(value, "baseCount"), "spec.baseCount"),
    baseAntimatter: requireNumber(field(value, "baseAntimatter"), "spec.baseAntimatter"),
    theftPolicy,
    gunnery: {
      cadenceMs: requireNumber(field(gunnery, "cadenceMs"), "spec.gunnery.cadenceMs"),
      range: requireNumber(field(gunnery, "range"), "spec.gunnery.range"),
    },
    patrol: {
      speed: requireNumber(field(patrol, "speed"), "spec.patrol.speed"),
      turnRateDegPerMs: requireNumber(field(patrol, "turnRateDegPerMs"), "spec.patrol.turnRateDegPerMs"),
    },
  };
}
