import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { TheftPolicy } from "../../../packages/combat-core/src/types.ts";

export type ArenaDefaults = {
  maxSimSeconds?: number;
  tickMs?: number;
  combatantCount?: number;
  baseCount?: number;
  baseAntimatter?: number;
  theftPolicy?: TheftPolicy;
  gunneryCadenceMs?: number;
  gunneryRange?: number;
  patrolSpeed?: number;
  grpcPort?: number;
};

export type ArenaConfigSource = {
  cwd?: string;
  env?: Record<string, string | undefined>;
};

function readJsonFile(path: string): unknown {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function asNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function asTheftPolicy(value: unknown): TheftPolicy | undefined {
  return value === "exclusive" || value === "cumulative" ? value : undefined;
}

export function loadArenaDefaults(source: ArenaConfigSource = {}): ArenaDefaults {
  const configPath = resolve(source.cwd ?? process.cwd(), "arena.config.json");
  const cfg = existsSync(configPath) ? asRecord(readJsonFile(configPath)) : {};

  const env = source.env ?? process.env;

  const pick = (key: keyof ArenaDefaults, envName: string): number | undefined => {
    return asNumber(env[envName]) ?? asNumber(cfg[key]);
  };

  return {
    maxSimSeconds: pick("maxSimSeconds", "ARENA_MAX_SIM_SECONDS"),
    tickMs: pick("tickMs", "ARENA_TICK_MS"),
    combatantCount: pick("combatantCount", "ARENA_COMBATANT_COUNT"),
    baseCount: pick("baseCount", "ARENA_BASE_COUNT"),
    baseAntimatter: pick("baseAntimatter", "ARENA_BASE_ANTIMATTER"),
    theftPolicy: asTheftPolicy(env.ARENA_THEFT_POLICY) ?? asTheftPolicy(cfg.theftPolicy),
    gunneryCadenceMs: pick("gunneryCadenceMs", "ARENA_GUNNERY_CADENCE_MS"),
    gunneryRange: pick("gunneryRange", "ARENA_GUNNERY_RANGE"),
    patrolSpeed: pick("patrolSpeed", "ARENA_PATROL_SPEED"),
    grpcPort: pick("grpcPort", "ARENA_GRPC_PORT"),
  };
}
