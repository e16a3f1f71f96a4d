import { mulberry32, type RandomSource } from "../../../packages/combat-core/src/core/rng/seeded-rng.ts";
import { updatePerSecond, updatePerTick } from "../../../packages/combat-core/src/gameplay/battle/combatant-pipeline.ts";
import { initialize } from "../../../packages/combat-core/src/gameplay/roster/combatant-factory.ts";
import { isWorld, validateWorld } from "../../../packages/combat-core/src/state/world-validation.ts";
import { add, scale } from "../../../packages/combat-core/src/simulation/physics/vector-math.ts";
import type { Hit, TheftPolicy, World } from "../../../packages/combat-core/src/types.ts";
import { asTheftPolicy } from "../config/arena-config.ts";
import { buildMatchSpec } from "../match/match-spec.ts";
import { createMatchWorld, DEFAULT_MATCH_SPEC } from "../match/run-match.ts";
import { turnTowards } from "../match/patrol.ts";

const MS_PER_SECOND = 1000;
const MAX_STEPS_PER_CALL = 600;

export type SessionHitCommand = {
  combatant_index?: number;
  weapon?: string;
  damage?: number;
  ranges?: number[];
};

export type SessionCommand = {
  heading_setting?: number;
  ship_velocity?: { x?: number; y?: number };
  hits?: SessionHitCommand[];
};

export type SessionStepResponse = {
  session_id: string;
  tick: number;
  sim_time_seconds: number;
  snapshot_json: string;
  shots_fired: number;
  combatants_destroyed: number;
  terminal: boolean;
  errors: string[];
};

type Session = {
  id: string;
  seed: number;
  createdAtMs: number;
  updatedAtMs: number;
  tick: number;
  tickMs: number;
  secondTimerMs: number;
  simMs: number;
  maxSimSeconds: number;
  theftPolicy: TheftPolicy;
  rng: RandomSource;
  world: World;
};

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === "object" ? Reflect.get(value, key) : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.floor(value)));
}

function numbersIn(values: unknown[]): number[] {
  return values.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
}

/** Narrows a decoded `command_json` payload, dropping fields of the wrong shape. */
export function parseSessionCommand(value: unknown): SessionCommand {
  const command: SessionCommand = {};
  const headingSetting = optionalNumber(field(value, "heading_setting"));
  if (headingSetting !== undefined) {
    command.heading_setting = headingSetting;
  }
  const velocity = field(value, "ship_velocity");
  if (velocity !== null && typeof velocity === "object") {
    command.ship_velocity = {
      x: optionalNumber(field(velocity, "x")),
      y: optionalNumber(field(velocity, "y")),
    };
  }
  const hits = field(value, "hits");
  if (Array.isArray(hits)) {
    const entries: unknown[] = hits;
    command.hits = entries.map((entry): SessionHitCommand => {
      const ranges = field(entry, "ranges");
      const weapon = field(entry, "weapon");
      return {
        combatant_index: optionalNumber(field(entry, "combatant_index")),
        weapon: typeof weapon === "string" ? weapon : undefined,
        damage: optionalNumber(field(entry, "damage")),
        ranges: Array.isArray(ranges) ? numbersIn(ranges) : undefined,
      };
    });
  }
  return command;
}

function decodeHit(entry: SessionHitCommand, index: number, errors: string[]): Hit | null {
  const label = `hits[${index}]`;
  if (entry.weapon === "phaser") {
    const ranges = numbersIn(entry.ranges ?? []);
    if (ranges.length === 0) {
      errors.push(`${label}: phaser hit needs at least one range`);
      return null;
    }
    return { weapon: "phaser", ranges };
  }
  if (entry.weapon === "kinetic" || entry.weapon === "torpedo") {
    const damage = optionalNumber(entry.damage);
    if (damage === undefined) {
      errors.push(`${label}: ${entry.weapon} hit needs a damage value`);
      return null;
    }
    return { weapon: entry.weapon, damage };
  }
  errors.push(`${label}: unknown weapon ${String(entry.weapon)}`);
  return null;
}

export class ArenaSessionManager {
  private readonly sessions = new Map<string, Session>();

  /**
   * Starts a session from `config`. A `world` entry replaces the generated
   * battlefield and must pass snapshot validation.
   */
  public createSession(config: unknown): SessionStepResponse {
    const seed = optionalNumber(field(config, "seed")) ?? Date.now() % 1_000_000;
    const spec = buildMatchSpec(seed, {
      maxSimSeconds: optionalNumber(field(config, "maxSimSeconds")),
      tickMs: optionalNumber(field(config, "tickMs")),
      combatantCount: optionalNumber(field(config, "combatantCount")),
      baseCount: optionalNumber(field(config, "baseCount")),
      baseAntimatter: optionalNumber(field(config, "baseAntimatter")),
      theftPolicy: asTheftPolicy(field(config, "theftPolicy")),
    });
    if (!(spec.tickMs > 0)) {
      throw new Error(`tickMs must be positive, got ${spec.tickMs}`);
    }

    const rng = mulberry32(spec.seed);
    const world = this.resolveWorld(field(config, "world"), () => ({
      ...createMatchWorld(spec),
      combatants: initialize(rng, spec.combatantCount),
    }));

    const id = `s_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 10)}`;
    const session: Session = {
      id,
      seed: spec.seed,
      createdAtMs: Date.now(),
      updatedAtMs: Date.now(),
      tick: 0,
      tickMs: spec.tickMs,
      secondTimerMs: 0,
      simMs: 0,
      maxSimSeconds: spec.maxSimSeconds,
      theftPolicy: spec.theftPolicy,
      rng,
      world,
    };
    this.sessions.set(id, session);
    return this.buildResponse(session, []);
  }

  public getSession(sessionId: string): SessionStepResponse {
    const session = this.requireSession(sessionId);
    session.updatedAtMs = Date.now();
    return this.buildResponse(session, []);
  }

  public stepSession(sessionId: string, command: SessionCommand, nSteps: number): SessionStepResponse {
    const session = this.requireSession(sessionId);
    const steps = clampInt(Number(nSteps || 1), 1, MAX_STEPS_PER_CALL);
    const errors: string[] = [];
    session.world = this.applyCommand(session.world, command, errors);
    session.world = { ...session.world, shots: [], explosions: [], clouds: [] };

    for (let i = 0; i < steps; i += 1) {
      if (this.isTerminal(session)) {
        break;
      }
      const ship = session.world.ship;
      const heading = turnTowards(ship.heading, ship.headingSetting, DEFAULT_MATCH_SPEC.patrol.turnRateDegPerMs * session.tickMs);
      const position = add(ship, scale(ship.velocity, session.tickMs));
      session.world = { ...session.world, ship: { ...ship, x: position.x, y: position.y, heading } };

      session.world = updatePerTick(session.tickMs, session.world, session.rng);
      session.tick += 1;
      session.simMs += session.tickMs;
      session.secondTimerMs += session.tickMs;
      if (session.secondTimerMs >= MS_PER_SECOND) {
        session.secondTimerMs -= MS_PER_SECOND;
        session.world = updatePerSecond(session.world, { theftPolicy: session.theftPolicy });
      }
    }
    session.updatedAtMs = Date.now();
    return this.buildResponse(session, errors);
  }

  public closeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private requireSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`session not found: ${sessionId}`);
    }
    return session;
  }

  private resolveWorld(candidate: unknown, generate: () => World): World {
    if (candidate === undefined) {
      return generate();
    }
    const { errors } = validateWorld(candidate);
    if (errors.length > 0) {
      throw new Error(`invalid world: ${errors.join("; ")}`);
    }
    const copy: unknown = JSON.parse(JSON.stringify(candidate));
    if (!isWorld(copy)) {
      throw new Error("invalid world");
    }
    return copy;
  }

  private applyCommand(world: World, command: SessionCommand, errors: string[]): World {
    let ship = world.ship;
    const headingSetting = optionalNumber(command.heading_setting);
    if (headingSetting !== undefined) {
      ship = { ...ship, headingSetting: ((headingSetting % 360) + 360) % 360 };
    }
    if (command.ship_velocity) {
      ship = {
        ...ship,
        velocity: {
          x: optionalNumber(command.ship_velocity.x) ?? ship.velocity.x,
          y: optionalNumber(command.ship_velocity.y) ?? ship.velocity.y,
        },
      };
    }

    const hits = new Map<number, Hit>();
    (command.hits ?? []).forEach((entry, index) => {
      const target = optionalNumber(entry.combatant_index);
      if (target === undefined || !Number.isInteger(target) || target < 0 || target >= world.combatants.length) {
        errors.push(`hits[${index}]: combatant_index out of range`);
        return;
      }
      const hit = decodeHit(entry, index, errors);
      if (hit) {
        hits.set(target, hit);
      }
    });

    const combatants = hits.size === 0
      ? world.combatants
      : world.combatants.map((combatant, index) => {
          const hit = hits.get(index);
          return hit ? { ...combatant, hit } : combatant;
        });
    return { ...world, ship, combatants };
  }

  private isTerminal(session: Session): boolean {
    return session.world.combatants.length === 0 || session.simMs >= session.maxSimSeconds * MS_PER_SECOND;
  }

  private buildResponse(session: Session, errors: string[]): SessionStepResponse {
    const snapshot = {
      schema_version: "skirmish.v1",
      session_id: session.id,
      seed: session.seed,
      tick: session.tick,
      tick_ms: session.tickMs,
      sim_time_seconds: session.simMs / MS_PER_SECOND,
      max_sim_seconds: session.maxSimSeconds,
      theft_policy: session.theftPolicy,
      world: session.world,
    };
    return {
      session_id: session.id,
      tick: session.tick,
      sim_time_seconds: session.simMs / MS_PER_SECOND,
      snapshot_json: JSON.stringify(snapshot),
      shots_fired: session.world.shots.length,
      combatants_destroyed: session.world.explosions.length,
      terminal: this.isTerminal(session),
      errors,
    };
  }
}
