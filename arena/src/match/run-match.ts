import { SHIP_DOCKING_DISTANCE } from "../../../packages/combat-core/src/config/balance/battlefield.ts";
import { mulberry32 } from "../../../packages/combat-core/src/core/rng/seeded-rng.ts";
import { updatePerSecond, updatePerTick } from "../../../packages/combat-core/src/gameplay/battle/combatant-pipeline.ts";
import { initialize } from "../../../packages/combat-core/src/gameplay/roster/combatant-factory.ts";
import type { Base, CombatantWeapon, World } from "../../../packages/combat-core/src/types.ts";
import { attachPhaserHit } from "./gunnery.ts";
import type { BaseOutcome, MatchResult, MatchSpec } from "./match-types.ts";
import { advancePatrol, createPatrolShip, placeBases } from "./patrol.ts";

const MS_PER_SECOND = 1000;

export const DEFAULT_MATCH_SPEC: Omit<MatchSpec, "seed"> = {
  maxSimSeconds: 240,
  tickMs: 1000 / 60,
  combatantCount: 50,
  baseCount: 5,
  baseAntimatter: 5_000,
  theftPolicy: "exclusive",
  gunnery: { cadenceMs: 500, range: 9_000 },
  patrol: { speed: 5, turnRateDegPerMs: 0.09 },
};

function formatSeconds(ms: number): string {
  return `${(ms / MS_PER_SECOND).toFixed(1)}s`;
}

function totalAntimatter(bases: ReadonlyArray<Base>): number {
  return bases.reduce((sum, base) => sum + base.antimatter, 0);
}

/** Ship starts at the first base, or mid-field without any. */
export function createMatchWorld(spec: MatchSpec): World {
  const rng = mulberry32((spec.seed ^ 0x5eed) >>> 0);
  const bases = placeBases(rng, spec.baseCount, spec.baseAntimatter);
  const home = bases[0] ?? { x: 250_000, y: 250_000 };
  return {
    combatants: [],
    ship: createPatrolShip(home.x, home.y + SHIP_DOCKING_DISTANCE * 2),
    bases,
    shots: [],
    explosions: [],
    clouds: [],
    gameOver: false,
  };
}

export function runMatch(spec: MatchSpec): MatchResult {
  if (!(spec.tickMs > 0)) {
    throw new Error(`tickMs must be positive, got ${spec.tickMs}`);
  }
  const rng = mulberry32(spec.seed);
  let world: World = { ...createMatchWorld(spec), combatants: initialize(rng, spec.combatantCount) };

  const logs: string[] = [];
  const shotsFired: Record<CombatantWeapon, number> = { kinetic: 0, phaser: 0, torpedo: 0 };
  const baseStart = world.bases.map((base) => ({ id: base.id, antimatter: base.antimatter }));
  const start = world.combatants.length;
  const deadlineMs = spec.maxSimSeconds * MS_PER_SECOND;

  let t = 0;
  let waypointIndex = 0;
  let secondTimer = 0;
  let gunneryTimer = 0;
  let destroyed = 0;
  let hitsLanded = 0;
  let antimatterStolen = 0;

  while (t < deadlineMs && world.combatants.length > 0) {
    const patrol = advancePatrol(world.ship, world.bases, waypointIndex, spec.patrol, spec.tickMs);
    waypointIndex = patrol.waypointIndex;
    world = { ...world, ship: patrol.ship };

    gunneryTimer += spec.tickMs;
    if (gunneryTimer >= spec.gunnery.cadenceMs) {
      gunneryTimer = 0;
      const fired = attachPhaserHit(world, spec.gunnery.range);
      world = fired.world;
      if (fired.targetIndex !== null) {
        hitsLanded += 1;
      }
    }

    world = updatePerTick(spec.tickMs, world, rng);
    t += spec.tickMs;

    // The arena is the downstream consumer of shots and wreckage: tally, then drain.
    for (const shot of world.shots) {
      shotsFired[shot.weapon] += 1;
    }
    for (const explosion of world.explosions) {
      destroyed += 1;
      logs.push(`[${formatSeconds(t)}] combatant destroyed at (${Math.round(explosion.x)}, ${Math.round(explosion.y)})`);
    }
    world = { ...world, shots: [], explosions: [], clouds: [] };

    secondTimer += spec.tickMs;
    if (secondTimer >= MS_PER_SECOND) {
      secondTimer -= MS_PER_SECOND;
      const before = world.bases;
      world = updatePerSecond(world, { theftPolicy: spec.theftPolicy });
      const stolen = totalAntimatter(before) - totalAntimatter(world.bases);
      if (stolen > 0) {
        antimatterStolen += stolen;
        logs.push(`[${formatSeconds(t)}] ${stolen.toFixed(1)} antimatter stolen from bases`);
      }
    }
  }

  const cleared = world.combatants.length === 0;
  const reason = cleared ? "All combatants destroyed" : "Arena deadline reached";
  logs.push(`[${formatSeconds(t)}] ${reason}`);

  const bases: BaseOutcome[] = baseStart.map((entry) => ({
    id: entry.id,
    antimatterStart: entry.antimatter,
    antimatterEnd: world.bases.find((base) => base.id === entry.id)?.antimatter ?? 0,
  }));

  return {
    spec,
    simSecondsElapsed: t / MS_PER_SECOND,
    outcome: { cleared, reason },
    combatants: { start, destroyed, remaining: world.combatants.length },
    shotsFired,
    hitsLanded,
    antimatterStolen,
    bases,
    logs,
  };
}
