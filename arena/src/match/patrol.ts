import { KNOWN_SPACE_X, KNOWN_SPACE_Y, SHIP_DOCKING_DISTANCE } from "../../../packages/combat-core/src/config/balance/battlefield.ts";
import { randomInt, type RandomSource } from "../../../packages/combat-core/src/core/rng/seeded-rng.ts";
import { angleDegrees, distance, toRadians, type Positioned } from "../../../packages/combat-core/src/simulation/physics/geometry.ts";
import { clamp, fromAngular, ZERO } from "../../../packages/combat-core/src/simulation/physics/vector-math.ts";
import type { Base, Ship } from "../../../packages/combat-core/src/types.ts";
import type { PatrolSpec } from "./match-types.ts";

export function placeBases(rng: RandomSource, count: number, antimatter: number): Base[] {
  const bases: Base[] = [];
  for (let i = 0; i < count; i += 1) {
    bases.push({
      id: `base-${i + 1}`,
      x: randomInt(rng, KNOWN_SPACE_X),
      y: randomInt(rng, KNOWN_SPACE_Y),
      antimatter,
    });
  }
  return bases;
}

export function createPatrolShip(x: number, y: number): Ship {
  return { x, y, heading: 0, headingSetting: 0, velocity: ZERO };
}

/** Signed shortest turn from `heading` to `target`, in (-180, 180]. */
export function headingDelta(heading: number, target: number): number {
  const delta = (((target - heading) % 360) + 540) % 360 - 180;
  return delta === -180 ? 180 : delta;
}

export function turnTowards(heading: number, target: number, maxTurn: number): number {
  const step = clamp(headingDelta(heading, target), -maxTurn, maxTurn);
  return (((heading + step) % 360) + 360) % 360;
}

export function steerShip(ship: Ship, headingSetting: number, speed: number, turnRateDegPerMs: number, ms: number): Ship {
  const heading = turnTowards(ship.heading, headingSetting, turnRateDegPerMs * ms);
  const velocity = fromAngular(speed, toRadians(heading));
  return {
    x: ship.x + velocity.x * ms,
    y: ship.y + velocity.y * ms,
    heading,
    headingSetting,
    velocity,
  };
}

export function advancePatrol(
  ship: Ship,
  waypoints: ReadonlyArray<Positioned>,
  waypointIndex: number,
  spec: PatrolSpec,
  ms: number,
): { ship: Ship; waypointIndex: number } {
  if (waypoints.length === 0) {
    return { ship, waypointIndex };
  }
  let index = waypointIndex % waypoints.length;
  if (distance(ship, waypoints[index]) < SHIP_DOCKING_DISTANCE) {
    index = (index + 1) % waypoints.length;
  }
  const headingSetting = angleDegrees(ship, waypoints[index]);
  return { ship: steerShip(ship, headingSetting, spec.speed, spec.turnRateDegPerMs, ms), waypointIndex: index };
}
