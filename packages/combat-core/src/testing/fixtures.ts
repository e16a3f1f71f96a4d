import type { RandomSource } from "../core/rng/seeded-rng.ts";
import type { Ship, World } from "../types.ts";

export function makeShip(overrides: Partial<Ship> = {}): Ship {
  return {
    x: 0,
    y: 0,
    heading: 0,
    headingSetting: 0,
    velocity: { x: 0, y: 0 },
    ...overrides,
  };
}

export function makeWorld(overrides: Partial<World> = {}): World {
  return {
    combatants: [],
    ship: makeShip(),
    bases: [],
    shots: [],
    explosions: [],
    clouds: [],
    gameOver: false,
    ...overrides,
  };
}

/** Plays back `values` in order and throws once they run out. */
export function scriptedRandom(values: ReadonlyArray<number>): RandomSource {
  let index = 0;
  return () => {
    if (index >= values.length) {
      throw new Error(`scripted random source exhausted after ${values.length} draws`);
    }
    const value = values[index];
    index += 1;
    return value;
  };
}
