export type RandomSource = () => number;

export function mulberry32(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomBelow(rng: RandomSource, max: number): number {
  return rng() * max;
}

export function randomInt(rng: RandomSource, max: number): number {
  return Math.floor(rng() * max);
}

export function pickOne<T>(rng: RandomSource, items: ReadonlyArray<T>): T {
  if (items.length === 0) {
    throw new Error("pickOne requires at least one item");
  }
  const index = Math.min(items.length - 1, randomInt(rng, items.length));
  return items[index] ?? items[0];
}
