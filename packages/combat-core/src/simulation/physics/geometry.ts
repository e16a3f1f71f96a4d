export interface Positioned {
  readonly x: number;
  readonly y: number;
}

export function distance(a: Positioned, b: Positioned): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Bearing from `from` to `to` in degrees, normalized to [0, 360).
 * Coincident points have no bearing and yield 0.
 */
export function angleDegrees(from: Positioned, to: Positioned): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  if (dx === 0 && dy === 0) {
    return 0;
  }
  const degrees = toDegrees(Math.atan2(dy, dx));
  return degrees < 0 ? degrees + 360 : degrees;
}
