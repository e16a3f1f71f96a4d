import { angleDegrees, type Positioned } from "../../simulation/physics/geometry.ts";
import { add, dot, magnitude, scale, sub, ZERO } from "../../simulation/physics/vector-math.ts";
import type { Vec2 } from "../../types.ts";

/**
 * Launch bearing (degrees) for a fixed-speed shot that intercepts a target
 * moving at constant velocity.
 *
 * The target velocity is split along the line of sight. The shot matches the
 * cross-track part, so the target does not drift off the line of fire, and
 * spends the rest of its speed closing along the line of sight.
 *
 * Returns null when shooter and target coincide, or when the target's
 * cross-track speed leaves nothing to close with.
 */
export function firingSolution(shooter: Positioned, target: Positioned, targetVelocity: Vec2, shotSpeed: number): number | null {
  const lineOfSight = sub(target, shooter);
  const range = magnitude(lineOfSight);
  if (range === 0) {
    return null;
  }
  const ab = scale(lineOfSight, 1 / range);
  const along = scale(ab, dot(targetVelocity, ab));
  const across = sub(targetVelocity, along);
  const acrossSpeed = magnitude(across);
  if (acrossSpeed >= shotSpeed) {
    return null;
  }
  // v² − vi²: matching the cross-track drift uses up part of the fixed shot speed.
  const closing = scale(ab, Math.sqrt(shotSpeed * shotSpeed - acrossSpeed * acrossSpeed));
  return angleDegrees(ZERO, add(closing, across));
}
