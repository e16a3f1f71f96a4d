import type { Vec2 } from "../../types.ts";

export const ZERO: Vec2 = { x: 0, y: 0 };

export const add = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });

export const sub = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y });

export const scale = (v: Vec2, s: number): Vec2 => ({ x: v.x * s, y: v.y * s });

export const dot = (a: Vec2, b: Vec2): number => a.x * b.x + a.y * b.y;

export const magnitude = (v: Vec2): number => Math.hypot(v.x, v.y);

export const fromAngular = (length: number, radians: number): Vec2 => ({
  x: length * Math.cos(radians),
  y: length * Math.sin(radians),
});

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
