/** Plain 2D vector. World space is y-up: positive y points toward the sky. */
export interface Vec2 {
  x: number;
  y: number;
}

export const ZERO: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });
export const UP: Readonly<Vec2> = Object.freeze({ x: 0, y: 1 });
export const DOWN: Readonly<Vec2> = Object.freeze({ x: 0, y: -1 });

export function vec(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/** Unit vector in the direction of v; the zero vector stays zero. */
export function normalize(v: Vec2): Vec2 {
  const len = Math.hypot(v.x, v.y);
  if (len === 0) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

/**
 * Exact component equality. Attack-direction classification relies on this
 * (a down-slash is exactly DOWN), so no tolerance is applied.
 */
export function equals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Move `current` toward `target` by at most `maxDelta`. */
export function moveTowards(current: number, target: number, maxDelta: number): number {
  if (Math.abs(target - current) <= maxDelta) return target;
  return current + Math.sign(target - current) * maxDelta;
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * Math.max(0, Math.min(1, t));
}
