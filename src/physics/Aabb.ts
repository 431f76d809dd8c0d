import type { Vec2 } from '../core/vector';

/** Axis-aligned bounding box in world units (y-up). */
export interface Aabb {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export function aabbFromCenter(center: Readonly<Vec2>, size: Readonly<Vec2>): Aabb {
  const hw = size.x / 2, hh = size.y / 2;
  return { minX: center.x - hw, minY: center.y - hh, maxX: center.x + hw, maxY: center.y + hh };
}

/** Touching edges count as overlap. */
export function overlaps(a: Aabb, b: Aabb): boolean {
  return a.minX <= b.maxX && a.maxX >= b.minX && a.minY <= b.maxY && a.maxY >= b.minY;
}

export function containsX(box: Aabb, x: number): boolean {
  return x >= box.minX && x <= box.maxX;
}
