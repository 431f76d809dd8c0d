import type { Vec2 } from '../core/vector';
import type { GroundProbe, GroundSensor, KinematicBody } from '../game/types';
import type { Aabb } from './Aabb';

/** Tolerance for "standing on" a platform top. */
const SKIN = 0.05;

/**
 * Static level solids. Only platform tops matter to the combat core:
 * bodies land on them and ground probes hit them.
 */
export class LevelGeometry implements GroundProbe, GroundSensor {
  private readonly platforms: Aabb[];
  private readonly skin: number;

  constructor(platforms: readonly Aabb[] = [], skin: number = SKIN) {
    this.platforms = platforms.map(p => ({ ...p }));
    this.skin = skin;
  }

  addPlatform(p: Aabb): void {
    this.platforms.push({ ...p });
  }

  getPlatforms(): readonly Aabb[] {
    return this.platforms;
  }

  /** First platform top straight below `origin` within `maxDistance`, or null. */
  castDown(origin: Vec2, maxDistance: number): Vec2 | null {
    let best: number | null = null;
    for (const p of this.platforms) {
      if (origin.x < p.minX || origin.x > p.maxX) continue;
      const drop = origin.y - p.maxY;
      if (drop < 0 || drop > maxDistance) continue;
      if (best === null || p.maxY > best) best = p.maxY;
    }
    return best === null ? null : { x: origin.x, y: best };
  }

  isGrounded(body: KinematicBody): boolean {
    if (body.velocity.y > 0) return false;
    const feet = body.position.y - body.size.y / 2;
    for (const p of this.platforms) {
      if (!this.spans(p, body)) continue;
      if (Math.abs(feet - p.maxY) <= this.skin) return true;
    }
    return false;
  }

  /**
   * Snap a descending body that crossed a platform top during the last
   * integration back onto it. Returns true when a landing was resolved.
   */
  resolveLanding(body: KinematicBody): boolean {
    if (body.velocity.y > 0) return false;
    const half = body.size.y / 2;
    const feet = body.position.y - half;
    const prevFeet = body.previousPosition.y - half;
    let top: number | null = null;
    for (const p of this.platforms) {
      if (!this.spans(p, body)) continue;
      if (prevFeet >= p.maxY - this.skin && feet < p.maxY) {
        if (top === null || p.maxY > top) top = p.maxY;
      }
    }
    if (top === null) return false;
    body.position.y = top + half;
    body.velocity.y = 0;
    return true;
  }

  private spans(p: Aabb, body: KinematicBody): boolean {
    const hw = body.size.x / 2;
    return body.position.x + hw > p.minX && body.position.x - hw < p.maxX;
  }
}
