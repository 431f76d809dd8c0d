import { DOWN, equals, type Vec2 } from '../../core/vector';
import { aabbFromCenter, type Aabb } from '../../physics/Aabb';
import { TimerBank } from '../TimerBank';
import type { DamageSource } from '../types';
import type { Hittable } from './Hittable';

export interface HitVolumeSpec {
  owner: DamageSource;
  damage: number;
  /** Attack direction; exactly DOWN marks a pogo-capable down-slash. */
  direction: Vec2;
  /** Center offset from the owner's position; the volume follows its owner. */
  offset: Vec2;
  size: Vec2;
  activeDuration: number;
  /** Time the spent volume stays around for renderers after it stops hitting. */
  lingerDuration?: number;
}

/** Something a hit volume may overlap. A null hittable means "not a valid target". */
export interface HitCandidate {
  readonly id: string;
  readonly hittable: Hittable | null;
}

export interface HitOutcome {
  confirmed: true;
  direction: Vec2;
}

export interface PogoOutcome {
  strength: number;
}

export interface HitResult {
  hit: HitOutcome;
  pogo: PogoOutcome | null;
}

/**
 * Transient owner-attributed damage region ("hurtbox").
 * Within one activation a target is hit at most once; the visited set is
 * cleared only by activate().
 */
export class HitVolume {
  readonly id: number;
  readonly owner: DamageSource;
  readonly damage: number;
  readonly direction: Vec2;
  readonly offset: Vec2;
  readonly size: Vec2;
  readonly activeDuration: number;
  private readonly lingerDuration: number;
  private readonly visited = new Set<string>();
  private readonly timers = new TimerBank(['active', 'linger'] as const);
  private active = false;
  private destroyed = false;

  constructor(id: number, spec: HitVolumeSpec) {
    this.id = id;
    this.owner = spec.owner;
    this.damage = spec.damage;
    this.direction = { x: spec.direction.x, y: spec.direction.y };
    this.offset = { x: spec.offset.x, y: spec.offset.y };
    this.size = { x: spec.size.x, y: spec.size.y };
    this.activeDuration = spec.activeDuration;
    this.lingerDuration = Math.max(0, spec.lingerDuration ?? 0);
    if (this.activeDuration > 0) {
      this.activate();
    } else {
      this.destroyed = true; // inert
    }
  }

  get isActive(): boolean {
    return this.active;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Distinct targets hit during the current activation. */
  get hitCount(): number {
    return this.visited.size;
  }

  hasHit(targetId: string): boolean {
    return this.visited.has(targetId);
  }

  bounds(): Aabb {
    const p = this.owner.position;
    return aabbFromCenter({ x: p.x + this.offset.x, y: p.y + this.offset.y }, this.size);
  }

  /** (Re)start an activation window with an empty visited set. */
  activate(): void {
    if (this.activeDuration <= 0 || this.destroyed) return;
    this.active = true;
    this.visited.clear();
    this.timers.set('active', this.activeDuration);
    this.timers.consume('linger');
  }

  update(dtSec: number): void {
    if (this.destroyed) return;
    this.timers.tick(dtSec);
    if (this.active) {
      if (this.timers.isActive('active')) return;
      this.active = false;
      this.timers.set('linger', this.lingerDuration);
      if (this.lingerDuration > 0) return;
    }
    if (!this.timers.isActive('linger')) this.destroyed = true;
  }

  /**
   * Resolve an overlap with `candidate`. Returns null when the overlap is not a hit:
   * volume inactive, candidate is the owner, already visited, or no usable Hittable.
   */
  tryHit(candidate: HitCandidate): HitResult | null {
    if (!this.active) return null;
    if (candidate.id === this.owner.id) return null;
    if (this.visited.has(candidate.id)) return null;
    const target = candidate.hittable;
    if (!target || !target.enabled) return null;

    target.takeHit(this.damage);
    this.visited.add(candidate.id);
    this.owner.reportHit(this.direction);

    let pogo: PogoOutcome | null = null;
    if (equals(this.direction, DOWN)) {
      pogo = { strength: target.pogoStrength };
      this.owner.reportDownwardHit(target.pogoStrength);
    }
    return { hit: { confirmed: true, direction: this.direction }, pogo };
  }
}
