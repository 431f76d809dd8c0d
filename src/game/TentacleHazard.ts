import { Logger } from '../core/Logger';
import { lerp, normalize, scale, type Vec2 } from '../core/vector';
import { aabbFromCenter, overlaps, type Aabb } from '../physics/Aabb';
import { TENTACLE_TUNING, validateTentacleTuning, withTuning, type TentacleTuning } from '../config/tuning';
import { FrameClock } from './FrameClock';
import { TimerBank } from './TimerBank';
import type { EventBus } from '../core/EventBus';
import type { DamageSink, TentacleState } from './types';

/** What a tentacle can strike: something with a body that accepts damage. */
export interface ContactTarget extends DamageSink {
  bounds(): Aabb;
}

/**
 * Telegraphed ground attack spawned by the boss.
 * Hazard gating is frame-driven: the collider is live from the activation frame
 * through the deactivation frame, whatever the wall-clock time.
 */
export class TentacleHazard {
  readonly id: string;
  /** Ground anchor; the collider grows upward from here. */
  readonly position: Vec2;
  readonly tuning: TentacleTuning;
  /** False when the configuration was rejected. */
  readonly enabled: boolean;
  private _state: TentacleState = 'WARMING_UP';
  private readonly clock: FrameClock;
  private readonly timers = new TimerBank(['linger'] as const);
  private colliderOn = false;
  private hasHit = false;
  private lingering = false;
  private destroyed = false;
  private visualScale: number;
  private readonly events: EventBus | null;

  constructor(id: string, position: Vec2, opts: { tuning?: Partial<TentacleTuning>; events?: EventBus } = {}) {
    this.id = id;
    this.position = { ...position };
    this.tuning = withTuning(TENTACLE_TUNING, opts.tuning);
    this.events = opts.events ?? null;
    this.clock = new FrameClock(this.tuning.frameRate, this.tuning.frameCount);
    this.visualScale = this.tuning.activeScaleStart;

    const problems = validateTentacleTuning(this.tuning);
    this.enabled = problems.length === 0;
    if (!this.enabled) {
      for (const p of problems) Logger.error(`[TentacleHazard] ${id}: ${p}`);
      this.destroy();
      return;
    }
    const { activationFrame, deactivationFrame, frameCount } = this.tuning;
    if (activationFrame >= frameCount || deactivationFrame >= frameCount) {
      Logger.error(`[TentacleHazard] ${id}: frame index out of range (activation=${activationFrame}, deactivation=${deactivationFrame}, frames=${frameCount})`);
      this.destroy();
    }
  }

  get state(): TentacleState {
    return this._state;
  }

  get frame(): number {
    return this.clock.index;
  }

  get isActive(): boolean {
    return this.colliderOn;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  get hitLanded(): boolean {
    return this.hasHit;
  }

  /** Visual scale parameter; interpolated across the active window. */
  get scale(): number {
    return this.visualScale;
  }

  bounds(): Aabb {
    const h = this.tuning.size.y * this.visualScale;
    return aabbFromCenter({ x: this.position.x, y: this.position.y + h / 2 }, { x: this.tuning.size.x, y: h });
  }

  update(dtSec: number): void {
    if (this.destroyed) return;
    const t = this.tuning;

    switch (this._state) {
      case 'WARMING_UP':
        this.clock.step(dtSec);
        if (this.clock.index >= t.activationFrame) {
          this.colliderOn = true;
          this.hasHit = false;
          this.setState('ACTIVE');
        }
        break;
      case 'ACTIVE': {
        this.clock.step(dtSec);
        const span = t.deactivationFrame - t.activationFrame;
        const progress = span > 0 ? (this.clock.index - t.activationFrame) / span : 1;
        this.visualScale = lerp(t.activeScaleStart, t.activeScaleEnd, progress);
        if (this.clock.index > t.deactivationFrame) {
          this.colliderOn = false;
          this.clock.seek(t.deactivationFrame);
          this.lingering = true;
          this.timers.set('linger', t.lingerDuration);
          this.setState('RETRACTING');
        }
        break;
      }
      case 'RETRACTING':
        if (this.lingering) {
          this.timers.tick(dtSec);
          if (this.timers.isActive('linger')) break;
          this.lingering = false;
        }
        this.clock.step(dtSec);
        if (this.clock.finished) {
          this.setState('DONE');
          this.destroy();
        }
        break;
      case 'DONE':
        break;
    }
  }

  /**
   * One strike per activation: a live collider overlapping `target` deals the
   * configured damage and knockback, then latches the hit flag.
   */
  tryContact(target: ContactTarget): boolean {
    if (!this.colliderOn || this.hasHit || this.destroyed) return false;
    if (!overlaps(this.bounds(), target.bounds())) return false;
    this.hasHit = true;
    const knockback = scale(normalize(this.tuning.knockbackDirection), this.tuning.knockbackForce);
    target.takeDamage(this.tuning.damage, knockback);
    return true;
  }

  destroy(): void {
    this.colliderOn = false;
    this.destroyed = true;
  }

  private setState(next: TentacleState): void {
    const prev = this._state;
    this._state = next;
    Logger.debug(`[TentacleHazard] ${this.id} ${prev} -> ${next} @frame ${this.clock.index}`);
    this.events?.emit('stateChanged', { actorId: this.id, kind: 'HAZARD', from: prev, to: next });
  }
}
