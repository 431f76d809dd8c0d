import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import { distance, normalize, scale, type Vec2 } from '../core/vector';
import { aabbFromCenter, overlaps, type Aabb } from '../physics/Aabb';
import { DRONE_TUNING, withTuning, type DroneTuning } from '../config/tuning';
import { TimerBank } from './TimerBank';
import { Hittable } from './combat/Hittable';
import { NullAudioOutput, type AudioOutput } from './SoundManager';
import type { ContactTarget } from './TentacleHazard';
import type { DroneState } from './types';

/** Within this distance of a patrol end the drone snaps and turns. */
const ARRIVE_EPSILON = 0.15;

export interface DroneOptions {
  id: string;
  position: Vec2;
  tuning?: Partial<DroneTuning>;
  events?: EventBus;
  audio?: AudioOutput;
}

/**
 * Flying patrol enemy. Shuttles between start ± patrolDistance, pausing to turn at
 * each end. Dies to hits, explodes, stays gone for respawnDelay, then resets.
 */
export class Drone {
  readonly id: string;
  readonly kind = 'DRONE' as const;
  readonly tuning: DroneTuning;
  readonly hittable: Hittable;
  position: Vec2;
  velocity: Vec2 = { x: 0, y: 0 };
  private readonly startPosition: Vec2;
  private target: Vec2;
  private movingRight = true;
  private _state: DroneState = 'PATROL';
  private readonly timers = new TimerBank(['turn', 'explode', 'respawn'] as const);
  private readonly events: EventBus | null;
  private readonly audio: AudioOutput;

  constructor(opts: DroneOptions) {
    this.id = opts.id;
    this.tuning = withTuning(DRONE_TUNING, opts.tuning);
    this.position = { ...opts.position };
    this.startPosition = { ...opts.position };
    this.target = this.patrolEnd(true);
    this.events = opts.events ?? null;
    this.audio = opts.audio ?? NullAudioOutput;
    this.hittable = new Hittable({ maxHealth: this.tuning.maxHealth, pogoStrength: this.tuning.pogoStrength, label: this.id });
    this.hittable.onDeath(() => this.explode());
    this.audio.play({ type: 'hover_start', sourceId: this.id });
  }

  get state(): DroneState {
    return this._state;
  }

  /** Collider and hurtbox are live only while patrolling or turning. */
  get isAlive(): boolean {
    return this._state === 'PATROL' || this._state === 'TURNING';
  }

  get facingRight(): boolean {
    return this.movingRight;
  }

  bounds(): Aabb {
    return aabbFromCenter(this.position, this.tuning.size);
  }

  update(dtSec: number): void {
    this.timers.tick(dtSec);
    switch (this._state) {
      case 'PATROL':
        this.patrol(dtSec);
        break;
      case 'TURNING':
        if (!this.timers.isActive('turn')) this.setState('PATROL');
        break;
      case 'EXPLODING':
        if (!this.timers.isActive('explode')) {
          this.timers.set('respawn', this.tuning.respawnDelay);
          this.setState('RESPAWNING');
        }
        break;
      case 'RESPAWNING':
        if (!this.timers.isActive('respawn')) this.respawn();
        break;
    }
  }

  /** Body contact: a live drone hurts whatever it touches. */
  tryContact(target: ContactTarget): boolean {
    if (!this.isAlive) return false;
    if (!overlaps(this.bounds(), target.bounds())) return false;
    target.takeDamage(this.tuning.contactDamage);
    return true;
  }

  private patrol(dt: number): void {
    if (distance(this.position, this.target) < ARRIVE_EPSILON) {
      this.position = { ...this.target };
      this.velocity = { x: 0, y: 0 };
      this.movingRight = !this.movingRight;
      this.target = this.patrolEnd(this.movingRight);
      this.timers.set('turn', this.tuning.turnDuration);
      this.setState('TURNING');
      return;
    }
    const dir = normalize({ x: this.target.x - this.position.x, y: this.target.y - this.position.y });
    this.velocity = scale(dir, this.tuning.moveSpeed);
    this.position.x += this.velocity.x * dt;
    this.position.y += this.velocity.y * dt;
  }

  private explode(): void {
    if (!this.isAlive) return;
    Logger.debug(`[Drone] ${this.id} destroyed`);
    this.velocity = { x: 0, y: 0 };
    this.hittable.enabled = false;
    this.timers.consume('turn');
    this.timers.set('explode', this.tuning.explosionDuration);
    this.audio.play({ type: 'hover_stop', sourceId: this.id });
    this.audio.play({ type: 'explosion' });
    this.setState('EXPLODING');
    this.events?.emit('actorDied', { actorId: this.id, kind: this.kind, x: this.position.x, y: this.position.y });
    this.events?.emit('explosion', { actorId: this.id, index: 0, x: this.position.x, y: this.position.y });
  }

  private respawn(): void {
    this.position = { ...this.startPosition };
    this.velocity = { x: 0, y: 0 };
    this.movingRight = true;
    this.target = this.patrolEnd(true);
    this.hittable.enabled = true;
    this.hittable.resetHealth();
    this.timers.consumeAll();
    this.audio.play({ type: 'hover_start', sourceId: this.id });
    this.setState('PATROL');
    this.events?.emit('droneRespawned', { actorId: this.id, x: this.position.x, y: this.position.y });
  }

  private patrolEnd(right: boolean): Vec2 {
    const d = right ? this.tuning.patrolDistance : -this.tuning.patrolDistance;
    return { x: this.startPosition.x + d, y: this.startPosition.y };
  }

  private setState(next: DroneState): void {
    if (next === this._state) return;
    const prev = this._state;
    this._state = next;
    this.events?.emit('stateChanged', { actorId: this.id, kind: this.kind, from: prev, to: next });
  }
}
