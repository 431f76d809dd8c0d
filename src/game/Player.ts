import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import { DOWN, UP, moveTowards, normalize, scale, type Vec2 } from '../core/vector';
import { aabbFromCenter, type Aabb } from '../physics/Aabb';
import { PLAYER_TUNING, withTuning, type PlayerTuning } from '../config/tuning';
import { TimerBank } from './TimerBank';
import { NullAudioOutput, type AudioOutput } from './SoundManager';
import type { HitVolumeManager } from './combat/HitVolumeManager';
import type { InputSnapshot } from './InputSampler';
import { ALL_LAYERS, CollisionLayer, type DamageSink, type DamageSource, type KinematicBody, type PlayerState } from './types';

const PLAYER_TIMERS = ['coyote', 'jumpBuffer', 'varJump', 'dash', 'attackCooldown', 'invuln', 'missCheck', 'reload'] as const;
type PlayerTimer = typeof PLAYER_TIMERS[number];

/** Below this horizontal speed a grounded player counts as standing still. */
const RUN_EPSILON = 0.01;

export interface PlayerOptions {
  id?: string;
  position: Vec2;
  hitVolumes: HitVolumeManager;
  tuning?: Partial<PlayerTuning>;
  events?: EventBus;
  audio?: AudioOutput;
}

/**
 * Player locomotion and combat state machine.
 * One update() per fixed tick; evaluation order is death, fall boundary, attack, dash,
 * dash tick, then ordinary movement. Outside callers reach it only through
 * takeDamage / heal / reportHit / reportDownwardHit.
 * @group Player
 */
export class Player implements DamageSource, DamageSink, KinematicBody {
  readonly id: string;
  readonly kind = 'PLAYER' as const;
  readonly tuning: PlayerTuning;
  readonly size: Vec2;
  position: Vec2;
  velocity: Vec2 = { x: 0, y: 0 };
  /** +1 right, -1 left */
  facing: 1 | -1 = 1;

  private prevPos: Vec2;
  private _state: PlayerState = 'IDLE';
  private hp: number;
  private dashCharges: number;
  private mask: number = ALL_LAYERS;
  private readonly timers = new TimerBank<PlayerTimer>(PLAYER_TIMERS);
  private jumpCutApplied = false;
  private missPending = false;
  private hitThisAttack = false;
  private reloadRequested = false;
  private inTick = false;
  /** Pogo reported while this actor was mid-update; applied at the start of the next tick. */
  private pendingPogo: number | null = null;
  private readonly hitVolumes: HitVolumeManager;
  private readonly events: EventBus | null;
  private readonly audio: AudioOutput;

  constructor(opts: PlayerOptions) {
    this.id = opts.id ?? 'player';
    this.tuning = withTuning(PLAYER_TUNING, opts.tuning);
    this.size = { ...this.tuning.size };
    this.position = { ...opts.position };
    this.prevPos = { ...opts.position };
    this.hp = this.tuning.maxHealth;
    this.dashCharges = this.tuning.maxDashes;
    this.hitVolumes = opts.hitVolumes;
    this.events = opts.events ?? null;
    this.audio = opts.audio ?? NullAudioOutput;
  }

  get state(): PlayerState {
    return this._state;
  }

  get health(): number {
    return this.hp;
  }

  get maxHealth(): number {
    return this.tuning.maxHealth;
  }

  get isDead(): boolean {
    return this._state === 'DEATH';
  }

  /**
   * Post-damage invulnerability only. Dash immunity is carried by `collisionMask`
   * (GROUND only while dashing), so this reads false mid-dash.
   */
  get isInvulnerable(): boolean {
    return this.timers.isActive('invuln');
  }

  get dashesRemaining(): number {
    return this.dashCharges;
  }

  /** Layers this body currently collides with. Dashing keeps only GROUND. */
  get collisionMask(): number {
    return this.mask;
  }

  get previousPosition(): Readonly<Vec2> {
    return this.prevPos;
  }

  /** Remaining time on a named timer, clamped at zero. */
  timer(name: PlayerTimer): number {
    return this.timers.get(name);
  }

  bounds(): Aabb {
    return aabbFromCenter(this.position, this.size);
  }

  /** Advance one fixed tick. `grounded` is the ground contact sampled before this tick. */
  update(dtSec: number, input: InputSnapshot, grounded: boolean): void {
    this.prevPos = { x: this.position.x, y: this.position.y };
    this.inTick = true;
    try {
      this.step(dtSec, input, grounded);
    } finally {
      this.inTick = false;
    }
  }

  takeDamage(amount: number, knockback?: Vec2): void {
    if (this._state === 'DEATH' || this.timers.isActive('invuln') || !(amount > 0)) return;

    this.hp = Math.max(0, this.hp - amount);
    this.timers.set('invuln', this.tuning.invulnerabilityDuration);
    const kb = this.tuning.defaultKnockback;
    this.velocity = knockback ? { x: knockback.x, y: knockback.y } : { x: -this.facing * kb.x, y: kb.y };
    Logger.debug(`[Player] took ${amount} damage. Health: ${this.hp}/${this.tuning.maxHealth}`);
    this.events?.emit('actorDamaged', { actorId: this.id, kind: this.kind, amount, health: this.hp });

    if (this._state === 'DASHING') {
      this.timers.consume('dash');
      this.mask = ALL_LAYERS;
      this.setState('FALLING');
    }
    if (this.hp <= 0) this.die();
  }

  heal(amount: number): void {
    if (this._state === 'DEATH' || !(amount > 0)) return;
    this.hp = Math.min(this.tuning.maxHealth, this.hp + amount);
  }

  /** A hit volume owned by this player connected. */
  reportHit(direction: Vec2): void {
    this.hitThisAttack = true;
    this.audio.play({ type: 'attack_hit', direction });
  }

  /** A down-slash connected: bounce up with `strength`. */
  reportDownwardHit(strength: number): void {
    if (this._state === 'DEATH') return;
    if (this.inTick) {
      this.pendingPogo = strength;
      return;
    }
    this.applyPogo(strength);
  }

  private step(dt: number, input: InputSnapshot, grounded: boolean): void {
    this.timers.tick(dt);

    // 1. death
    if (this._state === 'DEATH') {
      if (!this.reloadRequested && !this.timers.isActive('reload')) {
        this.reloadRequested = true;
        Logger.info('[Player] requesting level reload');
        this.events?.emit('levelReloadRequested', { actorId: this.id });
      }
      return;
    }
    if (this.hp <= 0) {
      this.die();
      return;
    }

    if (this.pendingPogo !== null) {
      const strength = this.pendingPogo;
      this.pendingPogo = null;
      this.applyPogo(strength);
      grounded = false;
    }

    // 2. fall boundary
    if (this.position.y < this.tuning.fallDeathY) {
      Logger.info(`[Player] fell below ${this.tuning.fallDeathY}`);
      this.die();
      return;
    }

    if (input.jumpPressed) this.timers.set('jumpBuffer', this.tuning.jumpBufferTime);

    this.checkMiss();

    // 3. attack
    if (input.attackPressed && !this.timers.isActive('attackCooldown')) this.attack(input);

    // 4. dash request
    if (input.dashPressed && this.dashCharges > 0 && this._state !== 'DASHING') {
      this.startDash(input);
      this.integrate(dt);
      return;
    }

    // 5. dash tick
    if (this._state === 'DASHING') {
      if (this.timers.isActive('dash')) {
        this.integrate(dt);
        return;
      }
      this.endDash(grounded);
    }

    // 6. movement
    this.move(dt, input, grounded);
    this.integrate(dt);
  }

  private move(dt: number, input: InputSnapshot, grounded: boolean): void {
    const t = this.tuning;

    if (grounded) {
      this.timers.set('coyote', t.coyoteTime);
      if (this.velocity.y < 0) this.velocity.y = 0;
      this.dashCharges = t.maxDashes;
    }

    // horizontal
    if (input.moveX > 0) this.facing = 1;
    else if (input.moveX < 0) this.facing = -1;
    const target = input.moveX * t.maxRunSpeed;
    let rate = Math.abs(target) > RUN_EPSILON ? t.acceleration : t.deceleration;
    if (target !== 0 && this.velocity.x !== 0 && Math.sign(target) !== Math.sign(this.velocity.x)) rate *= 2; // snappy turn
    if (!grounded) rate *= t.airControl;
    this.velocity.x = moveTowards(this.velocity.x, target, rate * dt);

    // jump
    let jumped = false;
    if (this.timers.isActive('jumpBuffer') && this.timers.isActive('coyote')) {
      this.timers.consume('jumpBuffer');
      this.timers.consume('coyote');
      this.timers.set('varJump', t.variableJumpTime);
      this.jumpCutApplied = false;
      this.velocity.y = t.jumpSpeed;
      jumped = true;
      this.audio.play({ type: 'jump' });
    }

    // vertical
    const airborne = jumped || !grounded;
    if (airborne && !jumped) {
      this.velocity.y = Math.max(this.velocity.y - t.gravity * dt, -t.maxFallSpeed);
    }

    if (!jumped && this._state === 'JUMPING' && !this.jumpCutApplied && this.velocity.y > 0) {
      if (input.jumpReleased || !input.jumpHeld || !this.timers.isActive('varJump')) {
        this.velocity.y *= 0.5;
        this.jumpCutApplied = true;
      }
    }

    if (jumped) {
      this.setState('JUMPING');
    } else if (!airborne) {
      this.setState(Math.abs(this.velocity.x) > RUN_EPSILON ? 'RUNNING' : 'IDLE');
    } else if (this._state !== 'JUMPING' || this.velocity.y <= 0) {
      this.setState('FALLING');
    }
  }

  private attack(input: InputSnapshot): void {
    const t = this.tuning;
    let direction: Vec2;
    if (Math.abs(input.moveY) > t.attackAimDeadzone) {
      direction = input.moveY > 0 ? { x: UP.x, y: UP.y } : { x: DOWN.x, y: DOWN.y };
    } else {
      direction = { x: this.facing, y: 0 };
    }
    const size = direction.y !== 0 ? t.attackSizeVertical : t.attackSizeForward;
    this.timers.set('attackCooldown', t.attackCooldown);
    const volume = this.hitVolumes.spawn({
      owner: this,
      damage: t.attackDamage,
      direction,
      offset: scale(direction, t.attackReach),
      size,
      activeDuration: t.attackActiveDuration,
    });
    if (!volume) return;
    this.hitThisAttack = false;
    this.missPending = true;
    this.timers.set('missCheck', t.attackActiveDuration);
  }

  private checkMiss(): void {
    if (!this.missPending || this.timers.isActive('missCheck')) return;
    this.missPending = false;
    if (this.hitThisAttack) return;
    this.events?.emit('attackMissed', { ownerId: this.id });
    this.audio.play({ type: 'attack_miss' });
  }

  private startDash(input: InputSnapshot): void {
    const t = this.tuning;
    this.dashCharges--;
    const held = input.moveX !== 0 || input.moveY !== 0;
    const dir = held ? normalize({ x: input.moveX, y: input.moveY }) : { x: this.facing, y: 0 };
    this.velocity = scale(dir, t.dashSpeed);
    this.timers.set('dash', t.dashDuration);
    this.mask = CollisionLayer.GROUND;
    this.setState('DASHING');
  }

  private endDash(grounded: boolean): void {
    this.mask = ALL_LAYERS;
    this.velocity.x *= 0.5;
    if (!grounded) this.velocity.y = 0;
    this.setState(grounded ? 'IDLE' : 'FALLING');
  }

  private applyPogo(strength: number): void {
    if (this._state === 'DASHING') {
      this.timers.consume('dash');
      this.mask = ALL_LAYERS;
    }
    this.velocity.y = strength;
    this.timers.set('varJump', this.tuning.variableJumpTime);
    this.jumpCutApplied = false;
    this.dashCharges = this.tuning.maxDashes;
    this.timers.consume('coyote');
    this.timers.consume('jumpBuffer');
    this.audio.play({ type: 'pogo' });
    this.setState('JUMPING');
  }

  private die(): void {
    this.hp = 0;
    this.velocity = { x: 0, y: 0 };
    this.mask = ALL_LAYERS;
    this.missPending = false;
    this.pendingPogo = null;
    this.timers.consumeAll();
    this.timers.set('reload', this.tuning.reloadDelay);
    this.setState('DEATH');
    this.events?.emit('actorDied', { actorId: this.id, kind: this.kind, x: this.position.x, y: this.position.y });
  }

  private integrate(dt: number): void {
    this.position.x += this.velocity.x * dt;
    this.position.y += this.velocity.y * dt;
  }

  private setState(next: PlayerState): void {
    if (next === this._state) return;
    const prev = this._state;
    this._state = next;
    Logger.debug(`[Player] ${prev} -> ${next}`);
    this.events?.emit('stateChanged', { actorId: this.id, kind: this.kind, from: prev, to: next });
  }
}
