import { Logger } from '../core/Logger';
import type { EventBus } from '../core/EventBus';
import { distance, type Vec2 } from '../core/vector';
import { aabbFromCenter, type Aabb } from '../physics/Aabb';
import { BOSS_TUNING, DIALOGUE_TIMING, withTuning, type BossTuning, type DialogueTiming } from '../config/tuning';
import { TimerBank } from './TimerBank';
import { Hittable } from './combat/Hittable';
import { NullAudioOutput, type AudioOutput } from './SoundManager';
import { estimateDialogueDuration, type DialogueDatabase, type DialoguePresenter } from './DialogueDatabase';
import type { BossState, DamageSink, GroundProbe } from './types';

const BOSS_TIMERS = ['dialogue', 'shield', 'spawn', 'explosion', 'destroy'] as const;
type BossTimer = typeof BOSS_TIMERS[number];

/** Whatever the boss tracks; the player in practice. */
export interface BossTarget {
  readonly position: Readonly<Vec2>;
}

/** Places a telegraphed attack at a ground point chosen by the boss. */
export type TentacleSpawner = (groundPoint: Vec2) => void;

export interface BossOptions {
  id?: string;
  position: Vec2;
  groundProbe: GroundProbe;
  spawnTentacle: TentacleSpawner;
  tuning?: Partial<BossTuning>;
  /** Null/undefined: dialogue gates are skipped and the boss goes straight to the next state. */
  dialogue?: DialogueDatabase | null;
  presenter?: DialoguePresenter;
  dialogueTiming?: DialogueTiming;
  events?: EventBus;
  audio?: AudioOutput;
  /** Uniform [0,1); Math.random by default. */
  rng?: () => number;
  initialState?: 'IDLE' | 'HOVERING';
}

/**
 * Boss encounter orchestrator.
 * Detection -> intro dialogue -> vulnerable; every `hitsPerCycle` counted hits raise the
 * shield, which spawns tentacles until it drops and the phase-change dialogue plays.
 * All delays are timers ticked from update(); nothing is scheduled asynchronously.
 * @group Boss
 */
export class BossManager implements DamageSink {
  readonly id: string;
  readonly kind = 'BOSS' as const;
  readonly tuning: BossTuning;
  readonly hittable: Hittable;
  position: Vec2;
  velocity: Vec2 = { x: 0, y: 0 };
  private readonly startPosition: Vec2;
  private _state: BossState;
  private hp: number;
  private invulnerable = false;
  private hitCount = 0;
  private hoverTime = 0;
  private target: BossTarget | null = null;
  private dialogueActive = false;
  private afterDialogue: BossState = 'VULNERABLE';
  private shieldUp = false;
  private explosionsFired = 0;
  private destroyed = false;
  private readonly timers = new TimerBank<BossTimer>(BOSS_TIMERS);
  private readonly probe: GroundProbe;
  private readonly spawnTentacle: TentacleSpawner;
  private readonly dialogue: DialogueDatabase | null;
  private readonly presenter: DialoguePresenter | null;
  private readonly dialogueTiming: DialogueTiming;
  private readonly events: EventBus | null;
  private readonly audio: AudioOutput;
  private readonly rng: () => number;

  constructor(opts: BossOptions) {
    this.id = opts.id ?? 'boss';
    this.tuning = withTuning(BOSS_TUNING, opts.tuning);
    this.position = { ...opts.position };
    this.startPosition = { ...opts.position };
    this.hp = this.tuning.maxHealth;
    this._state = opts.initialState ?? 'HOVERING';
    this.probe = opts.groundProbe;
    this.spawnTentacle = opts.spawnTentacle;
    this.dialogue = opts.dialogue ?? null;
    this.presenter = opts.presenter ?? null;
    this.dialogueTiming = opts.dialogueTiming ?? DIALOGUE_TIMING;
    this.events = opts.events ?? null;
    this.audio = opts.audio ?? NullAudioOutput;
    this.rng = opts.rng ?? Math.random;
    // Health lives on the boss; the hittable only relays hits.
    this.hittable = new Hittable({ maxHealth: 0, pogoStrength: this.tuning.pogoStrength, label: this.id });
    this.hittable.onHit(damage => this.takeDamage(damage));
  }

  get state(): BossState {
    return this._state;
  }

  get health(): number {
    return this.hp;
  }

  get maxHealth(): number {
    return this.tuning.maxHealth;
  }

  get isInvulnerable(): boolean {
    return this.invulnerable;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Confirmed hits counted toward the current shield cycle. */
  get cycleHits(): number {
    return this.hitCount;
  }

  get shieldActive(): boolean {
    return this.shieldUp;
  }

  get isDialogueActive(): boolean {
    return this.dialogueActive;
  }

  bounds(): Aabb {
    return aabbFromCenter(this.position, this.tuning.size);
  }

  setTarget(target: BossTarget | null): void {
    this.target = target;
  }

  update(dtSec: number): void {
    if (this.destroyed) return;
    this.hoverTime += dtSec;
    this.timers.tick(dtSec);

    if (!this.target && this._state !== 'IDLE' && this._state !== 'DEATH') {
      Logger.warn(`[BossManager] ${this.id} lost its target; returning to IDLE`);
      this.dialogueActive = false;
      this.timers.consume('dialogue');
      this.setState('IDLE');
    }

    switch (this._state) {
      case 'IDLE':
        this.checkDetection();
        break;
      case 'HOVERING':
        this.hover();
        this.checkDetection();
        break;
      case 'DIALOGUE':
        if (!this.timers.isActive('dialogue')) this.finishDialogue();
        break;
      case 'VULNERABLE':
        this.invulnerable = false;
        this.hover();
        break;
      case 'SHIELDING':
        this.raiseShield();
        break;
      case 'ATTACKING':
        this.attack();
        break;
      case 'DEATH':
        this.runDeath();
        break;
    }
  }

  takeDamage(amount: number): void {
    if (this._state === 'DEATH' || this.invulnerable || !(amount > 0)) return;

    this.hp = Math.max(0, this.hp - amount);
    Logger.debug(`[BossManager] ${this.id} took ${amount}. Health: ${this.hp}/${this.tuning.maxHealth}`);
    this.events?.emit('actorDamaged', { actorId: this.id, kind: this.kind, amount, health: this.hp });

    if (this.hp <= 0) {
      this.startDeath();
      return;
    }
    if (this._state !== 'VULNERABLE') {
      Logger.debug(`[BossManager] hit in ${this._state} not counted for the shield cycle`);
      return;
    }
    this.hitCount++;
    if (this.hitCount >= this.tuning.hitsPerCycle) {
      this.hitCount = 0;
      this.invulnerable = true;
      this.setState('SHIELDING');
    }
  }

  /**
   * Open a dialogue gate. Ignored while one is running; a missing database or
   * sequence skips straight to `next`.
   */
  startDialogue(sequenceId: string, next: BossState): void {
    if (this.dialogueActive) {
      Logger.debug(`[BossManager] dialogue '${sequenceId}' ignored; another is active`);
      return;
    }
    this.afterDialogue = next;
    const sequence = this.dialogue ? this.dialogue.getSequence(sequenceId) : null;
    if (!sequence) {
      Logger.warn(`[BossManager] dialogue '${sequenceId}' unavailable; skipping to ${next}`);
      this.setState(next);
      return;
    }
    const duration = estimateDialogueDuration(sequence, this.dialogueTiming);
    this.dialogueActive = true;
    this.timers.set('dialogue', duration);
    this.setState('DIALOGUE');
    this.presenter?.present(sequence);
    this.events?.emit('dialogueStarted', { actorId: this.id, sequenceId, duration });
  }

  private finishDialogue(): void {
    this.dialogueActive = false;
    this.setState(this.afterDialogue);
  }

  private checkDetection(): void {
    if (!this.target) return;
    if (distance(this.position, this.target.position) > this.tuning.detectionRadius) return;
    Logger.info(`[BossManager] ${this.id} engaged`);
    this.startDialogue(this.tuning.initialDialogueId, 'VULNERABLE');
  }

  private hover(): void {
    const offset = Math.sin(this.hoverTime * this.tuning.hoverSpeed) * this.tuning.hoverAmplitude;
    this.position = { x: this.startPosition.x, y: this.startPosition.y + offset };
  }

  private raiseShield(): void {
    this.invulnerable = true;
    this.timers.set('shield', this.tuning.shieldDuration);
    this.timers.consume('spawn');
    if (!this.shieldUp) {
      this.shieldUp = true;
      this.events?.emit('shieldRaised', { actorId: this.id });
    }
    this.setState('ATTACKING');
  }

  private lowerShield(): void {
    if (!this.shieldUp) return;
    this.shieldUp = false;
    this.events?.emit('shieldLowered', { actorId: this.id });
  }

  private attack(): void {
    this.invulnerable = true;
    this.hover();
    if (!this.timers.isActive('shield')) {
      this.invulnerable = false;
      this.lowerShield();
      this.startDialogue(this.tuning.postShieldDialogueId, 'VULNERABLE');
      return;
    }
    if (!this.timers.isActive('spawn')) {
      this.trySpawnTentacle();
      this.timers.set('spawn', this.tuning.tentacleSpawnRate);
    }
  }

  private trySpawnTentacle(): void {
    if (!this.target) return;
    const t = this.tuning;
    const x = this.target.position.x + (this.rng() * 2 - 1) * t.tentacleSpawnRadius;
    const origin = { x, y: this.position.y + t.tentacleSpawnMaxRaycastDistance * 0.5 };
    const ground = this.probe.castDown(origin, t.tentacleSpawnMaxRaycastDistance);
    if (!ground) {
      Logger.warn(`[BossManager] no ground below (${origin.x.toFixed(2)}, ${origin.y.toFixed(2)}); tentacle skipped`);
      return;
    }
    this.spawnTentacle(ground);
  }

  private startDeath(): void {
    Logger.info(`[BossManager] ${this.id} defeated`);
    this.invulnerable = true;
    this.dialogueActive = false;
    this.velocity = { x: 0, y: 0 };
    this.hittable.enabled = false;
    this.lowerShield();
    this.timers.consumeAll();
    this.setState('DEATH');
    this.events?.emit('actorDied', { actorId: this.id, kind: this.kind, x: this.position.x, y: this.position.y });

    this.explosionsFired = 0;
    this.timers.set('destroy', this.tuning.explosionCount * this.tuning.explosionInterval);
    this.fireExplosion();
    this.timers.set('explosion', this.tuning.explosionInterval);
  }

  private runDeath(): void {
    while (this.explosionsFired < this.tuning.explosionCount && !this.timers.isActive('explosion')) {
      this.fireExplosion();
      this.timers.add('explosion', this.tuning.explosionInterval);
    }
    if (!this.timers.isActive('destroy')) {
      this.destroyed = true;
      Logger.debug(`[BossManager] ${this.id} destroyed`);
      this.events?.emit('bossDestroyed', { actorId: this.id });
    }
  }

  private fireExplosion(): void {
    if (this.explosionsFired >= this.tuning.explosionCount) return;
    const angle = this.rng() * Math.PI * 2;
    const r = Math.sqrt(this.rng()) * this.tuning.explosionJitterRadius;
    const x = this.position.x + Math.cos(angle) * r;
    const y = this.position.y + Math.sin(angle) * r;
    this.events?.emit('explosion', { actorId: this.id, index: this.explosionsFired, x, y });
    this.audio.play({ type: 'explosion' });
    this.explosionsFired++;
  }

  private setState(next: BossState): void {
    if (next === this._state) return;
    const prev = this._state;
    this._state = next;
    Logger.debug(`[BossManager] ${prev} -> ${next}`);
    this.events?.emit('stateChanged', { actorId: this.id, kind: this.kind, from: prev, to: next });
  }
}
