import { EventBus } from '../core/EventBus';
import { GameLoop, type FrameScheduler } from '../core/GameLoop';
import { Logger } from '../core/Logger';
import type { Vec2 } from '../core/vector';
import { LevelGeometry } from '../physics/LevelGeometry';
import { LOOP_TUNING, type BossTuning, type DroneTuning, type PlayerTuning, type TentacleTuning } from '../config/tuning';
import { HitVolumeManager, type HitTarget } from './combat/HitVolumeManager';
import { InputSampler, type RawInputFrame } from './InputSampler';
import { Player } from './Player';
import { BossManager } from './BossManager';
import { Drone } from './Drone';
import { TentacleHazard } from './TentacleHazard';
import { ExplosionAnimation } from './FrameClock';
import { NullAudioOutput, type AudioOutput } from './SoundManager';
import { DialogueDatabase, type DialoguePresenter } from './DialogueDatabase';
import dialogueData from '../data/dialogue.json';
import { CollisionLayer } from './types';

export interface GameWorldOptions {
  level: LevelGeometry;
  playerSpawn: Vec2;
  player?: Partial<PlayerTuning>;
  boss?: { position: Vec2; tuning?: Partial<BossTuning>; initialState?: 'IDLE' | 'HOVERING' };
  drones?: Array<{ id: string; position: Vec2; tuning?: Partial<DroneTuning> }>;
  tentacle?: Partial<TentacleTuning>;
  /** Defaults to the bundled encounter script. */
  dialogue?: DialogueDatabase;
  presenter?: DialoguePresenter;
  audio?: AudioOutput;
  rng?: () => number;
}

/**
 * One level's worth of actors, driven by a fixed-rate pass. Owns the event bus;
 * hosts subscribe to `events` for animation, camera and scene changes.
 */
export class GameWorld {
  readonly events = new EventBus();
  readonly input = new InputSampler();
  readonly level: LevelGeometry;
  readonly hitVolumes: HitVolumeManager;
  readonly player: Player;
  readonly boss: BossManager | null;
  readonly drones: Drone[];
  private tentacles: TentacleHazard[] = [];
  private explosions: ExplosionAnimation[] = [];
  private readonly tentacleTuning: Partial<TentacleTuning> | undefined;
  private tentacleSeq = 0;
  private ticks = 0;

  constructor(opts: GameWorldOptions) {
    const audio = opts.audio ?? NullAudioOutput;
    this.level = opts.level;
    this.tentacleTuning = opts.tentacle;
    this.hitVolumes = new HitVolumeManager(this.events);
    this.player = new Player({ position: opts.playerSpawn, tuning: opts.player, hitVolumes: this.hitVolumes, events: this.events, audio });

    if (opts.boss) {
      this.boss = new BossManager({
        position: opts.boss.position,
        tuning: opts.boss.tuning,
        initialState: opts.boss.initialState,
        groundProbe: this.level,
        spawnTentacle: p => this.spawnTentacle(p),
        dialogue: opts.dialogue ?? DialogueDatabase.fromData(dialogueData),
        presenter: opts.presenter,
        events: this.events,
        audio,
        rng: opts.rng,
      });
      this.boss.setTarget(this.player);
    } else {
      this.boss = null;
    }

    this.drones = (opts.drones ?? []).map(d => new Drone({ id: d.id, position: d.position, tuning: d.tuning, events: this.events, audio }));
    this.events.on('explosion', e => { this.explosions.push(new ExplosionAnimation(e.x, e.y)); });
  }

  get tickCount(): number {
    return this.ticks;
  }

  getTentacles(): readonly TentacleHazard[] {
    return this.tentacles;
  }

  getExplosions(): readonly ExplosionAnimation[] {
    return this.explosions;
  }

  /** Variable-rate pass: capture one raw input frame. */
  sampleInput(raw: RawInputFrame): void {
    this.input.sample(raw);
  }

  /** Fixed-rate pass. */
  fixedUpdate(deltaMs: number): void {
    const dt = deltaMs / 1000;
    const player = this.player;

    player.update(dt, this.input.snapshot(), this.level.isGrounded(player));
    if (!player.isDead) this.level.resolveLanding(player);

    this.hitVolumes.update(dt);
    this.hitVolumes.resolve(this.hitTargets());

    this.boss?.update(dt);
    for (const d of this.drones) d.update(dt);

    const hazardsHurt = (player.collisionMask & CollisionLayer.HAZARD) !== 0;
    for (const t of this.tentacles) {
      t.update(dt);
      if (hazardsHurt) t.tryContact(player);
    }
    if ((player.collisionMask & CollisionLayer.ENEMY) !== 0) {
      for (const d of this.drones) d.tryContact(player);
    }

    for (const e of this.explosions) e.update(dt);
    this.tentacles = this.tentacles.filter(t => !t.isDestroyed);
    this.explosions = this.explosions.filter(e => !e.isFinished);

    this.input.clearEdges();
    this.ticks++;
  }

  /** Drive this world from a GameLoop; `readInput` is polled once per rendered frame. */
  createLoop(readInput: () => RawInputFrame, scheduler?: FrameScheduler): GameLoop {
    return new GameLoop(
      () => this.sampleInput(readInput()),
      ms => this.fixedUpdate(ms),
      { fixedHz: LOOP_TUNING.FIXED_HZ, maxCatchUpFrames: LOOP_TUNING.MAX_CATCH_UP_FRAMES, scheduler },
    );
  }

  private hitTargets(): HitTarget[] {
    const targets: HitTarget[] = [];
    if (this.boss && !this.boss.isDestroyed) targets.push(this.boss);
    for (const d of this.drones) if (d.isAlive) targets.push(d);
    return targets;
  }

  private spawnTentacle(groundPoint: Vec2): void {
    const id = `tentacle-${++this.tentacleSeq}`;
    const tentacle = new TentacleHazard(id, groundPoint, { tuning: this.tentacleTuning, events: this.events });
    if (tentacle.isDestroyed) {
      Logger.warn(`[GameWorld] ${id} rejected its configuration`);
      return;
    }
    this.tentacles.push(tentacle);
    this.events.emit('tentacleSpawned', { id, x: groundPoint.x, y: groundPoint.y });
  }
}
