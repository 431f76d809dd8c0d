import { Logger } from '../../core/Logger';

export type HitListener = (damage: number) => void;
export type DeathListener = () => void;

export interface HittableOptions {
  /** 0 or less disables health tracking: the target still reacts to hits but cannot die. */
  maxHealth?: number;
  /** Upward speed granted to an attacker whose down-slash connects. */
  pogoStrength?: number;
  /** Name used in log lines. */
  label?: string;
}

/**
 * Damageable target reached through hit volumes. onHit fires on every hit;
 * onDeath fires once per life, until resetHealth() starts a new one.
 */
export class Hittable {
  readonly maxHealth: number;
  readonly pogoStrength: number;
  /** Disabled targets are skipped by hit volumes (e.g. a drone mid-explosion). */
  enabled = true;
  private currentHealth: number;
  private dead = false;
  private readonly label: string;
  private readonly hitListeners = new Set<HitListener>();
  private readonly deathListeners = new Set<DeathListener>();

  constructor(opts: HittableOptions = {}) {
    this.maxHealth = opts.maxHealth ?? 0;
    this.pogoStrength = opts.pogoStrength ?? 12;
    this.label = opts.label ?? 'hittable';
    this.currentHealth = Math.max(0, this.maxHealth);
  }

  get tracksHealth(): boolean {
    return this.maxHealth > 0;
  }

  get health(): number {
    return this.currentHealth;
  }

  get isDead(): boolean {
    return this.dead;
  }

  onHit(fn: HitListener): () => void {
    this.hitListeners.add(fn);
    return () => { this.hitListeners.delete(fn); };
  }

  onDeath(fn: DeathListener): () => void {
    this.deathListeners.add(fn);
    return () => { this.deathListeners.delete(fn); };
  }

  takeHit(damage: number): void {
    for (const fn of this.hitListeners) this.notify(() => fn(damage));
    if (!this.tracksHealth || this.dead) return;

    this.currentHealth = Math.max(0, this.currentHealth - damage);
    Logger.debug(`[Hittable] ${this.label} took ${damage} damage. Health: ${this.currentHealth}/${this.maxHealth}`);
    if (this.currentHealth <= 0) {
      this.dead = true;
      for (const fn of this.deathListeners) this.notify(fn);
    }
  }

  resetHealth(): void {
    if (!this.tracksHealth) return;
    this.currentHealth = this.maxHealth;
    this.dead = false;
  }

  private notify(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      Logger.error(`[Hittable] ${this.label} listener threw`, err);
    }
  }
}
