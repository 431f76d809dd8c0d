/**
 * Named countdown timers owned by a single actor.
 * Values may dip below zero between ticks; every read clamps to zero so an expired
 * timer never re-triggers. Timers are pure value state and are never shared.
 */
export class TimerBank<Name extends string> {
  private readonly remainingSec = new Map<Name, number>();

  constructor(names: readonly Name[]) {
    for (const n of names) this.remainingSec.set(n, 0);
  }

  /** Decrement every running timer by dtSec. Expired timers stay at their (clamped) zero. */
  tick(dtSec: number): void {
    for (const [name, value] of this.remainingSec) {
      if (value > 0) this.remainingSec.set(name, value - dtSec);
    }
  }

  set(name: Name, durationSec: number): void {
    this.remainingSec.set(name, durationSec);
  }

  /**
   * Add time on top of the raw (unclamped) remainder. Used by fixed-interval schedules
   * so overshoot carries into the next period instead of drifting.
   */
  add(name: Name, durationSec: number): void {
    this.remainingSec.set(name, this.raw(name) + durationSec);
  }

  get(name: Name): number {
    return Math.max(0, this.raw(name));
  }

  isActive(name: Name): boolean {
    return this.raw(name) > 0;
  }

  /** Force to zero. */
  consume(name: Name): void {
    this.remainingSec.set(name, 0);
  }

  consumeAll(): void {
    for (const name of this.remainingSec.keys()) this.remainingSec.set(name, 0);
  }

  raw(name: Name): number {
    return this.remainingSec.get(name) ?? 0;
  }
}
