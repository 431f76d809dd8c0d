import { EXPLOSION_ANIMATION } from '../config/tuning';

/**
 * Fixed-rate frame counter. Overshoot carries into the next frame
 * (`timer += interval`), so long runs stay aligned with the nominal rate.
 * Advances at most one frame per step.
 */
export class FrameClock {
  readonly frameCount: number;
  readonly frameInterval: number;
  private frameTimer: number;
  private frame = 0;

  constructor(frameRate: number, frameCount: number) {
    this.frameCount = frameCount;
    this.frameInterval = frameRate > 0 ? 1 / frameRate : Number.POSITIVE_INFINITY;
    this.frameTimer = this.frameInterval;
  }

  get index(): number {
    return this.frame;
  }

  /** True once the clock has stepped past the last frame. */
  get finished(): boolean {
    return this.frame >= this.frameCount;
  }

  /** Returns true when a new frame was entered. */
  step(dtSec: number): boolean {
    this.frameTimer -= dtSec;
    if (this.frameTimer > 0) return false;
    this.frameTimer += this.frameInterval;
    if (this.frameTimer < 0) this.frameTimer = this.frameInterval; // hitch: drop the backlog
    this.frame++;
    return true;
  }

  /** Jump to `index` (clamped to the last frame) and restart its interval. */
  seek(index: number): void {
    this.frame = Math.max(0, Math.min(index, this.frameCount - 1));
    this.frameTimer = this.frameInterval;
  }

  reset(): void {
    this.frame = 0;
    this.frameTimer = this.frameInterval;
  }
}

/** One-shot explosion sprite; renderers read `frame` until `isFinished`. */
export class ExplosionAnimation {
  readonly x: number;
  readonly y: number;
  private readonly clock: FrameClock;

  constructor(x: number, y: number, frameRate: number = EXPLOSION_ANIMATION.FRAME_RATE, frameCount: number = EXPLOSION_ANIMATION.FRAME_COUNT) {
    this.x = x;
    this.y = y;
    this.clock = new FrameClock(frameRate, frameCount);
  }

  get frame(): number {
    return Math.min(this.clock.index, this.clock.frameCount - 1);
  }

  get isFinished(): boolean {
    return this.clock.finished;
  }

  update(dtSec: number): void {
    if (!this.clock.finished) this.clock.step(dtSec);
  }
}
