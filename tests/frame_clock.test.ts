import { describe, it, expect } from 'vitest';
import { ExplosionAnimation, FrameClock } from '../src/game/FrameClock';

describe('FrameClock', () => {
  it('advances one frame per elapsed interval', () => {
    const clock = new FrameClock(4, 3);
    expect(clock.step(0.125)).toBe(false);
    expect(clock.step(0.125)).toBe(true);
    expect(clock.index).toBe(1);
  });

  it('never skips frames on a long step', () => {
    const clock = new FrameClock(4, 3);
    clock.step(0.25);
    expect(clock.step(1)).toBe(true);
    expect(clock.index).toBe(2);
    expect(clock.step(0.125)).toBe(false);
    expect(clock.step(0.125)).toBe(true);
    expect(clock.finished).toBe(true);
  });

  it('resets to the first frame', () => {
    const clock = new FrameClock(4, 1);
    clock.step(0.25);
    expect(clock.finished).toBe(true);
    clock.reset();
    expect(clock.index).toBe(0);
    expect(clock.finished).toBe(false);
  });

  it('stands still with a non-positive rate', () => {
    const clock = new FrameClock(0, 3);
    expect(clock.step(100)).toBe(false);
    expect(clock.index).toBe(0);
  });
});

describe('ExplosionAnimation', () => {
  it('plays through once and holds the last frame', () => {
    const anim = new ExplosionAnimation(1, 2, 4, 2);
    anim.update(0.25);
    expect(anim.frame).toBe(1);
    expect(anim.isFinished).toBe(false);
    anim.update(0.25);
    expect(anim.isFinished).toBe(true);
    expect(anim.frame).toBe(1);
  });
});
