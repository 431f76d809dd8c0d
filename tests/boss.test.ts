import { describe, it, expect } from 'vitest';
import { BossManager, type BossOptions } from '../src/game/BossManager';
import { DialogueDatabase, type DialoguePresenter, type DialogueSequence } from '../src/game/DialogueDatabase';
import { EventBus, type EventMap } from '../src/core/EventBus';
import type { Vec2 } from '../src/core/vector';
import type { GroundProbe } from '../src/game/types';

const flatGround: GroundProbe = { castDown: o => ({ x: o.x, y: 0 }) };
const noGround: GroundProbe = { castDown: () => null };

function setup(overrides: Partial<BossOptions> = {}) {
  const events = new EventBus();
  const spawned: Vec2[] = [];
  const boss = new BossManager({
    position: { x: 0, y: 5 },
    groundProbe: flatGround,
    spawnTentacle: p => { spawned.push(p); },
    events,
    rng: () => 0.5,
    ...overrides,
  });
  boss.setTarget({ position: { x: 0, y: 0 } });
  return { boss, events, spawned };
}

function collect<K extends keyof EventMap>(events: EventBus, type: K): EventMap[K][] {
  const out: EventMap[K][] = [];
  events.on(type, e => { out.push(e); });
  return out;
}

function hit(boss: BossManager, times: number, damage = 10): void {
  for (let i = 0; i < times; i++) boss.hittable.takeHit(damage);
}

describe('BossManager detection and dialogue', () => {
  it('stays put while the target is out of range', () => {
    const { boss } = setup();
    boss.setTarget({ position: { x: 40, y: 0 } });
    boss.update(0.1);
    expect(boss.state).toBe('HOVERING');
  });

  it('skips straight to VULNERABLE without a dialogue database', () => {
    const { boss } = setup();
    boss.update(0.1);
    expect(boss.state).toBe('VULNERABLE');
  });

  it('gates on the estimated dialogue duration', () => {
    const shown: DialogueSequence[] = [];
    const presenter: DialoguePresenter = { present: s => { shown.push(s); } };
    const dialogue = new DialogueDatabase([{ id: 'BossIntro', lines: [{ speaker: 'Boss_Full', text: 'abcd' }] }]);
    const { boss, events } = setup({ dialogue, presenter, dialogueTiming: { typingSpeed: 0.25, autoAdvanceDelay: 0.5 } });
    const started = collect(events, 'dialogueStarted');

    boss.update(0.5);
    expect(boss.state).toBe('DIALOGUE');
    expect(boss.isDialogueActive).toBe(true);
    expect(shown.map(s => s.id)).toEqual(['BossIntro']);
    expect(started).toHaveLength(1);
    expect(started[0].duration).toBeCloseTo(1.7, 10);

    boss.update(0.5);
    boss.update(0.5);
    boss.update(0.5);
    expect(boss.state).toBe('DIALOGUE');
    boss.update(0.5);
    expect(boss.state).toBe('VULNERABLE');
    expect(boss.isDialogueActive).toBe(false);
  });

  it('ignores a second dialogue while one is running', () => {
    const dialogue = new DialogueDatabase([
      { id: 'BossIntro', lines: [{ speaker: 'Boss_Full', text: 'hello' }] },
      { id: 'BossPhaseChange', lines: [{ speaker: 'Player', text: 'no' }] },
    ]);
    const { boss, events } = setup({ dialogue });
    const started = collect(events, 'dialogueStarted');
    boss.update(0.1);
    boss.startDialogue('BossPhaseChange', 'IDLE');
    expect(started.map(s => s.sequenceId)).toEqual(['BossIntro']);
    for (let i = 0; i < 40; i++) boss.update(0.1);
    expect(boss.state).toBe('VULNERABLE');
  });

  it('skips a missing sequence', () => {
    const dialogue = new DialogueDatabase([]);
    const { boss } = setup({ dialogue });
    boss.update(0.1);
    expect(boss.state).toBe('VULNERABLE');
  });

  it('falls back to IDLE when the target disappears', () => {
    const { boss } = setup();
    boss.update(0.1);
    boss.setTarget(null);
    boss.update(0.1);
    expect(boss.state).toBe('IDLE');
  });
});

describe('BossManager shield cycle', () => {
  it('raises the shield after exactly hitsPerCycle hits while VULNERABLE', () => {
    const { boss } = setup();
    boss.update(0.1);
    hit(boss, 2);
    expect(boss.state).toBe('VULNERABLE');
    expect(boss.cycleHits).toBe(2);
    hit(boss, 1);
    expect(boss.state).toBe('SHIELDING');
    expect(boss.isInvulnerable).toBe(true);
    expect(boss.cycleHits).toBe(0);
    expect(boss.health).toBe(270);
  });

  it('ignores hits while shielding or attacking', () => {
    const { boss } = setup();
    boss.update(0.1);
    hit(boss, 3);
    hit(boss, 1);
    expect(boss.health).toBe(270);
    boss.update(0.1);
    expect(boss.state).toBe('ATTACKING');
    hit(boss, 2);
    expect(boss.health).toBe(270);
  });

  it('accepts but does not count damage outside VULNERABLE', () => {
    const { boss } = setup({ initialState: 'IDLE' });
    boss.setTarget({ position: { x: 100, y: 0 } });
    hit(boss, 1);
    expect(boss.health).toBe(290);
    expect(boss.cycleHits).toBe(0);
  });

  it('spawns tentacles on the ground near the target until the shield drops', () => {
    const { boss, events, spawned } = setup({ tuning: { shieldDuration: 1, tentacleSpawnRate: 0.3 } });
    const raised = collect(events, 'shieldRaised');
    const lowered = collect(events, 'shieldLowered');
    boss.update(0.25);
    hit(boss, 3);
    boss.update(0.25);
    expect(boss.state).toBe('ATTACKING');
    expect(boss.shieldActive).toBe(true);
    expect(raised).toHaveLength(1);

    boss.update(0.25);
    expect(spawned).toEqual([{ x: 0, y: 0 }]);
    boss.update(0.25);
    boss.update(0.25);
    expect(spawned).toHaveLength(2);
    boss.update(0.25);
    expect(boss.state).toBe('VULNERABLE');
    expect(boss.isInvulnerable).toBe(false);
    expect(boss.shieldActive).toBe(false);
    expect(lowered).toHaveLength(1);
  });

  it('skips a spawn when the probe finds no ground', () => {
    const { boss, spawned } = setup({ groundProbe: noGround });
    boss.update(0.1);
    hit(boss, 3);
    boss.update(0.1);
    boss.update(0.1);
    expect(boss.state).toBe('ATTACKING');
    expect(spawned).toHaveLength(0);
  });
});

describe('BossManager death', () => {
  it('runs the explosion sequence and self-destructs after its length', () => {
    const { boss, events } = setup({ rng: () => 0, tuning: { maxHealth: 20, explosionCount: 4, explosionInterval: 0.25 } });
    const explosions = collect(events, 'explosion');
    const destroyed = collect(events, 'bossDestroyed');
    const died = collect(events, 'actorDied');
    boss.update(0.125);
    hit(boss, 2);
    expect(boss.state).toBe('DEATH');
    expect(boss.hittable.enabled).toBe(false);
    expect(died).toHaveLength(1);
    expect(explosions).toHaveLength(1);

    for (let i = 0; i < 7; i++) boss.update(0.125);
    expect(boss.isDestroyed).toBe(false);
    expect(explosions.map(e => e.index)).toEqual([0, 1, 2, 3]);
    boss.update(0.125);
    expect(boss.isDestroyed).toBe(true);
    expect(destroyed).toEqual([{ actorId: 'boss' }]);
    boss.update(0.125);
    expect(destroyed).toHaveLength(1);
  });

  it('places explosions at the boss when jitter is zero', () => {
    const { boss, events } = setup({ rng: () => 0, tuning: { maxHealth: 10 } });
    const explosions = collect(events, 'explosion');
    boss.update(0.125);
    const { x, y } = boss.position;
    hit(boss, 1);
    expect(explosions[0].x).toBe(x);
    expect(explosions[0].y).toBe(y);
  });

  it('ignores damage once dead', () => {
    const { boss, events } = setup({ tuning: { maxHealth: 30, hitsPerCycle: 10 } });
    const lowered = collect(events, 'shieldLowered');
    boss.update(0.1);
    hit(boss, 3);
    expect(boss.state).toBe('DEATH');
    hit(boss, 1);
    expect(boss.health).toBe(0);
    expect(lowered).toHaveLength(0);
  });
});

describe('BossManager hover', () => {
  it('bobs around its start height while vulnerable', () => {
    const { boss } = setup({ tuning: { hoverSpeed: 1, hoverAmplitude: 0.5 } });
    boss.update(0.5);
    boss.update(0.5);
    expect(boss.position.x).toBe(0);
    expect(boss.position.y).toBeCloseTo(5 + Math.sin(1) * 0.5, 10);
  });
});
