import { describe, it, expect } from 'vitest';
import { HitVolume } from '../src/game/combat/HitVolume';
import { HitVolumeManager, type HitTarget } from '../src/game/combat/HitVolumeManager';
import { Hittable } from '../src/game/combat/Hittable';
import { EventBus } from '../src/core/EventBus';
import { aabbFromCenter } from '../src/physics/Aabb';
import type { DamageSource } from '../src/game/types';
import type { Vec2 } from '../src/core/vector';

interface RecordingOwner extends DamageSource {
  hits: Vec2[];
  pogos: number[];
}

function makeOwner(id = 'hero'): RecordingOwner {
  const hits: Vec2[] = [];
  const pogos: number[] = [];
  return {
    id,
    position: { x: 0, y: 0 },
    hits,
    pogos,
    reportHit: d => { hits.push(d); },
    reportDownwardHit: s => { pogos.push(s); },
  };
}

function makeTarget(id: string, hittable: Hittable | null, center: Vec2 = { x: 1, y: 0 }): HitTarget {
  return { id, hittable, bounds: () => aabbFromCenter(center, { x: 1, y: 1 }) };
}

const forward = { x: 1, y: 0 };

function volume(owner: DamageSource, direction: Vec2 = forward, activeDuration = 0.1, lingerDuration = 0.1): HitVolume {
  return new HitVolume(1, { owner, damage: 5, direction, offset: { x: 1, y: 0 }, size: { x: 1, y: 1 }, activeDuration, lingerDuration });
}

describe('HitVolume', () => {
  it('hits a target at most once per activation', () => {
    const owner = makeOwner();
    const target = new Hittable({ maxHealth: 50 });
    const v = volume(owner);
    expect(v.tryHit(makeTarget('drone', target))).not.toBeNull();
    expect(v.tryHit(makeTarget('drone', target))).toBeNull();
    expect(target.health).toBe(45);
    expect(v.hitCount).toBe(1);
    expect(owner.hits).toEqual([forward]);
  });

  it('counts each distinct target once', () => {
    const v = volume(makeOwner());
    const a = new Hittable({ maxHealth: 50 });
    const b = new Hittable({ maxHealth: 50 });
    v.tryHit(makeTarget('a', a));
    v.tryHit(makeTarget('b', b));
    v.tryHit(makeTarget('a', a));
    expect(v.hitCount).toBe(2);
    expect(a.health).toBe(45);
    expect(b.health).toBe(45);
  });

  it('never hits its owner', () => {
    const owner = makeOwner('hero');
    const v = volume(owner);
    expect(v.tryHit(makeTarget('hero', new Hittable({ maxHealth: 10 })))).toBeNull();
    expect(owner.hits).toHaveLength(0);
  });

  it('treats a candidate without a hittable as no target', () => {
    const v = volume(makeOwner());
    expect(v.tryHit(makeTarget('wall', null))).toBeNull();
    expect(v.hasHit('wall')).toBe(false);
  });

  it('skips disabled hittables', () => {
    const h = new Hittable({ maxHealth: 10 });
    h.enabled = false;
    expect(volume(makeOwner()).tryHit(makeTarget('drone', h))).toBeNull();
    expect(h.health).toBe(10);
  });

  it('returns a pogo outcome only for an exact downward strike', () => {
    const owner = makeOwner();
    const down = volume(owner, { x: 0, y: -1 });
    const result = down.tryHit(makeTarget('boss', new Hittable({ pogoStrength: 9 })));
    expect(result?.pogo).toEqual({ strength: 9 });
    expect(owner.pogos).toEqual([9]);

    const slanted = volume(makeOwner(), { x: 0.001, y: -1 });
    expect(slanted.tryHit(makeTarget('boss', new Hittable({ pogoStrength: 9 })))?.pogo).toBeNull();
  });

  it('is inert with a non-positive duration', () => {
    const v = volume(makeOwner(), forward, 0);
    expect(v.isActive).toBe(false);
    expect(v.isDestroyed).toBe(true);
    expect(v.tryHit(makeTarget('drone', new Hittable({ maxHealth: 10 })))).toBeNull();
  });

  it('stops hitting after its window and is destroyed after the linger', () => {
    const v = volume(makeOwner(), forward, 0.1, 0.1);
    v.update(0.05);
    expect(v.isActive).toBe(true);
    v.update(0.06);
    expect(v.isActive).toBe(false);
    expect(v.isDestroyed).toBe(false);
    expect(v.tryHit(makeTarget('drone', new Hittable({ maxHealth: 10 })))).toBeNull();
    v.update(0.2);
    expect(v.isDestroyed).toBe(true);
  });

  it('clears the visited set when reactivated', () => {
    const target = new Hittable({ maxHealth: 50 });
    const v = volume(makeOwner());
    v.tryHit(makeTarget('drone', target));
    v.activate();
    expect(v.hitCount).toBe(0);
    expect(v.tryHit(makeTarget('drone', target))).not.toBeNull();
    expect(target.health).toBe(40);
  });
});

describe('HitVolumeManager', () => {
  it('rejects volumes with a non-positive duration', () => {
    const mgr = new HitVolumeManager();
    const spec = { owner: makeOwner(), damage: 1, direction: forward, offset: forward, size: { x: 1, y: 1 }, activeDuration: -1 };
    expect(mgr.spawn(spec)).toBeNull();
    expect(mgr.getVolumes()).toHaveLength(0);
  });

  it('resolves overlaps once per volume and emits hitConfirmed', () => {
    const events = new EventBus();
    const confirmed: string[] = [];
    events.on('hitConfirmed', e => { confirmed.push(`${e.ownerId}->${e.targetId}`); });
    const mgr = new HitVolumeManager(events);
    const owner = makeOwner();
    const spec = { owner, damage: 3, direction: forward, offset: forward, size: { x: 1, y: 1 }, activeDuration: 0.1 };
    mgr.spawn(spec);
    mgr.spawn(spec);
    const target = new Hittable({ maxHealth: 20 });
    const targets = [makeTarget('drone', target), makeTarget('far', new Hittable({ maxHealth: 20 }), { x: 10, y: 0 })];
    expect(mgr.resolve(targets)).toBe(2);
    expect(mgr.resolve(targets)).toBe(0);
    expect(target.health).toBe(14);
    expect(confirmed).toEqual(['hero->drone', 'hero->drone']);
  });

  it('drops destroyed volumes on update', () => {
    const mgr = new HitVolumeManager();
    mgr.spawn({ owner: makeOwner(), damage: 1, direction: forward, offset: forward, size: { x: 1, y: 1 }, activeDuration: 0.1, lingerDuration: 0 });
    mgr.update(0.2);
    expect(mgr.getVolumes()).toHaveLength(0);
  });
});
