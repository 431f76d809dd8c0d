import { describe, it, expect } from 'vitest';
import { Drone } from '../src/game/Drone';
import { EventBus } from '../src/core/EventBus';
import { aabbFromCenter } from '../src/physics/Aabb';
import type { AudioCue, AudioOutput } from '../src/game/SoundManager';
import type { ContactTarget } from '../src/game/TentacleHazard';
import type { DroneTuning } from '../src/config/tuning';

function setup(tuning: Partial<DroneTuning> = {}) {
  const events = new EventBus();
  const cues: AudioCue[] = [];
  const audio: AudioOutput = { play: c => { cues.push(c); } };
  const drone = new Drone({ id: 'drone-1', position: { x: 0, y: 0 }, events, audio, tuning });
  return { drone, events, cues };
}

describe('Drone patrol', () => {
  it('moves to the patrol end, snaps and pauses to turn', () => {
    const { drone } = setup({ patrolDistance: 1, moveSpeed: 4 });
    drone.update(0.125);
    expect(drone.position.x).toBe(0.5);
    drone.update(0.125);
    expect(drone.position.x).toBe(1);
    drone.update(0.125);
    expect(drone.state).toBe('TURNING');
    expect(drone.facingRight).toBe(false);
    expect(drone.velocity).toEqual({ x: 0, y: 0 });

    drone.update(0.125);
    drone.update(0.125);
    drone.update(0.125);
    expect(drone.state).toBe('TURNING');
    drone.update(0.125);
    expect(drone.state).toBe('PATROL');
    drone.update(0.125);
    expect(drone.position.x).toBe(0.5);
  });

  it('starts its hover loop on creation', () => {
    const { cues } = setup();
    expect(cues).toEqual([{ type: 'hover_start', sourceId: 'drone-1' }]);
  });
});

describe('Drone death and respawn', () => {
  it('explodes, hides, then resets at its start', () => {
    const { drone, events, cues } = setup({ patrolDistance: 1, moveSpeed: 4, explosionDuration: 0.25, respawnDelay: 0.5 });
    const respawns: string[] = [];
    events.on('droneRespawned', e => { respawns.push(e.actorId); });
    drone.update(0.125);
    drone.hittable.takeHit(30);
    expect(drone.state).toBe('EXPLODING');
    expect(drone.isAlive).toBe(false);
    expect(drone.hittable.enabled).toBe(false);
    expect(cues.slice(1)).toEqual([{ type: 'hover_stop', sourceId: 'drone-1' }, { type: 'explosion' }]);

    drone.update(0.125);
    drone.update(0.125);
    expect(drone.state).toBe('RESPAWNING');
    for (let i = 0; i < 3; i++) drone.update(0.125);
    expect(drone.state).toBe('RESPAWNING');
    drone.update(0.125);
    expect(drone.state).toBe('PATROL');
    expect(drone.position).toEqual({ x: 0, y: 0 });
    expect(drone.hittable.health).toBe(30);
    expect(drone.hittable.enabled).toBe(true);
    expect(drone.facingRight).toBe(true);
    expect(respawns).toEqual(['drone-1']);
  });

  it('survives hits below its health', () => {
    const { drone } = setup();
    drone.hittable.takeHit(10);
    expect(drone.state).toBe('PATROL');
    expect(drone.hittable.health).toBe(20);
  });
});

describe('Drone contact damage', () => {
  it('hurts an overlapping target only while alive', () => {
    const { drone } = setup();
    const taken: number[] = [];
    const target: ContactTarget = {
      bounds: () => aabbFromCenter({ x: 0.5, y: 0 }, { x: 1, y: 1 }),
      takeDamage: amount => { taken.push(amount); },
    };
    expect(drone.tryContact(target)).toBe(true);
    drone.hittable.takeHit(30);
    expect(drone.tryContact(target)).toBe(false);
    expect(taken).toEqual([10]);
  });
});
