import { Logger } from '../../core/Logger';
import type { EventBus } from '../../core/EventBus';
import { overlaps, type Aabb } from '../../physics/Aabb';
import { LOOP_TUNING } from '../../config/tuning';
import { HitVolume, type HitCandidate, type HitVolumeSpec } from './HitVolume';

/** A world entity hit volumes can test against. */
export interface HitTarget extends HitCandidate {
  bounds(): Aabb;
}

/**
 * Owns every live hit volume: spawning, expiry and the overlap pass.
 */
export class HitVolumeManager {
  private volumes: HitVolume[] = [];
  private nextId = 1;
  private readonly events: EventBus | null;

  constructor(events?: EventBus) {
    this.events = events ?? null;
  }

  /**
   * Create an immediately-enabled volume with an empty visited set.
   * A non-positive active duration is rejected and yields null.
   */
  spawn(spec: HitVolumeSpec): HitVolume | null {
    if (!(spec.activeDuration > 0)) {
      Logger.debug(`[HitVolumeManager] rejected volume from ${spec.owner.id}: activeDuration=${spec.activeDuration}`);
      return null;
    }
    const volume = new HitVolume(this.nextId++, {
      ...spec,
      lingerDuration: spec.lingerDuration ?? LOOP_TUNING.HIT_VOLUME_LINGER,
    });
    this.volumes.push(volume);
    if (this.events) {
      const b = volume.bounds();
      this.events.emit('hitVolumeSpawned', {
        ownerId: spec.owner.id,
        volumeId: volume.id,
        damage: spec.damage,
        direction: volume.direction,
        x: (b.minX + b.maxX) / 2,
        y: (b.minY + b.maxY) / 2,
      });
    }
    return volume;
  }

  update(dtSec: number): void {
    for (const v of this.volumes) v.update(dtSec);
    this.volumes = this.volumes.filter(v => !v.isDestroyed);
  }

  /** Run every active volume against every overlapping target. Returns confirmed hits. */
  resolve(targets: readonly HitTarget[]): number {
    let hits = 0;
    for (const volume of this.volumes) {
      if (!volume.isActive) continue;
      const box = volume.bounds();
      for (const target of targets) {
        if (!overlaps(box, target.bounds())) continue;
        const result = volume.tryHit(target);
        if (!result) continue;
        hits++;
        this.events?.emit('hitConfirmed', {
          ownerId: volume.owner.id,
          targetId: target.id,
          damage: volume.damage,
          direction: result.hit.direction,
        });
      }
    }
    return hits;
  }

  getVolumes(): readonly HitVolume[] {
    return this.volumes;
  }

  clear(): void {
    this.volumes = [];
  }
}
