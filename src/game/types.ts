// Shared actor types for the combat core.
import type { Vec2 } from '../core/vector';
import type { Aabb } from '../physics/Aabb';

export type ActorKind = 'PLAYER' | 'BOSS' | 'DRONE' | 'HAZARD' | 'PROP';

export type PlayerState = 'IDLE' | 'RUNNING' | 'JUMPING' | 'FALLING' | 'DASHING' | 'DEATH';

export type BossState = 'IDLE' | 'HOVERING' | 'DIALOGUE' | 'VULNERABLE' | 'SHIELDING' | 'ATTACKING' | 'DEATH';

export type TentacleState = 'WARMING_UP' | 'ACTIVE' | 'RETRACTING' | 'DONE';

export type DroneState = 'PATROL' | 'TURNING' | 'EXPLODING' | 'RESPAWNING';

/** Collision layer bits. A dashing player keeps only GROUND in its mask. */
export const CollisionLayer = {
  GROUND: 1,
  ENEMY: 2,
  HAZARD: 4,
  ATTACK: 8,
} as const;

export const ALL_LAYERS = CollisionLayer.GROUND | CollisionLayer.ENEMY | CollisionLayer.HAZARD | CollisionLayer.ATTACK;

/** Anything that accepts damage requests from another actor. */
export interface DamageSink {
  takeDamage(amount: number, knockback?: Vec2): void;
}

/** The owner side of a hit volume: where it sits and where outcomes are routed. */
export interface DamageSource {
  readonly id: string;
  readonly position: Readonly<Vec2>;
  reportHit(direction: Vec2): void;
  reportDownwardHit(strength: number): void;
}

/** Straight-down ray against level ground. Returns the hit point or null. */
export interface GroundProbe {
  castDown(origin: Vec2, maxDistance: number): Vec2 | null;
}

/** Axis-aligned body that moves under its own velocity. */
export interface KinematicBody {
  position: Vec2;
  velocity: Vec2;
  readonly previousPosition: Readonly<Vec2>;
  readonly size: Readonly<Vec2>;
}

export interface GroundSensor {
  isGrounded(body: KinematicBody): boolean;
}

/** Something the world can test for overlap. */
export interface Collidable {
  readonly id: string;
  readonly kind: ActorKind;
  bounds(): Aabb;
}
