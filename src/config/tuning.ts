/**
 * Default tuning for every actor. Units are world units and seconds.
 * Actors accept Partial overrides merged over these via withTuning().
 */
import type { Vec2 } from '../core/vector';

export interface PlayerTuning {
  maxHealth: number;
  size: Vec2;
  maxRunSpeed: number;
  acceleration: number;
  deceleration: number;
  /** Multiplier on acceleration while airborne. */
  airControl: number;
  jumpSpeed: number;
  gravity: number;
  maxFallSpeed: number;
  coyoteTime: number;
  jumpBufferTime: number;
  variableJumpTime: number;
  dashSpeed: number;
  dashDuration: number;
  maxDashes: number;
  attackDamage: number;
  attackCooldown: number;
  attackActiveDuration: number;
  /** Vertical input magnitude above which an attack aims up/down instead of forward. */
  attackAimDeadzone: number;
  attackSizeForward: Vec2;
  attackSizeVertical: Vec2;
  attackReach: number;
  invulnerabilityDuration: number;
  defaultKnockback: Vec2;
  /** Falling below this y kills the player regardless of health. */
  fallDeathY: number;
  reloadDelay: number;
}

export const PLAYER_TUNING: Readonly<PlayerTuning> = {
  maxHealth: 100,
  size: { x: 0.8, y: 1.6 },
  maxRunSpeed: 12,
  acceleration: 120,
  deceleration: 100,
  airControl: 0.7,
  jumpSpeed: 16,
  gravity: 48,
  maxFallSpeed: 32,
  coyoteTime: 0.12,
  jumpBufferTime: 0.12,
  variableJumpTime: 0.18,
  dashSpeed: 20,
  dashDuration: 0.15,
  maxDashes: 1,
  attackDamage: 10,
  attackCooldown: 0.35,
  attackActiveDuration: 0.1,
  attackAimDeadzone: 0.5,
  attackSizeForward: { x: 1.6, y: 1.0 },
  attackSizeVertical: { x: 1.0, y: 1.6 },
  attackReach: 1.2,
  invulnerabilityDuration: 1.0,
  defaultKnockback: { x: 6, y: 8 },
  fallDeathY: -30,
  reloadDelay: 2.0,
};

export interface BossTuning {
  maxHealth: number;
  size: Vec2;
  hitsPerCycle: number;
  hoverSpeed: number;
  hoverAmplitude: number;
  detectionRadius: number;
  shieldDuration: number;
  tentacleSpawnRate: number;
  tentacleSpawnRadius: number;
  tentacleSpawnMaxRaycastDistance: number;
  pogoStrength: number;
  explosionCount: number;
  explosionInterval: number;
  explosionJitterRadius: number;
  initialDialogueId: string;
  postShieldDialogueId: string;
}

export const BOSS_TUNING: Readonly<BossTuning> = {
  maxHealth: 300,
  size: { x: 3, y: 3 },
  hitsPerCycle: 3,
  hoverSpeed: 1.0,
  hoverAmplitude: 0.5,
  detectionRadius: 15,
  shieldDuration: 10,
  tentacleSpawnRate: 0.5,
  tentacleSpawnRadius: 5,
  tentacleSpawnMaxRaycastDistance: 20,
  pogoStrength: 12,
  explosionCount: 5,
  explosionInterval: 0.2,
  explosionJitterRadius: 0.5,
  initialDialogueId: 'BossIntro',
  postShieldDialogueId: 'BossPhaseChange',
};

export interface TentacleTuning {
  damage: number;
  knockbackForce: number;
  /** Fixed push direction applied on contact, normalized before use. */
  knockbackDirection: Vec2;
  frameCount: number;
  frameRate: number;
  activationFrame: number;
  deactivationFrame: number;
  lingerDuration: number;
  activeScaleStart: number;
  activeScaleEnd: number;
  size: Vec2;
}

export const TENTACLE_TUNING: Readonly<TentacleTuning> = {
  damage: 15,
  knockbackForce: 4,
  knockbackDirection: { x: -1, y: 0.5 },
  frameCount: 16,
  frameRate: 12,
  activationFrame: 10,
  deactivationFrame: 11,
  lingerDuration: 0.5,
  activeScaleStart: 0.5,
  activeScaleEnd: 1.0,
  size: { x: 1, y: 3 },
};

export interface DroneTuning {
  maxHealth: number;
  size: Vec2;
  moveSpeed: number;
  patrolDistance: number;
  contactDamage: number;
  turnDuration: number;
  explosionDuration: number;
  respawnDelay: number;
  pogoStrength: number;
}

export const DRONE_TUNING: Readonly<DroneTuning> = {
  maxHealth: 30,
  size: { x: 1, y: 1 },
  moveSpeed: 3,
  patrolDistance: 5,
  contactDamage: 10,
  turnDuration: 0.4,
  explosionDuration: 0.6,
  respawnDelay: 5,
  pogoStrength: 12,
};

export interface DialogueTiming {
  /** Seconds per typed character. */
  typingSpeed: number;
  /** Pause after each line before auto-advance. */
  autoAdvanceDelay: number;
}

export const DIALOGUE_TIMING: Readonly<DialogueTiming> = {
  typingSpeed: 0.04,
  autoAdvanceDelay: 0.5,
};

export const LOOP_TUNING = {
  FIXED_HZ: 60,
  MAX_CATCH_UP_FRAMES: 5,
  /** Seconds a spent hit volume lingers for renderers after it stops dealing damage. */
  HIT_VOLUME_LINGER: 0.1,
} as const;

/** Shallow merge of overrides onto defaults; undefined overrides keep the default. */
export function withTuning<T extends object>(defaults: Readonly<T>, overrides?: Partial<T>): T {
  const defined: Partial<T> = {};
  if (overrides) {
    for (const key in overrides) {
      if (overrides[key] !== undefined) defined[key] = overrides[key];
    }
  }
  return { ...defaults, ...defined };
}

/** Problems found in a tentacle configuration; empty means usable. */
export function validateTentacleTuning(t: TentacleTuning): string[] {
  const problems: string[] = [];
  if (t.frameCount <= 0) problems.push('frameCount must be positive (no animation frames)');
  if (t.frameRate <= 0) problems.push('frameRate must be positive');
  if (t.deactivationFrame < t.activationFrame) problems.push('deactivationFrame precedes activationFrame');
  return problems;
}

export const EXPLOSION_ANIMATION = {
  FRAME_RATE: 15,
  FRAME_COUNT: 8,
} as const;
