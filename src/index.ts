export { Logger, type LogLevel, type TelemetryHook } from './core/Logger';
export { EventBus, type EventMap, type EventName } from './core/EventBus';
export { GameLoop, timerScheduler, type FrameScheduler, type GameLoopOptions } from './core/GameLoop';
export * from './core/vector';
export * from './config/tuning';
export * from './physics/Aabb';
export { LevelGeometry } from './physics/LevelGeometry';
export * from './game/types';
export { TimerBank } from './game/TimerBank';
export { Hittable, type HittableOptions } from './game/combat/Hittable';
export { HitVolume, type HitVolumeSpec, type HitCandidate, type HitResult } from './game/combat/HitVolume';
export { HitVolumeManager, type HitTarget } from './game/combat/HitVolumeManager';
export { InputSampler, NEUTRAL_INPUT, type InputSnapshot, type RawInputFrame } from './game/InputSampler';
export { KEY_BINDINGS, bindKeyboard, createKeyState, fromKeyState, type KeyState } from './game/keyState';
export { Player, type PlayerOptions } from './game/Player';
export { BossManager, type BossOptions, type BossTarget, type TentacleSpawner } from './game/BossManager';
export { TentacleHazard, type ContactTarget } from './game/TentacleHazard';
export { Drone, type DroneOptions } from './game/Drone';
export { FrameClock, ExplosionAnimation } from './game/FrameClock';
export { DialogueDatabase, estimateDialogueDuration, type DialogueLine, type DialoguePresenter, type DialogueSequence, type Speaker } from './game/DialogueDatabase';
export { SoundManager, NullAudioOutput, hitSoundKey, type AudioCue, type AudioOutput, type SoundBank, type SoundFactory, type SoundHandle } from './game/SoundManager';
export { GameWorld, type GameWorldOptions } from './game/GameWorld';
