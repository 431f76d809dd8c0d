/**
 * Typed event bus for decoupled gameplay notifications.
 * Animation, audio routing, camera and scene hosts subscribe here; the state machines never read back.
 */
import type { Vec2 } from './vector';
import type { ActorKind } from '../game/types';
import { Logger } from './Logger';

export type EventMap = {
  stateChanged: { actorId: string; kind: ActorKind; from: string; to: string };
  hitVolumeSpawned: { ownerId: string; volumeId: number; damage: number; direction: Vec2; x: number; y: number };
  hitConfirmed: { ownerId: string; targetId: string; damage: number; direction: Vec2 };
  attackMissed: { ownerId: string };
  actorDamaged: { actorId: string; kind: ActorKind; amount: number; health: number };
  actorDied: { actorId: string; kind: ActorKind; x: number; y: number };
  levelReloadRequested: { actorId: string };
  bossDestroyed: { actorId: string };
  explosion: { actorId: string; index: number; x: number; y: number };
  shieldRaised: { actorId: string };
  shieldLowered: { actorId: string };
  tentacleSpawned: { id: string; x: number; y: number };
  dialogueStarted: { actorId: string; sequenceId: string; duration: number };
  droneRespawned: { actorId: string; x: number; y: number };
};

export type EventName = keyof EventMap;

type Handler<T> = (payload: T) => void;

type ListenerTable = { [K in EventName]: Set<Handler<EventMap[K]>> };

function createListenerTable(): ListenerTable {
  return {
    stateChanged: new Set(),
    hitVolumeSpawned: new Set(),
    hitConfirmed: new Set(),
    attackMissed: new Set(),
    actorDamaged: new Set(),
    actorDied: new Set(),
    levelReloadRequested: new Set(),
    bossDestroyed: new Set(),
    explosion: new Set(),
    shieldRaised: new Set(),
    shieldLowered: new Set(),
    tentacleSpawned: new Set(),
    dialogueStarted: new Set(),
    droneRespawned: new Set(),
  };
}

export class EventBus {
  private listeners: ListenerTable = createListenerTable();

  on<K extends EventName>(type: K, fn: Handler<EventMap[K]>): () => void {
    this.listeners[type].add(fn);
    return () => this.off(type, fn);
  }

  off<K extends EventName>(type: K, fn: Handler<EventMap[K]>): void {
    this.listeners[type].delete(fn);
  }

  /** Listener errors are logged and never reach the emitting actor. */
  emit<K extends EventName>(type: K, payload: EventMap[K]): void {
    const set = this.listeners[type];
    if (set.size === 0) return;
    for (const fn of set) {
      try {
        fn(payload);
      } catch (err) {
        Logger.error(`[EventBus] listener for '${type}' threw`, err);
      }
    }
  }

  clear(): void {
    this.listeners = createListenerTable();
  }
}
