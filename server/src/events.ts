// ============================================
// Event Bus - Type-Safe Local Pub/Sub
// Game outputs for renderers, audio and tooling
// ============================================

import type { EntityId, Vec2 } from '#shared';

export interface GameEventMap {
  asteroidSpawned: { entity: EntityId; position: Vec2; velocity: Vec2 };
  laserFired: { entity: EntityId; position: Vec2; heading: number; velocity: Vec2 };
  asteroidDestroyed: { asteroid: EntityId; projectile: EntityId };
  scoreChanged: { score: number; delta: number };
  sceneReset: { despawned: EntityId[] };
}

export type GameEventType = keyof GameEventMap;

type EventHandler<T extends GameEventType> = (event: GameEventMap[T]) => void;

type HandlerTable = { [K in GameEventType]: Set<EventHandler<K>> };

function createHandlerTable(): HandlerTable {
  return {
    asteroidSpawned: new Set(),
    laserFired: new Set(),
    asteroidDestroyed: new Set(),
    scoreChanged: new Set(),
    sceneReset: new Set(),
  };
}

export class EventBus {
  private readonly handlers: HandlerTable = createHandlerTable();

  /**
   * Subscribe to an event (type-safe)
   * @returns unsubscribe function
   */
  on<T extends GameEventType>(type: T, handler: EventHandler<T>): () => void {
    this.handlers[type].add(handler);
    return () => this.off(type, handler);
  }

  off<T extends GameEventType>(type: T, handler: EventHandler<T>): void {
    this.handlers[type].delete(handler);
  }

  emit<T extends GameEventType>(type: T, event: GameEventMap[T]): void {
    // Copy so handlers can unsubscribe mid-dispatch
    [...this.handlers[type]].forEach((handler) => handler(event));
  }

  /**
   * Clear all handlers (for cleanup/testing)
   */
  clear(): void {
    for (const handlers of Object.values(this.handlers)) {
      handlers.clear();
    }
  }
}
