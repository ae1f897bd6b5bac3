// ============================================
// ECS System Types
// ============================================

import type { World } from '#shared';
import type { TickContext } from './TickContext';

/**
 * Base System interface
 * All game systems implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every game tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   * @param ctx Per-tick state, input, command buffer and collision list
   */
  update(world: World, deltaTime: number, ctx: TickContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * 1. Ship control (input -> velocity, laser spawns)
 * 2. Asteroid spawn timer
 * 3. Integration (drag, position, rotation)
 * 4. Collision detection (after every body moved)
 * 5. Collision rules (consume the whole batch)
 */
export const SystemPriority = {
  // Input and spawning - before physics
  SHIP_CONTROL: 100,
  ASTEROID_SPAWN: 110,

  // Physics
  INTEGRATION: 200,

  // Collisions
  COLLISION_DETECTION: 300,
  COLLISION_RULES: 400,
} as const;
