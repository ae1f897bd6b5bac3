// ============================================
// Tick Context
// Everything a system may touch besides the World
// ============================================

import type { CollisionPair, RandomSource } from '#shared';
import type { GameState } from '../../state';
import type { InputSource } from '../../input';
import type { EventBus } from '../../events';
import type { CommandBuffer } from '../commands';

/**
 * Built fresh by Game for every tick.
 *
 * - commands: deferred spawns/despawns/score, flushed after all systems
 * - collisions: written by detection, consumed by the rules
 */
export interface TickContext {
  state: GameState;
  input: InputSource;
  commands: CommandBuffer;
  collisions: CollisionPair[];
  random: RandomSource;
  bus: EventBus;
}
