// ============================================
// Collision Rules System
// Feeds the tick's collision pairs through the game rules
// ============================================

import { Tags, type EntityId, type World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { applyRules, type RoleLookup } from '../../rules';
import { logAsteroidDestroyed, logSceneReset } from '../../logger';
import { getRole } from '../factories';
import type { CommandBuffer } from '../commands';

/**
 * Roles come from the world as it was before this tick's flush.
 * Cleanup covers tagged entities plus spawns still waiting in the buffer,
 * so a reset also removes lasers/asteroids requested earlier this tick.
 */
export function createRoleLookup(world: World, commands: CommandBuffer): RoleLookup {
  return {
    roleOf: (entity: EntityId) => getRole(world, entity),
    cleanupEntities: () => [...world.getEntitiesWithTag(Tags.GameCleanup), ...commands.pendingSpawnIds()],
  };
}

export class CollisionRulesSystem implements System {
  readonly name = 'CollisionRulesSystem';

  update(world: World, _deltaTime: number, ctx: TickContext): void {
    if (ctx.collisions.length === 0) return;

    const pairs = ctx.collisions.splice(0);
    const outcome = applyRules(pairs, createRoleLookup(world, ctx.commands), ctx.commands, ctx.commands);

    for (const { asteroid, projectile } of outcome.destroyed) {
      logAsteroidDestroyed(asteroid, projectile);
      ctx.bus.emit('asteroidDestroyed', { asteroid, projectile });
    }

    if (outcome.sceneReset) {
      const { despawned } = outcome.sceneReset;
      logSceneReset(ctx.state.elapsedSeconds, despawned.length);
      ctx.bus.emit('sceneReset', { despawned });
    }
  }
}
