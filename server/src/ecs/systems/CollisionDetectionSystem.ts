// ============================================
// Collision Detection System
// Snapshots colliders after integration and records overlapping pairs
// ============================================

import { detectCollisions, type World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { getCollisionMode } from '../../config';
import { collectColliders } from '../factories';

export class CollisionDetectionSystem implements System {
  readonly name = 'CollisionDetectionSystem';

  update(world: World, _deltaTime: number, ctx: TickContext): void {
    const pairs = detectCollisions(collectColliders(world), { mode: getCollisionMode() });
    ctx.collisions.push(...pairs);
  }
}
