// ============================================
// Shared Type Definitions
// ============================================

import type { EntityId } from './ecs/types';

/**
 * 2D vector / position in world units.
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Role an entity plays in the collision rules.
 * Exactly one per entity; entities without a Role component are 'untagged'.
 */
export type EntityRole = 'untagged' | 'ship' | 'asteroid' | 'projectile';

/**
 * What a spawn request creates.
 * 'camera' has no role and exists only so scene setup can reset it.
 */
export type SpawnKind = 'ship' | 'asteroid' | 'projectile' | 'camera';

/**
 * Two distinct entities whose colliders overlapped this tick.
 * Reported once per tick; `a` is the entity whose radius triggered the hit.
 */
export interface CollisionPair {
  a: EntityId;
  b: EntityId;
}

/**
 * Collision threshold semantics.
 * - reference: distance < first entity's radius, order-dependent dedup
 * - summed: distance < sum of radii, each unordered pair once
 */
export type CollisionMode = 'reference' | 'summed';

/**
 * Logical input actions the ship reacts to.
 */
export type InputAction = 'forward' | 'turnLeft' | 'turnRight' | 'fire';
