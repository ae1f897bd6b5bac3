// ============================================
// Collision Rules & Scene Setup
// Turns collision pairs into destruction, scoring and resets
// ============================================

import type { CollisionPair, EntityId, EntityRole, SpawnKind, Vec2 } from '#shared';
import { getConfig } from './config';

/**
 * Creates and removes entities on behalf of the rules.
 * despawn() must tolerate IDs that no longer exist.
 */
export interface SpawnService {
  spawn(
    kind: SpawnKind,
    position: Vec2,
    heading: number,
    velocity: Vec2,
    angularVelocity: number
  ): EntityId;
  despawn(entity: EntityId): void;
}

export interface ScoreAccumulator {
  add(points: number): void;
}

/**
 * Read-only view of roles and the cleanup set for one batch of pairs.
 */
export interface RoleLookup {
  roleOf(entity: EntityId): EntityRole;
  cleanupEntities(): EntityId[];
}

export interface RuleOutcome {
  destroyed: Array<{ asteroid: EntityId; projectile: EntityId }>;
  pointsAwarded: number;
  sceneReset: { despawned: EntityId[]; ship: EntityId } | null;
}

/**
 * Spawn the camera and a fresh ship at the origin.
 * @returns the new ship's entity
 */
export function setupScene(spawner: SpawnService): EntityId {
  const origin = { x: 0, y: 0 };
  spawner.spawn('camera', origin, 0, { x: 0, y: 0 }, 0);
  return spawner.spawn('ship', origin, 0, { x: 0, y: 0 }, 0);
}

/**
 * Match a pair against two roles in either order.
 * Returns [entity with `first`, entity with `second`] or null.
 */
function matchRoles(
  pair: CollisionPair,
  roles: RoleLookup,
  first: EntityRole,
  second: EntityRole
): [EntityId, EntityId] | null {
  const roleA = roles.roleOf(pair.a);
  const roleB = roles.roleOf(pair.b);
  if (roleA === first && roleB === second) return [pair.a, pair.b];
  if (roleA === second && roleB === first) return [pair.b, pair.a];
  return null;
}

/**
 * Apply the collision rules to one tick's pairs, in order:
 *
 * 1. projectile + asteroid: despawn both, award ASTEROID_SCORE
 * 2. ship + asteroid: despawn every cleanup entity, then set the scene up again
 * 3. anything else: ignored
 *
 * A batch resets the scene at most once, so only one ship ever comes back.
 */
export function applyRules(
  pairs: readonly CollisionPair[],
  roles: RoleLookup,
  spawner: SpawnService,
  score: ScoreAccumulator
): RuleOutcome {
  const outcome: RuleOutcome = { destroyed: [], pointsAwarded: 0, sceneReset: null };

  for (const pair of pairs) {
    const hit = matchRoles(pair, roles, 'projectile', 'asteroid');
    if (hit) {
      const [projectile, asteroid] = hit;
      spawner.despawn(projectile);
      spawner.despawn(asteroid);

      const points = getConfig('ASTEROID_SCORE');
      score.add(points);
      outcome.pointsAwarded += points;
      outcome.destroyed.push({ asteroid, projectile });
      continue;
    }

    if (matchRoles(pair, roles, 'ship', 'asteroid') && !outcome.sceneReset) {
      const despawned = roles.cleanupEntities();
      for (const entity of despawned) {
        spawner.despawn(entity);
      }
      const ship = setupScene(spawner);
      outcome.sceneReset = { despawned, ship };
    }
  }

  return outcome;
}
