// ============================================
// Kinematics & Collision Detection
// Pure per-tick physics over component data
// ============================================

import type { EntityId } from './ecs/types';
import type { TransformComponent, VelocityComponent } from './ecs/components';
import type { CollisionMode, CollisionPair, Vec2 } from './types';
import { distance } from './math';

/**
 * A body the integrator advances. Components are mutated in place.
 */
export interface Body {
  entity: EntityId;
  transform: TransformComponent;
  velocity: VelocityComponent;
}

/**
 * A collider snapshot taken after integration.
 */
export interface Collidable {
  entity: EntityId;
  position: Vec2;
  radius: number;
}

export interface DetectOptions {
  mode?: CollisionMode;
}

/**
 * Reject elapsed times the integrator cannot give meaning to.
 */
export function assertValidDelta(dt: number): void {
  if (!Number.isFinite(dt) || dt < 0) {
    throw new RangeError(`Tick delta must be a finite number >= 0, got ${dt}`);
  }
}

/**
 * Advance every body by dt seconds.
 *
 * Drag is applied first, per tick: v *= 1 - drag * dt. This is
 * frame-rate dependent and is not clamped, so drag * dt > 1 flips
 * the velocity's sign. Rotation accumulates without wrapping.
 */
export function integrate(bodies: readonly Body[], dt: number): void {
  assertValidDelta(dt);

  for (const { transform, velocity } of bodies) {
    velocity.linear.x *= 1 - velocity.linearDrag.x * dt;
    velocity.linear.y *= 1 - velocity.linearDrag.y * dt;
    velocity.angular *= 1 - velocity.angularDrag * dt;

    transform.x += velocity.linear.x * dt;
    transform.y += velocity.linear.y * dt;
    transform.rotation += velocity.angular * dt;
  }
}

/**
 * Pairwise O(n²) overlap test over all colliders.
 *
 * In 'reference' mode (default) A hits B when their distance is below
 * A's radius alone. (A, B) is skipped when B already registered a hit
 * against A, so a mutual overlap is reported once, from whichever entity
 * came first. With unequal radii this can drop a pair the other
 * ordering would have produced differently; that quirk is kept.
 *
 * Pairs come out grouped by first entity, in input order.
 */
export function detectCollisions(
  colliders: readonly Collidable[],
  options: DetectOptions = {}
): CollisionPair[] {
  if (options.mode === 'summed') {
    return detectSummed(colliders);
  }

  const hits = new Map<EntityId, EntityId[]>();

  for (const a of colliders) {
    let registered = hits.get(a.entity);
    if (!registered) {
      registered = [];
      hits.set(a.entity, registered);
    }

    for (const b of colliders) {
      if (a.entity === b.entity) continue;
      if (distance(a.position, b.position) >= a.radius) continue;

      // B already reported this overlap from its side
      if (hits.get(b.entity)?.includes(a.entity)) continue;
      if (registered.includes(b.entity)) continue;

      registered.push(b.entity);
    }
  }

  const pairs: CollisionPair[] = [];
  for (const [a, others] of hits) {
    for (const b of others) {
      pairs.push({ a, b });
    }
  }
  return pairs;
}

function detectSummed(colliders: readonly Collidable[]): CollisionPair[] {
  const pairs: CollisionPair[] = [];

  for (let i = 0; i < colliders.length; i++) {
    const a = colliders[i];
    for (let j = i + 1; j < colliders.length; j++) {
      const b = colliders[j];
      if (a.entity === b.entity) continue;
      if (distance(a.position, b.position) < a.radius + b.radius) {
        pairs.push({ a: a.entity, b: b.entity });
      }
    }
  }

  return pairs;
}
