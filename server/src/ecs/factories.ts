// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import {
  World,
  ComponentStore,
  Components,
  Tags,
  randomInt,
  type EntityId,
  type EntityRole,
  type RandomSource,
  type SpawnKind,
  type Vec2,
  type TransformComponent,
  type VelocityComponent,
  type CircleColliderComponent,
  type RoleComponent,
  type ShipComponent,
  type AsteroidComponent,
  type CameraComponent,
  type Body,
  type Collidable,
} from '#shared';
import { getConfig } from '../config';
import type { SpawnService } from '../rules';

// ============================================
// World Setup
// ============================================

/**
 * Create and configure an ECS World with all component stores registered.
 */
export function createWorld(): World {
  const world = new World();

  world.registerStore(Components.Transform, new ComponentStore<TransformComponent>());
  world.registerStore(Components.Velocity, new ComponentStore<VelocityComponent>());
  world.registerStore(Components.CircleCollider, new ComponentStore<CircleColliderComponent>());
  world.registerStore(Components.Role, new ComponentStore<RoleComponent>());
  world.registerStore(Components.Ship, new ComponentStore<ShipComponent>());
  world.registerStore(Components.Asteroid, new ComponentStore<AsteroidComponent>());
  world.registerStore(Components.Camera, new ComponentStore<CameraComponent>());

  return world;
}

// ============================================
// Component Builders
// ============================================

export interface VelocityOptions {
  linear?: Vec2;
  linearDrag?: Vec2;
  angular?: number;
  angularDrag?: number;
}

/**
 * Build a Velocity component. Omitted drag falls back to the configured
 * defaults; negative drag is rejected.
 */
export function createVelocity(options: VelocityOptions = {}): VelocityComponent {
  const defaultLinearDrag = getConfig('DEFAULT_LINEAR_DRAG');
  const velocity: VelocityComponent = {
    linear: { ...(options.linear ?? { x: 0, y: 0 }) },
    linearDrag: { ...(options.linearDrag ?? { x: defaultLinearDrag, y: defaultLinearDrag }) },
    angular: options.angular ?? 0,
    angularDrag: options.angularDrag ?? getConfig('DEFAULT_ANGULAR_DRAG'),
  };

  const drags = [velocity.linearDrag.x, velocity.linearDrag.y, velocity.angularDrag];
  if (drags.some((drag) => !Number.isFinite(drag) || drag < 0)) {
    throw new RangeError(`Drag coefficients must be finite and >= 0, got ${drags.join(', ')}`);
  }

  return velocity;
}

/**
 * Velocity for bodies that coast forever (asteroids, lasers).
 */
function createDraglessVelocity(linear: Vec2, angular: number): VelocityComponent {
  return createVelocity({ linear, linearDrag: { x: 0, y: 0 }, angular, angularDrag: 0 });
}

export function createCollider(radius: number): CircleColliderComponent {
  if (!Number.isFinite(radius) || radius <= 0) {
    throw new RangeError(`Collider radius must be a finite number > 0, got ${radius}`);
  }
  return { radius };
}

// ============================================
// Entity Factories
// ============================================

interface SpawnOptions {
  id?: EntityId; // reserved via world.reserveEntityId()
  position?: Vec2;
  heading?: number;
}

/**
 * Create the player ship. Uses default drag so it coasts to a stop.
 */
export function createShip(world: World, options: SpawnOptions & { velocity?: Vec2; angularVelocity?: number } = {}): EntityId {
  const entity = world.createEntity(options.id);
  const { x, y } = options.position ?? { x: 0, y: 0 };

  world.addComponent(entity, Components.Transform, { x, y, rotation: options.heading ?? 0 });
  world.addComponent(entity, Components.Velocity, createVelocity({
    linear: options.velocity,
    angular: options.angularVelocity,
  }));
  world.addComponent(entity, Components.CircleCollider, createCollider(getConfig('SHIP_RADIUS')));
  world.addComponent(entity, Components.Role, { role: 'ship' });
  world.addComponent(entity, Components.Ship, {
    linearAccel: getConfig('SHIP_LINEAR_ACCEL'),
    angularAccel: getConfig('SHIP_ANGULAR_ACCEL'),
  });
  world.addTag(entity, Tags.GameCleanup);

  return entity;
}

/**
 * Create an asteroid. The visual variant never affects physics.
 */
export function createAsteroid(
  world: World,
  options: SpawnOptions & { velocity?: Vec2; angularVelocity?: number; variant?: number } = {}
): EntityId {
  const entity = world.createEntity(options.id);
  const { x, y } = options.position ?? { x: 0, y: 0 };

  world.addComponent(entity, Components.Transform, { x, y, rotation: options.heading ?? 0 });
  world.addComponent(
    entity,
    Components.Velocity,
    createDraglessVelocity(options.velocity ?? { x: 0, y: 0 }, options.angularVelocity ?? 0)
  );
  world.addComponent(entity, Components.CircleCollider, createCollider(getConfig('ASTEROID_RADIUS')));
  world.addComponent(entity, Components.Role, { role: 'asteroid' });
  world.addComponent(entity, Components.Asteroid, { variant: options.variant ?? 0 });
  world.addTag(entity, Tags.GameCleanup);

  return entity;
}

/**
 * Create a laser shot. Velocity is final (muzzle speed + inherited ship velocity).
 */
export function createLaserShot(world: World, options: SpawnOptions & { velocity?: Vec2 } = {}): EntityId {
  const entity = world.createEntity(options.id);
  const { x, y } = options.position ?? { x: 0, y: 0 };

  world.addComponent(entity, Components.Transform, { x, y, rotation: options.heading ?? 0 });
  world.addComponent(entity, Components.Velocity, createDraglessVelocity(options.velocity ?? { x: 0, y: 0 }, 0));
  world.addComponent(entity, Components.CircleCollider, createCollider(getConfig('LASER_RADIUS')));
  world.addComponent(entity, Components.Role, { role: 'projectile' });
  world.addTag(entity, Tags.GameCleanup);

  return entity;
}

/**
 * Create the camera. Untagged for the rules, removed by scene resets.
 */
export function createCamera(world: World, options: SpawnOptions = {}): EntityId {
  const entity = world.createEntity(options.id);
  const { x, y } = options.position ?? { x: 0, y: 0 };

  world.addComponent(entity, Components.Transform, { x, y, rotation: options.heading ?? 0 });
  world.addComponent(entity, Components.Camera, { zoom: 1 });
  world.addTag(entity, Tags.GameCleanup);

  return entity;
}

export interface SpawnRequest {
  kind: SpawnKind;
  position: Vec2;
  heading: number;
  velocity: Vec2;
  angularVelocity: number;
}

/**
 * Create whatever a spawn request describes.
 * The random source only picks asteroid visuals.
 */
export function spawnEntity(
  world: World,
  request: SpawnRequest,
  random: RandomSource,
  id?: EntityId
): EntityId {
  const { kind, position, heading, velocity, angularVelocity } = request;

  switch (kind) {
    case 'ship':
      return createShip(world, { id, position, heading, velocity, angularVelocity });
    case 'asteroid':
      return createAsteroid(world, {
        id,
        position,
        heading,
        velocity,
        angularVelocity,
        variant: randomInt(random, 0, getConfig('ASTEROID_VARIANT_COUNT')),
      });
    case 'projectile':
      return createLaserShot(world, { id, position, heading, velocity });
    case 'camera':
      return createCamera(world, { id, position, heading });
  }
}

/**
 * SpawnService that mutates the world immediately.
 * Used outside ticks (game start); inside ticks use a CommandBuffer.
 */
export function createWorldSpawner(world: World, random: RandomSource): SpawnService {
  return {
    spawn: (kind, position, heading, velocity, angularVelocity) =>
      spawnEntity(world, { kind, position, heading, velocity, angularVelocity }, random),
    despawn: (entity) => destroyEntity(world, entity),
  };
}

/**
 * Destroy an entity. Unknown entities are ignored.
 */
export function destroyEntity(world: World, entity: EntityId): void {
  world.destroyEntity(entity);
}

// ============================================
// Queries
// ============================================

export function getRole(world: World, entity: EntityId): EntityRole {
  return world.getComponent(entity, Components.Role)?.role ?? 'untagged';
}

/**
 * The (single) ship, if one exists right now.
 */
export function getShipEntity(world: World): EntityId | undefined {
  return world.query(Components.Ship)[0];
}

export function getEntitiesWithRole(world: World, role: EntityRole): EntityId[] {
  return world.query(Components.Role).filter((entity) => getRole(world, entity) === role);
}

/**
 * Bodies the integrator should advance, in entity order.
 */
export function collectBodies(world: World): Body[] {
  const bodies: Body[] = [];
  world.queryEach([Components.Transform, Components.Velocity], (entity) => {
    const transform = world.getComponent(entity, Components.Transform);
    const velocity = world.getComponent(entity, Components.Velocity);
    if (!transform || !velocity) return;
    bodies.push({ entity, transform, velocity });
  });
  return bodies;
}

/**
 * Position/radius snapshots for collision detection, in entity order.
 */
export function collectColliders(world: World): Collidable[] {
  const colliders: Collidable[] = [];
  world.queryEach([Components.Transform, Components.CircleCollider], (entity) => {
    const transform = world.getComponent(entity, Components.Transform);
    const collider = world.getComponent(entity, Components.CircleCollider);
    if (!transform || !collider) return;
    colliders.push({ entity, position: { x: transform.x, y: transform.y }, radius: collider.radius });
  });
  return colliders;
}

/**
 * Copy every transform and velocity so a failed tick can be undone.
 * @returns a function that writes the copies back
 */
export function captureKinematics(world: World): () => void {
  const transforms = new Map<EntityId, TransformComponent>();
  const velocities = new Map<EntityId, VelocityComponent>();

  world.queryEach([Components.Transform], (entity) => {
    const transform = world.getComponent(entity, Components.Transform);
    if (transform) transforms.set(entity, { ...transform });
  });
  world.queryEach([Components.Velocity], (entity) => {
    const velocity = world.getComponent(entity, Components.Velocity);
    if (!velocity) return;
    velocities.set(entity, {
      linear: { ...velocity.linear },
      linearDrag: { ...velocity.linearDrag },
      angular: velocity.angular,
      angularDrag: velocity.angularDrag,
    });
  });

  return () => {
    for (const [entity, saved] of transforms) {
      const transform = world.getComponent(entity, Components.Transform);
      if (transform) Object.assign(transform, saved);
    }
    for (const [entity, saved] of velocities) {
      const velocity = world.getComponent(entity, Components.Velocity);
      if (!velocity) continue;
      velocity.linear = { ...saved.linear };
      velocity.linearDrag = { ...saved.linearDrag };
      velocity.angular = saved.angular;
      velocity.angularDrag = saved.angularDrag;
    }
  };
}

// ============================================
// Direct Component Access
// ============================================

export function requireTransform(world: World, entity: EntityId): TransformComponent {
  const comp = world.getComponent(entity, Components.Transform);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Transform missing on entity ${entity}`);
  }
  return comp;
}

export function requireVelocity(world: World, entity: EntityId): VelocityComponent {
  const comp = world.getComponent(entity, Components.Velocity);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Velocity missing on entity ${entity}`);
  }
  return comp;
}

export function requireCollider(world: World, entity: EntityId): CircleColliderComponent {
  const comp = world.getComponent(entity, Components.CircleCollider);
  if (!comp) {
    throw new Error(`EntityMissingComponent: CircleCollider missing on entity ${entity}`);
  }
  return comp;
}
