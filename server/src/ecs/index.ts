// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export {
  World,
  ComponentStore,
  Components,
  Tags,
} from '#shared';
export type {
  EntityId,
  ComponentType,
  // Component interfaces
  TransformComponent,
  VelocityComponent,
  CircleColliderComponent,
  RoleComponent,
  ShipComponent,
  AsteroidComponent,
  CameraComponent,
} from '#shared';

// Factories and World Setup
export {
  createWorld,
  createVelocity,
  createCollider,
  createShip,
  createAsteroid,
  createLaserShot,
  createCamera,
  spawnEntity,
  createWorldSpawner,
  destroyEntity,
  // Query helpers
  getRole,
  getShipEntity,
  getEntitiesWithRole,
  collectBodies,
  collectColliders,
  captureKinematics,
  // Direct component access
  requireTransform,
  requireVelocity,
  requireCollider,
} from './factories';
export type { SpawnRequest, VelocityOptions } from './factories';

// Deferred commands
export { CommandBuffer } from './commands';
export type { FlushResult } from './commands';

// Systems
export * from './systems';
