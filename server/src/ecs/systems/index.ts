// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';
export type { TickContext } from './TickContext';

// Runner
export { SystemRunner } from './SystemRunner';

// Input / spawning
export { ShipControlSystem } from './ShipControlSystem';
export { AsteroidSpawnSystem } from './AsteroidSpawnSystem';

// Physics
export { IntegrationSystem } from './IntegrationSystem';

// Collisions
export { CollisionDetectionSystem } from './CollisionDetectionSystem';
export { CollisionRulesSystem, createRoleLookup } from './CollisionRulesSystem';
