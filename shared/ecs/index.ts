// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags } from './types';
export type { EntityId, ComponentType, Tag } from './types';

// Component interfaces
export type {
  TransformComponent,
  VelocityComponent,
  CircleColliderComponent,
  RoleComponent,
  ShipComponent,
  AsteroidComponent,
  CameraComponent,
  ComponentMap,
} from './components';
