// ============================================
// Component Interfaces
// ============================================

import type { Vec2, EntityRole } from '../types';

/**
 * Transform - where an entity is and which way it faces.
 * Rotation is in radians and is never wrapped.
 */
export interface TransformComponent {
  x: number;
  y: number;
  rotation: number;
}

/**
 * Velocity - linear and angular motion plus per-tick drag.
 * Units: world units per second, radians per second.
 *
 * Drag is applied multiplicatively each tick: v *= 1 - drag * dt.
 */
export interface VelocityComponent {
  linear: Vec2;
  linearDrag: Vec2; // per axis, >= 0
  angular: number;
  angularDrag: number; // >= 0
}

/**
 * CircleCollider - collision extent.
 * Entities without one never take part in collision detection.
 */
export interface CircleColliderComponent {
  radius: number; // > 0
}

/**
 * Role - closed classification used by the collision rules.
 * Entities without this component are treated as 'untagged'.
 */
export interface RoleComponent {
  role: EntityRole;
}

/**
 * Ship - control tuning for the player ship.
 */
export interface ShipComponent {
  linearAccel: number; // units/s^2 along heading while thrusting
  angularAccel: number; // rad/s^2 while turning
}

/**
 * Asteroid - visual variant only, physics never reads it.
 */
export interface AsteroidComponent {
  variant: number;
}

/**
 * Camera - the view the surrounding renderer resets on scene setup.
 */
export interface CameraComponent {
  zoom: number;
}

/**
 * Maps every component type key to its data shape.
 * World uses this to type component access without casts.
 */
export interface ComponentMap {
  Transform: TransformComponent;
  Velocity: VelocityComponent;
  CircleCollider: CircleColliderComponent;
  Role: RoleComponent;
  Ship: ShipComponent;
  Asteroid: AsteroidComponent;
  Camera: CameraComponent;
}
