// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  // Kinematic body (integrated every tick)
  Transform: 'Transform',
  Velocity: 'Velocity',

  // Collision extent
  CircleCollider: 'CircleCollider',

  // Rule dispatch
  Role: 'Role',

  // Entity-type data
  Ship: 'Ship',
  Asteroid: 'Asteroid',
  Camera: 'Camera',
} as const;

/**
 * Component type identifier - one of the keys registered above.
 */
export type ComponentType = (typeof Components)[keyof typeof Components];

/**
 * Entity tags for quick classification.
 * Tags are lightweight - just a Set<string> per entity.
 */
export const Tags = {
  // Removed by a full scene reset
  GameCleanup: 'game_cleanup',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];
