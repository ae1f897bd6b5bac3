// ============================================
// Shared Types & Constants
// Used by the simulation server and any front end driving it
// ============================================

// ECS Module - Entity Component System
export * from './ecs';

// Math utilities - vectors and random ranges
export * from './math';

// Seeded random sources
export * from './random';

// Kinematics and collision detection
export * from './physics';

// Game constants (GAME_CONFIG, TUNABLE_CONFIGS, KEY_BINDINGS)
export * from './constants';

// Type definitions (Vec2, EntityRole, CollisionPair, ...)
export * from './types';
