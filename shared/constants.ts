// ============================================
// Game Constants & Configuration
// Runtime-tunable values and static configuration
// ============================================

import type { CollisionMode, InputAction } from './types';

// Numeric keys that may be overridden at runtime (see server config)
export const TUNABLE_CONFIGS = [
  // Drag defaults (ship)
  'DEFAULT_LINEAR_DRAG',
  'DEFAULT_ANGULAR_DRAG',

  // Ship
  'SHIP_RADIUS',
  'SHIP_LINEAR_ACCEL',
  'SHIP_ANGULAR_ACCEL',

  // Lasers
  'LASER_RADIUS',
  'LASER_SPEED',

  // Asteroids
  'ASTEROID_RADIUS',
  'ASTEROID_MAX_SPEED',
  'ASTEROID_SPAWN_MIN',
  'ASTEROID_SPAWN_MAX',
  'ASTEROID_SPAWN_PERIOD',
  'ASTEROID_SPAWN_CHANCE',
  'ASTEROID_VARIANT_COUNT',

  // Scoring
  'ASTEROID_SCORE',
] as const;

export type TunableConfigKey = (typeof TUNABLE_CONFIGS)[number];

export const GAME_CONFIG: Record<TunableConfigKey, number> & {
  TICK_RATE: number;
  COLLISION_MODE: CollisionMode;
} = {
  // Simulation
  TICK_RATE: 60, // Headless runner ticks per second
  COLLISION_MODE: 'reference',

  // Drag applied to bodies that don't opt out (the ship)
  DEFAULT_LINEAR_DRAG: 0.5,
  DEFAULT_ANGULAR_DRAG: 0.5,

  // Ship
  SHIP_RADIUS: 50,
  SHIP_LINEAR_ACCEL: 50, // units/s^2 while thrusting
  SHIP_ANGULAR_ACCEL: 2 * Math.PI, // rad/s^2 while turning

  // Lasers
  LASER_RADIUS: 15,
  LASER_SPEED: 400, // muzzle speed, ship velocity is added on top

  // Asteroids
  ASTEROID_RADIUS: 50,
  ASTEROID_MAX_SPEED: 200, // speed rolled in [-max, max)
  ASTEROID_SPAWN_MIN: -550, // spawn box, both axes
  ASTEROID_SPAWN_MAX: 55,
  ASTEROID_SPAWN_PERIOD: 0.5, // seconds between spawn rolls
  ASTEROID_SPAWN_CHANCE: 10, // percent per roll
  ASTEROID_VARIANT_COUNT: 4,

  // Scoring
  ASTEROID_SCORE: 10,
};

/**
 * Raw keys bound to each logical action (lowercase, ' ' is space).
 */
export type KeyBindings = Record<InputAction, readonly string[]>;

export const KEY_BINDINGS: KeyBindings = {
  forward: ['w'],
  turnLeft: ['a'],
  turnRight: ['d'],
  fire: [' '],
};
