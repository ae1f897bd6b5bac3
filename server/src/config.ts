// ============================================
// Runtime Configuration
// GAME_CONFIG with live overrides for tuning
// ============================================

import {
  GAME_CONFIG,
  TUNABLE_CONFIGS,
  type CollisionMode,
  type TunableConfigKey,
} from '#shared';
import { logger } from './logger';

// Runtime config overrides (applied on top of GAME_CONFIG)
const configOverrides: Map<TunableConfigKey, number> = new Map();

let collisionModeOverride: CollisionMode | null = null;

/**
 * Get a config value, checking overrides first
 */
export function getConfig(key: TunableConfigKey): number {
  return configOverrides.get(key) ?? GAME_CONFIG[key];
}

export function isTunableConfigKey(key: string): key is TunableConfigKey {
  return TUNABLE_CONFIGS.some((tunable) => tunable === key);
}

/**
 * Override a tunable value for the rest of the session.
 * Values must be finite; radii, periods and counts must also be positive.
 */
export function setConfigOverride(key: TunableConfigKey, value: number): void {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Config ${key} must be a finite number, got ${value}`);
  }

  switch (key) {
    case 'SHIP_RADIUS':
    case 'LASER_RADIUS':
    case 'ASTEROID_RADIUS':
    case 'ASTEROID_SPAWN_PERIOD':
    case 'ASTEROID_VARIANT_COUNT':
      if (value <= 0) {
        throw new RangeError(`Config ${key} must be > 0, got ${value}`);
      }
      break;
    case 'DEFAULT_LINEAR_DRAG':
    case 'DEFAULT_ANGULAR_DRAG':
      if (value < 0) {
        throw new RangeError(`Config ${key} must be >= 0, got ${value}`);
      }
      break;
    case 'ASTEROID_SPAWN_CHANCE':
      if (value < 0 || value > 100) {
        throw new RangeError(`Config ${key} must be within [0, 100], got ${value}`);
      }
      break;
    default:
      break;
  }

  const oldValue = getConfig(key);
  configOverrides.set(key, value);
  logger.info({ event: 'config_override', key, oldValue, newValue: value }, `Config ${key}: ${oldValue} -> ${value}`);
}

export function getCollisionMode(): CollisionMode {
  return collisionModeOverride ?? GAME_CONFIG.COLLISION_MODE;
}

export function setCollisionMode(mode: CollisionMode): void {
  collisionModeOverride = mode;
  logger.info({ event: 'config_override', key: 'COLLISION_MODE', newValue: mode }, `Collision mode: ${mode}`);
}

/**
 * Drop every override and return to GAME_CONFIG.
 */
export function clearConfigOverrides(): void {
  configOverrides.clear();
  collisionModeOverride = null;
}
