import pino from 'pino';
import type { EntityId, Vec2 } from '#shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'sim.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',         // Rotate at 10MB
      limit: { count: 5 }, // Keep last 5 rotated files
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component }, // Add component field to all log entries
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (spawns, kills, resets)
export const logger = createLogger('sim.log', 'sim');

// Tick timing and entity counts
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

export function logGameStarted(shipEntity: EntityId) {
  logger.info({ shipEntity, event: 'game_started' }, 'Game started');
}

export function logGameStopped(stats: { score: number; elapsedSeconds: number; ticks: number }) {
  logger.info(
    { ...stats, event: 'game_stopped' },
    `Game stopped after ${stats.elapsedSeconds.toFixed(1)}s with score ${stats.score}`
  );
}

export function logAsteroidSpawned(entity: EntityId, position: Vec2, speed: number) {
  logger.debug(
    { entity, position, speed, event: 'asteroid_spawned' },
    `Asteroid spawned at (${position.x.toFixed(0)}, ${position.y.toFixed(0)})`
  );
}

export function logLaserFired(entity: EntityId, heading: number) {
  logger.debug({ entity, heading, event: 'laser_fired' }, 'Shooting');
}

export function logAsteroidDestroyed(asteroid: EntityId, projectile: EntityId) {
  logger.debug({ asteroid, projectile, event: 'asteroid_destroyed' }, 'Asteroid destroyed');
}

export function logScoreChanged(score: number, delta: number) {
  logger.info({ score, delta, event: 'score_changed' }, `Score: ${score}`);
}

export function logSceneReset(elapsedSeconds: number, despawned: number) {
  logger.info(
    { elapsedSeconds, despawned, event: 'scene_reset' },
    `Ship destroyed after ${elapsedSeconds.toFixed(1)}s, scene reset`
  );
}
