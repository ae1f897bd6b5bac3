// ============================================
// Headless Runner
// Ticks a Game at a fixed rate and logs what happens
// ============================================

import { GAME_CONFIG, mulberry32 } from '#shared';
import { Game } from './game';
import { logger, perfLogger } from './logger';

const TICK_RATE = GAME_CONFIG.TICK_RATE;
const TICK_INTERVAL = 1000 / TICK_RATE;
const PERF_LOG_INTERVAL_MS = 10000; // Log performance stats every 10 seconds

// Optional deterministic seed (same seed + same input = same session)
const seedEnv = process.env.ROIDFIELD_SEED;
const seed = seedEnv !== undefined && seedEnv !== '' ? Number(seedEnv) : undefined;
if (seed !== undefined && !Number.isInteger(seed)) {
  throw new RangeError(`ROIDFIELD_SEED must be an integer, got "${seedEnv}"`);
}

const game = new Game({ random: seed !== undefined ? mulberry32(seed) : Math.random });

logger.info(
  { event: 'runner_started', tickRate: TICK_RATE, seed: seed ?? null, systems: game.getSystemNames() },
  `Running at ${TICK_RATE} ticks/s${seed !== undefined ? ` (seed ${seed})` : ''}`
);

game.start();

// ============================================
// Terminal Input
// ============================================

// A terminal only reports key presses, so each press is held for one tick
const tappedKeys: string[] = [];

if (process.stdin.isTTY) {
  process.stdin.setRawMode(true);
  process.stdin.setEncoding('utf8');
  process.stdin.on('data', (data: string) => {
    if (data === '\u0003') {
      shutdown('SIGINT');
      return;
    }
    for (const key of data) {
      game.input.handleKeyDown(key);
      tappedKeys.push(key);
    }
  });
}

// ============================================
// Game Loop
// ============================================

let tickTimesMs: number[] = [];
let lastTickTime = performance.now();
let lastPerfLogTime = performance.now();

const loop = setInterval(() => {
  const now = performance.now();
  const actualDelta = now - lastTickTime;
  lastTickTime = now;

  // Fixed timestep regardless of interval jitter
  const deltaTime = TICK_INTERVAL / 1000;
  const tickProcessingStart = performance.now();

  try {
    game.tick(deltaTime);
  } catch (error) {
    logger.error(
      {
        event: 'tick_failed',
        tick: game.tickCount,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      'Tick failed, continuing with next tick'
    );
  }

  for (const key of tappedKeys.splice(0)) {
    game.input.handleKeyUp(key);
  }

  tickTimesMs.push(performance.now() - tickProcessingStart);

  // Event loop blocked (GC, slow tick) if delta exceeds expected by 50%
  if (actualDelta > TICK_INTERVAL * 1.5) {
    perfLogger.info(
      {
        event: 'tick_variance',
        tickNum: game.tickCount,
        actualDeltaMs: actualDelta.toFixed(1),
        expectedMs: TICK_INTERVAL.toFixed(1),
        ratio: (actualDelta / TICK_INTERVAL).toFixed(2),
      },
      `Tick variance: ${actualDelta.toFixed(1)}ms`
    );
  }

  if (now - lastPerfLogTime >= PERF_LOG_INTERVAL_MS && tickTimesMs.length > 0) {
    const sortedTimes = [...tickTimesMs].sort((a, b) => a - b);
    const avgMs = tickTimesMs.reduce((a, b) => a + b, 0) / tickTimesMs.length;
    const p95Ms = sortedTimes[Math.floor(sortedTimes.length * 0.95)] ?? 0;
    const maxMs = sortedTimes[sortedTimes.length - 1] ?? 0;

    perfLogger.info(
      {
        event: 'tick_stats',
        intervalSec: ((now - lastPerfLogTime) / 1000).toFixed(1),
        tickCount: tickTimesMs.length,
        avgMs: avgMs.toFixed(2),
        p95Ms: p95Ms.toFixed(2),
        maxMs: maxMs.toFixed(2),
        budgetUsedPct: ((avgMs / TICK_INTERVAL) * 100).toFixed(1),
        entities: game.world.entityCount,
        score: game.score,
      },
      `Tick stats: avg=${avgMs.toFixed(2)}ms p95=${p95Ms.toFixed(2)}ms | entities=${game.world.entityCount} score=${game.score}`
    );

    tickTimesMs = [];
    lastPerfLogTime = now;
  }
}, TICK_INTERVAL);

// ============================================
// Graceful Shutdown
// ============================================

function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);

  clearInterval(loop);
  game.stop();
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(false);
    process.stdin.pause();
  }

  // Let pino transports drain before exiting
  logger.flush();
  setTimeout(() => process.exit(0), 200);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
