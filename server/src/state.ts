// ============================================
// Game State
// Score and timers owned by a single Game instance
// ============================================

import { getConfig } from './config';
import { RepeatingTimer } from './timer';

/**
 * Per-session game state. Created when a Game is constructed and
 * passed to systems through the tick context; never global.
 */
export interface GameState {
  score: number;
  elapsedSeconds: number; // simulated time since start
  asteroidTimer: RepeatingTimer;
  asteroidChance: number; // percent per timer firing, [0, 100]
}

export function createGameState(): GameState {
  return {
    score: 0,
    elapsedSeconds: 0,
    asteroidTimer: new RepeatingTimer(getConfig('ASTEROID_SPAWN_PERIOD')),
    asteroidChance: getConfig('ASTEROID_SPAWN_CHANCE'),
  };
}

export function setAsteroidChance(state: GameState, chance: number): void {
  if (!Number.isInteger(chance) || chance < 0 || chance > 100) {
    throw new RangeError(`Asteroid spawn chance must be an integer in [0, 100], got ${chance}`);
  }
  state.asteroidChance = chance;
}
