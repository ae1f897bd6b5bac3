// ============================================
// Asteroid Spawn System
// Rolls for a new asteroid every time the spawn timer fires
// ============================================

import { forward, randomInt, randomRange, scale, type World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { getConfig } from '../../config';

export class AsteroidSpawnSystem implements System {
  readonly name = 'AsteroidSpawnSystem';

  update(_world: World, deltaTime: number, ctx: TickContext): void {
    const { state, random, commands } = ctx;
    state.asteroidTimer.tick(deltaTime);

    // One roll per tick, however many periods a long tick crossed
    if (!state.asteroidTimer.justFinished()) return;
    if (randomInt(random, 0, 100) >= state.asteroidChance) return;

    const min = getConfig('ASTEROID_SPAWN_MIN');
    const max = getConfig('ASTEROID_SPAWN_MAX');
    const maxSpeed = getConfig('ASTEROID_MAX_SPEED');

    const position = { x: randomRange(random, min, max), y: randomRange(random, min, max) };
    const heading = randomRange(random, -Math.PI, Math.PI);
    const speed = randomRange(random, -maxSpeed, maxSpeed);
    const angularVelocity = randomRange(random, -Math.PI, Math.PI);

    commands.spawn('asteroid', position, heading, scale(forward(heading), speed), angularVelocity);
  }
}
