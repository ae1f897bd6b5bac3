// ============================================
// CollisionRulesSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Components, type World } from '#shared';
import { CollisionDetectionSystem } from '../CollisionDetectionSystem';
import { CollisionRulesSystem } from '../CollisionRulesSystem';
import {
  createTestWorld,
  createTestShip,
  createTestAsteroid,
  createTestLaser,
  createTestContext,
  recordEvents,
} from './testUtils';
import { getShipEntity } from '../../factories';
import { EventBus } from '../../../events';

describe('CollisionRulesSystem', () => {
  let world: World;
  let detection: CollisionDetectionSystem;
  let system: CollisionRulesSystem;

  beforeEach(() => {
    world = createTestWorld();
    detection = new CollisionDetectionSystem();
    system = new CollisionRulesSystem();
  });

  it('destroys an asteroid hit by a laser and scores it', () => {
    const asteroid = createTestAsteroid(world, { position: { x: 1000, y: 1000 } });
    const laser = createTestLaser(world, { position: { x: 1000, y: 1000 } });
    const bus = new EventBus();
    const events = recordEvents(bus);
    const ctx = createTestContext(world, { bus });

    detection.update(world, 0.016, ctx);
    expect(ctx.collisions).toEqual([{ a: asteroid, b: laser }]);

    system.update(world, 0.016, ctx);
    expect(ctx.collisions).toEqual([]);
    expect(events).toEqual([{ type: 'asteroidDestroyed', event: { asteroid, projectile: laser } }]);

    // Nothing changes until the flush
    expect(world.hasEntity(asteroid)).toBe(true);
    ctx.commands.flush(ctx.state, ctx.random);

    expect(world.hasEntity(asteroid)).toBe(false);
    expect(world.hasEntity(laser)).toBe(false);
    expect(ctx.state.score).toBe(10);
  });

  it('resets the scene when the ship hits an asteroid', () => {
    const ship = createTestShip(world);
    const asteroid = createTestAsteroid(world, { position: { x: 10, y: 0 } });
    const laser = createTestLaser(world, { position: { x: 500, y: 500 } });
    const bus = new EventBus();
    const events = recordEvents(bus);
    const ctx = createTestContext(world, { bus });

    detection.update(world, 0.016, ctx);
    system.update(world, 0.016, ctx);
    ctx.commands.flush(ctx.state, ctx.random);

    expect(events).toEqual([{ type: 'sceneReset', event: { despawned: [ship, asteroid, laser] } }]);
    expect(world.getAllEntities()).toEqual([4, 5]);
    expect(world.hasComponent(4, Components.Camera)).toBe(true);
    expect(getShipEntity(world)).toBe(5);
    expect(ctx.state.score).toBe(0);
  });

  it('resets only once when several asteroids hit the ship', () => {
    createTestShip(world);
    createTestAsteroid(world, { position: { x: 10, y: 0 } });
    createTestAsteroid(world, { position: { x: 0, y: 10 } });
    const ctx = createTestContext(world);

    detection.update(world, 0.016, ctx);
    system.update(world, 0.016, ctx);
    ctx.commands.flush(ctx.state, ctx.random);

    expect(world.query(Components.Ship).length).toBe(1);
    expect(world.query(Components.Camera).length).toBe(1);
    expect(world.entityCount).toBe(2);
  });

  it('also removes spawns still waiting in the buffer', () => {
    const ship = createTestShip(world);
    const asteroid = createTestAsteroid(world, { position: { x: 10, y: 0 } });
    const ctx = createTestContext(world);
    const pendingLaser = ctx.commands.spawn('projectile', { x: 0, y: 0 }, 0, { x: 0, y: 400 }, 0);
    ctx.collisions.push({ a: ship, b: asteroid });

    system.update(world, 0.016, ctx);
    ctx.commands.flush(ctx.state, ctx.random);

    expect(world.hasEntity(pendingLaser)).toBe(false);
    expect(world.getAllEntities()).toEqual([4, 5]);
  });

  it('ignores pairs without a rule', () => {
    const ship = createTestShip(world);
    const laser = createTestLaser(world);
    const a = createTestAsteroid(world, { position: { x: 300, y: 0 } });
    const b = createTestAsteroid(world, { position: { x: 310, y: 0 } });
    const ctx = createTestContext(world);
    ctx.collisions.push({ a: ship, b: laser }, { a, b });

    system.update(world, 0.016, ctx);

    expect(ctx.commands.pending).toBe(0);
    expect(ctx.commands.pendingScore).toBe(0);
  });
});
