// ============================================
// Game Integration Tests
// Full ticks through every system and the command buffer
// ============================================

import { describe, it, expect, afterEach, vi } from 'vitest';
import { Components, mulberry32 } from '#shared';
import { Game } from '../game';
import { createAsteroid, createLaserShot, collectBodies, requireTransform, requireVelocity } from '../ecs/factories';
import { IntegrationSystem } from '../ecs/systems/IntegrationSystem';
import { CollisionRulesSystem } from '../ecs/systems/CollisionRulesSystem';
import { recordEvents } from '../ecs/systems/__tests__/testUtils';

// Rolls 99 on every spawn roll, so the timer never spawns asteroids
const noSpawns = () => 0.99;

describe('Game', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('lifecycle', () => {
    it('spawns the camera and then the ship on start', () => {
      const game = new Game({ random: noSpawns });

      game.start();

      expect(game.isRunning).toBe(true);
      expect(game.world.hasComponent(1, Components.Camera)).toBe(true);
      expect(game.ship).toBe(2);
      expect(game.world.entityCount).toBe(2);
    });

    it('refuses to tick before start', () => {
      const game = new Game({ random: noSpawns });

      expect(() => game.tick(0.016)).toThrow('Game.tick() called before start()');
    });

    it('rejects a negative delta', () => {
      const game = new Game({ random: noSpawns });
      game.start();

      expect(() => game.tick(-0.016)).toThrow(RangeError);
      expect(game.tickCount).toBe(0);
    });

    it('tears down on stop and can start again', () => {
      const game = new Game({ random: noSpawns });
      game.start();
      game.tick(0.5);

      game.stop();

      expect(game.isRunning).toBe(false);
      expect(game.world.entityCount).toBe(0);
      expect(game.tickCount).toBe(0);
      expect(game.elapsedSeconds).toBe(0);

      game.start();
      expect(game.ship).toBe(2);
    });

    it('validates the spawn chance', () => {
      const game = new Game({ random: noSpawns });

      expect(() => game.setAsteroidChance(101)).toThrow(RangeError);
    });
  });

  describe('ticking', () => {
    it('thrusts and integrates the ship in one tick', () => {
      const game = new Game({ random: noSpawns });
      game.start();
      game.input.handleKeyDown('w');

      game.tick(0.5);

      // v = 25 after thrust, 18.75 after drag, moved 18.75 * 0.5
      const ship = game.ship;
      expect(ship).toBe(2);
      if (ship === undefined) return;
      const transform = requireTransform(game.world, ship);
      expect(transform.x).toBeCloseTo(0, 10);
      expect(transform.y).toBe(9.375);
      expect(game.elapsedSeconds).toBe(0.5);
      expect(game.tickCount).toBe(1);
    });

    it('fires one laser per press', () => {
      const game = new Game({ random: noSpawns });
      const events = recordEvents(game.bus);
      game.start();

      game.input.handleKeyDown(' ');
      game.tick(0.01);
      game.tick(0.01);

      expect(events).toEqual([
        {
          type: 'laserFired',
          event: { entity: 3, position: { x: 0, y: 0 }, heading: 0, velocity: { x: 0, y: 400 } },
        },
      ]);

      game.input.handleKeyUp(' ');
      game.input.handleKeyDown(' ');
      game.tick(0.01);

      expect(events.filter((e) => e.type === 'laserFired').length).toBe(2);
    });

    it('scores a laser hit and reports the new score', () => {
      const game = new Game({ random: noSpawns });
      const events = recordEvents(game.bus);
      game.start();
      const asteroid = createAsteroid(game.world, { position: { x: 1000, y: 1000 } });
      const laser = createLaserShot(game.world, { position: { x: 1000, y: 1000 } });

      game.tick(0);

      expect(game.score).toBe(10);
      expect(game.world.hasEntity(asteroid)).toBe(false);
      expect(game.world.hasEntity(laser)).toBe(false);
      expect(events).toEqual([
        { type: 'asteroidDestroyed', event: { asteroid, projectile: laser } },
        { type: 'scoreChanged', event: { score: 10, delta: 10 } },
      ]);
    });

    it('resets the scene when an asteroid hits the ship', () => {
      const game = new Game({ random: noSpawns });
      const events = recordEvents(game.bus);
      game.start();
      createAsteroid(game.world, { position: { x: 10, y: 0 } });

      game.tick(0);

      expect(events).toEqual([{ type: 'sceneReset', event: { despawned: [1, 2, 3] } }]);
      expect(game.world.getAllEntities()).toEqual([4, 5]);
      expect(game.ship).toBe(5);
      expect(game.score).toBe(0);
    });

    it('spawns asteroids from the timer', () => {
      const game = new Game({ random: () => 0 });
      const events = recordEvents(game.bus);
      game.start();

      game.tick(0.25);
      expect(events).toEqual([]);

      game.tick(0.25);
      expect(events.length).toBe(1);
      const [spawned] = events;
      expect(spawned.type).toBe('asteroidSpawned');
      expect(spawned.event).toMatchObject({ entity: 3, position: { x: -550, y: -550 } });
      expect(game.world.getComponent(3, Components.Asteroid)).toEqual({ variant: 0 });
    });

    it('aborts the tick without flushing when a system throws', () => {
      const game = new Game({ random: noSpawns });
      game.start();
      vi.spyOn(IntegrationSystem.prototype, 'update').mockImplementation(() => {
        throw new Error('integration failed');
      });
      game.input.handleKeyDown(' ');

      expect(() => game.tick(0.016)).toThrow('integration failed');

      expect(game.world.entityCount).toBe(2);
      expect(game.tickCount).toBe(0);
      expect(game.input.wasJustPressed('fire')).toBe(false);
    });

    it('rolls back movement and the spawn timer when a late system throws', () => {
      const game = new Game({ random: noSpawns });
      game.start();
      const ship = 2;
      requireVelocity(game.world, ship).linear = { x: 10, y: 0 };
      const asteroid = createAsteroid(game.world, { position: { x: 500, y: 500 }, velocity: { x: 0, y: -20 } });
      vi.spyOn(CollisionRulesSystem.prototype, 'update').mockImplementation(() => {
        throw new Error('rules failed');
      });
      game.input.handleKeyDown('w');

      expect(() => game.tick(0.4)).toThrow('rules failed');

      expect(requireTransform(game.world, ship)).toEqual({ x: 0, y: 0, rotation: 0 });
      expect(requireVelocity(game.world, ship).linear).toEqual({ x: 10, y: 0 });
      expect(requireTransform(game.world, asteroid)).toEqual({ x: 500, y: 500, rotation: 0 });
      expect(game.elapsedSeconds).toBe(0);

      // The timer is back at 0, so 0.4 more seconds must not fire it
      vi.restoreAllMocks();
      game.setAsteroidChance(100);
      game.tick(0.4);
      expect(game.world.query(Components.Asteroid)).toEqual([asteroid]);
    });

    it('replays identically from the same seed', () => {
      const run = () => {
        const game = new Game({ random: mulberry32(99) });
        game.setAsteroidChance(100);
        game.start();
        game.input.handleKeyDown('a');
        for (let i = 0; i < 200; i++) {
          game.tick(1 / 60);
        }
        return {
          score: game.score,
          bodies: collectBodies(game.world).map(({ entity, transform }) => ({ entity, ...transform })),
        };
      };

      expect(run()).toEqual(run());
    });
  });
});
