// ============================================
// IntegrationSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import type { World } from '#shared';
import { IntegrationSystem } from '../IntegrationSystem';
import { createTestWorld, createTestShip, createTestAsteroid, createTestContext } from './testUtils';
import { createCamera, requireTransform, requireVelocity } from '../../factories';

describe('IntegrationSystem', () => {
  let world: World;
  let system: IntegrationSystem;

  beforeEach(() => {
    world = createTestWorld();
    system = new IntegrationSystem();
  });

  it('slows the ship with its default drag', () => {
    const ship = createTestShip(world, { velocity: { x: 10, y: 0 } });

    system.update(world, 0.5, createTestContext(world));

    expect(requireVelocity(world, ship).linear.x).toBe(7.5);
    expect(requireTransform(world, ship).x).toBe(3.75);
  });

  it('lets asteroids coast without drag', () => {
    const asteroid = createTestAsteroid(world, { position: { x: 1, y: 1 }, velocity: { x: 0, y: -4 } });

    system.update(world, 0.5, createTestContext(world));

    expect(requireVelocity(world, asteroid).linear).toEqual({ x: 0, y: -4 });
    expect(requireTransform(world, asteroid)).toEqual({ x: 1, y: -1, rotation: 0 });
  });

  it('skips entities without velocity', () => {
    const camera = createCamera(world, { position: { x: 7, y: 8 } });

    system.update(world, 0.5, createTestContext(world));

    expect(requireTransform(world, camera)).toEqual({ x: 7, y: 8, rotation: 0 });
  });

  it('rejects a negative delta', () => {
    createTestShip(world);

    expect(() => system.update(world, -1, createTestContext(world))).toThrow(RangeError);
  });
});
