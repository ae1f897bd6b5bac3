// ============================================
// Ship Control System
// Input -> thrust, turning and laser fire
// ============================================

import { Components, add, forward, scale, type World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { getConfig } from '../../config';
import { getShipEntity, requireTransform, requireVelocity } from '../factories';

/**
 * ShipControlSystem - Applies held/pressed actions to the ship
 *
 * - forward held: accelerate along the ship's heading
 * - turnRight/turnLeft held: angular acceleration (both may cancel out)
 * - fire pressed: one laser per press, inheriting the ship's velocity
 *
 * Skipped while no ship exists (a reset is waiting for its flush).
 */
export class ShipControlSystem implements System {
  readonly name = 'ShipControlSystem';

  update(world: World, deltaTime: number, ctx: TickContext): void {
    const ship = getShipEntity(world);
    if (ship === undefined) return;

    const control = world.getComponent(ship, Components.Ship);
    if (!control) return;

    const transform = requireTransform(world, ship);
    const velocity = requireVelocity(world, ship);
    const { input } = ctx;

    if (input.isHeld('forward')) {
      const thrust = scale(forward(transform.rotation), control.linearAccel * deltaTime);
      velocity.linear = add(velocity.linear, thrust);
    }
    if (input.isHeld('turnRight')) {
      velocity.angular -= control.angularAccel * deltaTime;
    }
    if (input.isHeld('turnLeft')) {
      velocity.angular += control.angularAccel * deltaTime;
    }

    if (input.wasJustPressed('fire')) {
      const heading = transform.rotation;
      const muzzle = scale(forward(heading), getConfig('LASER_SPEED'));
      ctx.commands.spawn(
        'projectile',
        { x: transform.x, y: transform.y },
        heading,
        add(muzzle, velocity.linear),
        0
      );
    }
  }
}
