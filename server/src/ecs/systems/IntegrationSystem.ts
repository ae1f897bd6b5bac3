// ============================================
// Integration System
// Drag, then position and rotation, for every moving body
// ============================================

import { integrate, type World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { collectBodies } from '../factories';

export class IntegrationSystem implements System {
  readonly name = 'IntegrationSystem';

  update(world: World, deltaTime: number, _ctx: TickContext): void {
    integrate(collectBodies(world), deltaTime);
  }
}
