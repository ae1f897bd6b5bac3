// ============================================
// ECS System Runner
// Manages and executes all game systems in priority order
// ============================================

import type { World } from '#shared';
import type { System } from './types';
import type { TickContext } from './TickContext';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all game systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Systems with equal priority run in registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    // Keep sorted by priority (Array.prototype.sort is stable)
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when tick is slow.
   * A throwing system aborts the rest of the tick.
   */
  update(world: World, deltaTime: number, ctx: TickContext): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, deltaTime, ctx);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        throw error;
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;

    // Log breakdown when tick takes > 10ms
    if (totalMs > 10) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted
        .filter(t => t.ms > 0.5)
        .map(t => `${t.name}:${t.ms.toFixed(1)}`)
        .join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.filter(t => t.ms > 0.5).map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
