// ============================================
// Shared Math Helpers
// Pure vector and random-range functions
// ============================================

import type { Vec2 } from './types';
import type { RandomSource } from './random';

/**
 * Calculate distance between two positions
 */
export function distance(p1: Vec2, p2: Vec2): number {
  const dx = p1.x - p2.x;
  const dy = p1.y - p2.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Unit vector a heading points along.
 * Heading 0 faces +Y; positive headings turn counter-clockwise.
 */
export function forward(heading: number): Vec2 {
  return { x: -Math.sin(heading), y: Math.cos(heading) };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function magnitude(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/**
 * Uniform float in [min, max)
 */
export function randomRange(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min);
}

/**
 * Uniform integer in [min, maxExclusive)
 */
export function randomInt(random: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(random() * (maxExclusive - min));
}
