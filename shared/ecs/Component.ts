// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - a typed Map wrapper for storing component data.
 * Each component type gets its own store: Map<EntityId, ComponentData>
 *
 * Generic parameter T is the component data shape (e.g., TransformComponent).
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  /**
   * Set component data for an entity.
   * Overwrites existing data if present.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  /**
   * Get component data for an entity.
   * Returns undefined if entity doesn't have this component.
   */
  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
