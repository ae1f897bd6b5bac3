// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { ComponentMap } from './components';
import type { EntityId, ComponentType } from './types';

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (reserve, create, destroy)
 * - Component storage (add, get, remove)
 * - Queries (find entities with specific components)
 * - Tags (lightweight entity classification)
 *
 * Iteration order everywhere is entity creation order.
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores = new Map<ComponentType, ComponentStore<unknown>>();
  private entityTags = new Map<EntityId, Set<string>>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  /**
   * Hand out an ID without creating the entity yet.
   * Deferred spawns use this so callers get a stable handle immediately.
   */
  reserveEntityId(): EntityId {
    return this.nextEntityId++;
  }

  /**
   * Create a new entity, or materialize a previously reserved ID.
   */
  createEntity(reservedId?: EntityId): EntityId {
    if (reservedId === undefined) {
      const id = this.nextEntityId++;
      this.entities.add(id);
      return id;
    }

    if (reservedId >= this.nextEntityId || this.entities.has(reservedId)) {
      throw new Error(`Entity ${reservedId} was not reserved or already exists`);
    }
    this.entities.add(reservedId);
    return reservedId;
  }

  /**
   * Destroy an entity and all its components.
   * Destroying an unknown entity is a no-op.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    this.entities.delete(id);

    for (const store of this.stores.values()) {
      store.delete(id);
    }

    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Register a component store.
   * Must be called before using a component type.
   */
  registerStore<K extends ComponentType>(type: K, store: ComponentStore<ComponentMap[K]>): void {
    this.stores.set(type, store);
  }

  getStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> | undefined {
    // registerStore() pairs each type with its ComponentMap store
    return this.stores.get(type) as ComponentStore<ComponentMap[K]> | undefined;
  }

  /**
   * Add a component to an entity.
   * Throws if component type not registered.
   */
  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    const store = this.getStore(type);
    if (!store) {
      throw new Error(`Component type not registered: ${type}. Call world.registerStore() first.`);
    }
    store.set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    return this.getStore(type)?.get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.getStore(type)?.has(entity) ?? false;
  }

  removeComponent(entity: EntityId, type: ComponentType): void {
    this.getStore(type)?.delete(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Query: get all entities with ALL specified components.
   *
   * Example: world.query(Components.Transform, Components.Velocity)
   */
  query(...types: ComponentType[]): EntityId[] {
    const result: EntityId[] = [];

    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        result.push(entity);
      }
    }

    return result;
  }

  /**
   * Query with callback - avoids array allocation for hot paths.
   */
  queryEach(types: ComponentType[], callback: (entity: EntityId) => void): void {
    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        callback(entity);
      }
    }
  }

  // ============================================
  // Tags (lightweight entity classification)
  // ============================================

  addTag(entity: EntityId, tag: string): void {
    const tags = this.entityTags.get(entity);
    if (tags) {
      tags.add(tag);
    } else {
      this.entityTags.set(entity, new Set([tag]));
    }
  }

  removeTag(entity: EntityId, tag: string): void {
    this.entityTags.get(entity)?.delete(tag);
  }

  hasTag(entity: EntityId, tag: string): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  /**
   * Get all entities with a specific tag.
   */
  getEntitiesWithTag(tag: string): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Clear all entities and components.
   * Keeps component stores registered.
   */
  clear(): void {
    this.entities.clear();
    this.entityTags.clear();
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.nextEntityId = 1;
  }

  /**
   * Debug: get stats about the world.
   */
  getStats(): {
    entities: number;
    componentTypes: number;
    stores: Record<string, number>;
  } {
    const stores: Record<string, number> = {};
    for (const [type, store] of this.stores) {
      stores[type] = store.size;
    }
    return {
      entities: this.entities.size,
      componentTypes: this.stores.size,
      stores,
    };
  }
}
