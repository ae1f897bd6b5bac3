// ============================================
// Command Buffer
// Spawns, despawns and score deltas recorded during a tick,
// applied together once every system has run
// ============================================

import type { EntityId, RandomSource, SpawnKind, Vec2, World } from '#shared';
import type { GameState } from '../state';
import type { ScoreAccumulator, SpawnService } from '../rules';
import { spawnEntity, type SpawnRequest } from './factories';

type Command =
  | { type: 'spawn'; id: EntityId; request: SpawnRequest }
  | { type: 'despawn'; entity: EntityId };

export interface FlushResult {
  spawned: Array<{ id: EntityId; request: SpawnRequest }>;
  despawned: EntityId[];
  scoreDelta: number;
}

/**
 * CommandBuffer - deferred world mutations for one tick.
 *
 * spawn() hands back a reserved ID straight away so rules can refer to
 * the new entity; the entity itself only exists after flush().
 */
export class CommandBuffer implements SpawnService, ScoreAccumulator {
  private commands: Command[] = [];
  private scoreDelta = 0;

  constructor(private readonly world: World) {}

  spawn(kind: SpawnKind, position: Vec2, heading: number, velocity: Vec2, angularVelocity: number): EntityId {
    const id = this.world.reserveEntityId();
    this.commands.push({
      type: 'spawn',
      id,
      request: { kind, position: { ...position }, heading, velocity: { ...velocity }, angularVelocity },
    });
    return id;
  }

  despawn(entity: EntityId): void {
    this.commands.push({ type: 'despawn', entity });
  }

  add(points: number): void {
    this.scoreDelta += points;
  }

  get pending(): number {
    return this.commands.length;
  }

  get pendingScore(): number {
    return this.scoreDelta;
  }

  /**
   * IDs of entities spawned through this buffer but not created yet.
   */
  pendingSpawnIds(): EntityId[] {
    const ids: EntityId[] = [];
    for (const command of this.commands) {
      if (command.type === 'spawn') ids.push(command.id);
    }
    return ids;
  }

  /**
   * Apply every recorded command in order, then the score delta.
   * Despawning an entity that no longer exists is a no-op.
   */
  flush(state: GameState, random: RandomSource): FlushResult {
    const result: FlushResult = { spawned: [], despawned: [], scoreDelta: this.scoreDelta };

    for (const command of this.commands) {
      if (command.type === 'spawn') {
        spawnEntity(this.world, command.request, random, command.id);
        result.spawned.push({ id: command.id, request: command.request });
      } else if (this.world.hasEntity(command.entity)) {
        this.world.destroyEntity(command.entity);
        result.despawned.push(command.entity);
      }
    }

    state.score += this.scoreDelta;
    this.clear();
    return result;
  }

  /**
   * Drop everything recorded (tick aborted).
   * Reserved IDs are never handed out again.
   */
  clear(): void {
    this.commands = [];
    this.scoreDelta = 0;
  }
}
