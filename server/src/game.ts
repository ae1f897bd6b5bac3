// ============================================
// Game
// Owns the world and runs one simulation tick at a time
// ============================================

import { assertValidDelta, magnitude, type EntityId, type RandomSource } from '#shared';
import {
  createWorld,
  createWorldSpawner,
  getShipEntity,
  captureKinematics,
  CommandBuffer,
  SystemRunner,
  SystemPriority,
  ShipControlSystem,
  AsteroidSpawnSystem,
  IntegrationSystem,
  CollisionDetectionSystem,
  CollisionRulesSystem,
  type FlushResult,
  type TickContext,
} from './ecs';
import { EventBus } from './events';
import { InputState } from './input';
import { setupScene } from './rules';
import { createGameState, setAsteroidChance, type GameState } from './state';
import {
  logAsteroidSpawned,
  logGameStarted,
  logGameStopped,
  logLaserFired,
  logScoreChanged,
} from './logger';

export interface GameOptions {
  random?: RandomSource;
  input?: InputState;
  bus?: EventBus;
}

/**
 * Game - a single play session.
 *
 * tick(dt):
 * 1. run systems in priority order against a fresh TickContext
 * 2. flush the command buffer (spawns, despawns, score)
 * 3. emit spawn/score events, advance the clock
 * 4. end the input frame (also when a system threw)
 *
 * A throwing system aborts the tick: transforms, velocities and the
 * spawn timer are rolled back, nothing is flushed and the error
 * propagates to the caller.
 */
export class Game {
  readonly world = createWorld();
  readonly bus: EventBus;
  readonly input: InputState;
  readonly random: RandomSource;
  private state: GameState = createGameState();
  private readonly runner = new SystemRunner();
  private running = false;
  private ticks = 0;

  constructor(options: GameOptions = {}) {
    this.random = options.random ?? Math.random;
    this.input = options.input ?? new InputState();
    this.bus = options.bus ?? new EventBus();

    this.runner.register(new ShipControlSystem(), SystemPriority.SHIP_CONTROL);
    this.runner.register(new AsteroidSpawnSystem(), SystemPriority.ASTEROID_SPAWN);
    this.runner.register(new IntegrationSystem(), SystemPriority.INTEGRATION);
    this.runner.register(new CollisionDetectionSystem(), SystemPriority.COLLISION_DETECTION);
    this.runner.register(new CollisionRulesSystem(), SystemPriority.COLLISION_RULES);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get score(): number {
    return this.state.score;
  }

  get elapsedSeconds(): number {
    return this.state.elapsedSeconds;
  }

  get tickCount(): number {
    return this.ticks;
  }

  get ship(): EntityId | undefined {
    return getShipEntity(this.world);
  }

  getSystemNames(): string[] {
    return this.runner.getSystemNames();
  }

  setAsteroidChance(chance: number): void {
    setAsteroidChance(this.state, chance);
  }

  /**
   * Spawn the camera and ship. Calling start() on a running game is a no-op.
   */
  start(): void {
    if (this.running) return;

    const ship = setupScene(createWorldSpawner(this.world, this.random));
    this.running = true;
    logGameStarted(ship);
  }

  tick(deltaTime: number): void {
    assertValidDelta(deltaTime);
    if (!this.running) {
      throw new Error('Game.tick() called before start()');
    }

    const commands = new CommandBuffer(this.world);
    const ctx: TickContext = {
      state: this.state,
      input: this.input,
      commands,
      collisions: [],
      random: this.random,
      bus: this.bus,
    };

    const restoreKinematics = captureKinematics(this.world);
    const timerSnapshot = this.state.asteroidTimer.snapshot();

    try {
      try {
        this.runner.update(this.world, deltaTime, ctx);
      } catch (error) {
        // Undo what the systems already did in place
        restoreKinematics();
        this.state.asteroidTimer.restore(timerSnapshot);
        throw error;
      }

      const result = commands.flush(this.state, this.random);

      this.state.elapsedSeconds += deltaTime;
      this.ticks++;
      this.emitFlushEvents(result);
    } finally {
      this.input.endFrame();
    }
  }

  /**
   * Log the session summary and tear everything down.
   * A stopped game can be started again from scratch.
   */
  stop(): void {
    if (!this.running) return;

    logGameStopped({ score: this.state.score, elapsedSeconds: this.state.elapsedSeconds, ticks: this.ticks });
    this.world.clear();
    this.input.reset();
    this.state = createGameState();
    this.ticks = 0;
    this.running = false;
  }

  private emitFlushEvents(result: FlushResult): void {
    for (const { id, request } of result.spawned) {
      const { position, heading, velocity } = request;
      if (request.kind === 'asteroid') {
        logAsteroidSpawned(id, position, magnitude(velocity));
        this.bus.emit('asteroidSpawned', { entity: id, position, velocity });
      } else if (request.kind === 'projectile') {
        logLaserFired(id, heading);
        this.bus.emit('laserFired', { entity: id, position, heading, velocity });
      }
    }

    if (result.scoreDelta !== 0) {
      logScoreChanged(this.state.score, result.scoreDelta);
      this.bus.emit('scoreChanged', { score: this.state.score, delta: result.scoreDelta });
    }
  }
}
