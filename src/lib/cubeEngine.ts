import type { Group, Object3D } from 'three';
import type {
  AttemptResult,
  CameraSelection,
  EnginePhase,
  FaceDefinition,
  KeyBinding,
  MoveRecord,
  MoveSource,
} from '../types/cube.ts';
import { AnimationDriver } from './animationDriver.ts';
import { CameraPresetSelector } from './cameraPresets.ts';
import { CollisionAggregator } from './collisionAggregator.ts';
import { FACE_DEFINITIONS, ROTATION_DURATION_MS } from './constants.ts';
import { buildCubeScene } from './cubeModel.ts';
import { createFaceRegistry, type FaceRegistry } from './faceRegistry.ts';
import { shuffleAlphabet } from './keyBindings.ts';
import { MoveDispatcher, type RefreshStrategy } from './moveDispatcher.ts';
import type { RandomSource } from './random.ts';
import { RotationExecutor } from './rotationExecutor.ts';
import { ShuffleScheduler } from './shuffleScheduler.ts';
import { BoundsCollisionSystem, type CollisionSystem } from './spatialIndex.ts';

export interface EngineListener {
  onKey?: (key: string, binding: KeyBinding, source: MoveSource) => void;
  onPhaseChange?: (phase: EnginePhase) => void;
  onMove?: (move: MoveRecord) => void;
  onCamera?: (selection: CameraSelection) => void;
  onShuffleStart?: (keys: readonly string[]) => void;
  onShuffleFinish?: (keys: readonly string[]) => void;
}

export interface EngineOptions {
  definitions?: FaceDefinition[];
  random?: RandomSource;
  refresh?: RefreshStrategy;
  /** Swap the built-in bounds index for another collision subsystem */
  collision?: (root: Object3D) => CollisionSystem;
  rotationMs?: number;
  debug?: boolean;
  listener?: EngineListener;
}

/**
 * Wires the cube scene, face registry, collision subsystem and the three
 * state owners (dispatcher, executor, shuffle scheduler) together.
 */
export class CubeEngine {
  readonly root: Group;
  readonly cubies: readonly Object3D[];
  readonly registry: FaceRegistry;
  readonly driver = new AnimationDriver();
  readonly aggregator: CollisionAggregator;
  readonly camera = new CameraPresetSelector();

  private readonly executor: RotationExecutor;
  private readonly dispatcher: MoveDispatcher;
  private readonly shuffler: ShuffleScheduler;
  private readonly listener: EngineListener;

  constructor(options: EngineOptions = {}) {
    const definitions = options.definitions ?? FACE_DEFINITIONS;
    const debug = options.debug ?? false;
    this.listener = options.listener ?? {};

    const scene = buildCubeScene(definitions);
    this.root = scene.root;
    this.cubies = scene.cubies;
    this.registry = createFaceRegistry(definitions, scene.nodes);
    this.aggregator = new CollisionAggregator(this.registry);

    const collision = options.collision
      ? options.collision(this.root)
      : new BoundsCollisionSystem(this.root, undefined, debug);

    this.executor = new RotationExecutor({
      root: this.root,
      driver: this.driver,
      durationMs: options.rotationMs ?? ROTATION_DURATION_MS,
    });

    this.dispatcher = new MoveDispatcher({
      registry: this.registry,
      cubies: this.cubies,
      aggregator: this.aggregator,
      collision,
      executor: this.executor,
      refresh: options.refresh,
      debug,
      hooks: {
        isShuffling: () => this.shuffler.isActive,
        requestShuffle: () => {
          this.shuffle();
        },
        selectCamera: (preset) => {
          const selection = this.camera.select(preset);
          this.emit(() => this.listener.onCamera?.(selection));
        },
        onKey: this.listener.onKey,
        onPhaseChange: this.listener.onPhaseChange,
        onMove: this.listener.onMove,
      },
    });

    this.shuffler = new ShuffleScheduler({
      driver: this.driver,
      alphabet: shuffleAlphabet(this.registry),
      random: options.random,
      target: {
        play: (key) => this.dispatcher.attempt(key, 'shuffle'),
        setAnimated: (animated) => this.executor.setAnimated(animated),
      },
      onStart: (keys) => this.emit(() => this.listener.onShuffleStart?.(keys)),
      onFinish: (keys) => this.emit(() => this.listener.onShuffleFinish?.(keys)),
    });
  }

  get phase(): EnginePhase {
    return this.dispatcher.phase;
  }

  get isShuffling(): boolean {
    return this.shuffler.isActive;
  }

  get animated(): boolean {
    return this.executor.animated;
  }

  get shufflePlan(): readonly string[] {
    return this.shuffler.current;
  }

  /** Keyboard entry point */
  attempt(key: string): AttemptResult {
    return this.dispatcher.attempt(key);
  }

  /** Start a shuffle; false while a move or another shuffle is in progress */
  shuffle(): boolean {
    if (this.dispatcher.phase !== 'idle') return false;
    return this.shuffler.start();
  }

  /** Advance animations and timed steps */
  tick(deltaMs: number): void {
    this.driver.tick(deltaMs);
  }

  private emit(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error('Engine listener failed:', err);
    }
  }
}
