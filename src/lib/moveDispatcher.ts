import type { Object3D } from 'three';
import type {
  AttemptResult,
  CameraPresetIndex,
  Direction,
  EnginePhase,
  Face,
  FaceId,
  KeyBinding,
  MoveRecord,
  MoveSource,
} from '../types/cube.ts';
import { PERTURB_OFFSET } from './constants.ts';
import type { CollisionAggregator } from './collisionAggregator.ts';
import type { FaceRegistry } from './faceRegistry.ts';
import { createKeyResolver, type KeyResolver } from './keyBindings.ts';
import { turnSense, type RotationExecutor } from './rotationExecutor.ts';
import type { CollisionSystem } from './spatialIndex.ts';

/**
 * How membership is brought up to date before a traversal.
 *  - invalidate: the index is invalidated after every rotation; traverse once.
 *  - perturb: move every cubie away and back, traversing at each step, so an
 *    index that only notices moved objects re-evaluates all of them.
 */
export type RefreshStrategy = 'invalidate' | 'perturb';

export interface DispatcherHooks {
  isShuffling: () => boolean;
  requestShuffle: () => void;
  selectCamera: (preset: CameraPresetIndex) => void;
  onKey?: (key: string, binding: KeyBinding, source: MoveSource) => void;
  onPhaseChange?: (phase: EnginePhase) => void;
  onMove?: (move: MoveRecord) => void;
}

export interface MoveDispatcherOptions {
  registry: FaceRegistry;
  cubies: readonly Object3D[];
  aggregator: CollisionAggregator;
  collision: CollisionSystem;
  executor: RotationExecutor;
  hooks: DispatcherHooks;
  refresh?: RefreshStrategy;
  perturbOffset?: number;
  debug?: boolean;
}

const TRANSITIONS: Record<EnginePhase, EnginePhase[]> = {
  idle: ['collecting'],
  collecting: ['idle', 'rotating'],
  rotating: ['idle'],
};

/**
 * Single entry point for keys. Owns the engine phase: a key is honored only
 * in `idle`; anything arriving while collecting or rotating is dropped, and
 * manual keys are dropped for the whole of a shuffle.
 */
export class MoveDispatcher {
  private readonly registry: FaceRegistry;
  private readonly cubies: readonly Object3D[];
  private readonly aggregator: CollisionAggregator;
  private readonly collision: CollisionSystem;
  private readonly executor: RotationExecutor;
  private readonly hooks: DispatcherHooks;
  private readonly refresh: RefreshStrategy;
  private readonly perturbOffset: number;
  private readonly debug: boolean;
  private readonly resolve: KeyResolver;
  private state: EnginePhase = 'idle';

  constructor(options: MoveDispatcherOptions) {
    this.registry = options.registry;
    this.cubies = options.cubies;
    this.aggregator = options.aggregator;
    this.collision = options.collision;
    this.executor = options.executor;
    this.hooks = options.hooks;
    this.refresh = options.refresh ?? 'invalidate';
    this.perturbOffset = options.perturbOffset ?? PERTURB_OFFSET;
    this.debug = options.debug ?? false;
    this.resolve = createKeyResolver(options.registry);
  }

  get phase(): EnginePhase {
    return this.state;
  }

  attempt(key: string, source: MoveSource = 'input'): AttemptResult {
    if (this.state !== 'idle' || (source === 'input' && this.hooks.isShuffling())) {
      this.log(`dropped '${key}' (${this.state}${this.hooks.isShuffling() ? ', shuffling' : ''})`);
      return 'dropped';
    }

    const binding = this.resolve(key);
    this.notify(() => this.hooks.onKey?.(key, binding, source));

    switch (binding.kind) {
      case 'none':
        return 'ignored';
      case 'camera':
        this.hooks.selectCamera(binding.preset);
        return 'camera';
      case 'shuffle':
        this.hooks.requestShuffle();
        return 'shuffle';
      case 'face':
        return this.collect(key, binding.face, binding.direction, source);
    }
  }

  private collect(key: string, faceId: FaceId, direction: Direction, source: MoveSource): AttemptResult {
    const face = this.registry.get(faceId);
    this.transition('collecting');

    for (const cubie of this.traverse(face)) {
      this.aggregator.report(face.id, cubie);
    }

    if (!this.aggregator.quorumReached(face.id)) {
      this.log(`${face.id}: ${this.aggregator.size(face.id)}/${face.quorum} cubies, no rotation`);
      this.transition('idle');
      return 'pending';
    }

    const cubies = this.aggregator.members(face.id);
    const record: MoveRecord = {
      key,
      face: face.id,
      direction,
      sense: turnSense(face, direction),
      cubies: cubies.length,
      animated: this.executor.animated,
      source,
    };

    this.transition('rotating');
    this.executor.execute(face, direction, cubies, () => this.complete(face, record));
    return 'rotated';
  }

  private complete(face: Face, record: MoveRecord): void {
    this.aggregator.clear(face.id);
    // Partial sets of other faces were gathered before this turn moved cubies
    this.aggregator.clearAll();
    this.collision.invalidate?.();
    this.transition('idle');
    this.notify(() => this.hooks.onMove?.(record));
  }

  private traverse(face: Face): Object3D[] {
    if (this.refresh === 'perturb' || !this.collision.invalidate) {
      const saved = this.cubies.map((c) => c.position.clone());
      for (const cubie of this.cubies) {
        cubie.position.addScalar(this.perturbOffset);
        cubie.updateMatrixWorld();
      }
      this.collision.traverse(face.volume, this.cubies);
      this.cubies.forEach((cubie, i) => {
        cubie.position.copy(saved[i]);
        cubie.updateMatrixWorld();
      });
    }
    return this.collision.traverse(face.volume, this.cubies);
  }

  private transition(to: EnginePhase): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Illegal phase transition ${this.state} -> ${to}`);
    }
    this.state = to;
    this.notify(() => this.hooks.onPhaseChange?.(to));
  }

  private notify(fn: () => void): void {
    try {
      fn();
    } catch (err) {
      console.error('Engine listener failed:', err);
    }
  }

  private log(message: string): void {
    if (this.debug) console.debug(`[dispatch] ${message}`);
  }
}
