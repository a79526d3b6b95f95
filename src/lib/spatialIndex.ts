import * as THREE from 'three';
import { COLLIDER_INSET } from './constants.ts';

/**
 * Collision subsystem the dispatcher traverses. `invalidate` is optional:
 * indexes without it are refreshed by perturbing every cubie instead.
 */
export interface CollisionSystem {
  traverse(volume: THREE.Box3, population: readonly THREE.Object3D[]): THREE.Object3D[];
  invalidate?(): void;
}

interface BoundsEntry {
  bounds: THREE.Box3;
  position: THREE.Vector3;   // local position the bounds were computed at
}

const _inverse = new THREE.Matrix4();

/**
 * Axis-aligned overlap test between each cubie's inset bounds and a face
 * volume, both in cube-root space.
 *
 * Bounds are cached per cubie and recomputed when the cubie's local position
 * differs from the one recorded with the entry, or after `invalidate()`.
 */
export class BoundsCollisionSystem implements CollisionSystem {
  private readonly cache = new Map<string, BoundsEntry>();

  constructor(
    private readonly root: THREE.Object3D,
    private readonly inset = COLLIDER_INSET,
    private readonly debug = false
  ) {}

  invalidate(): void {
    this.cache.clear();
  }

  traverse(volume: THREE.Box3, population: readonly THREE.Object3D[]): THREE.Object3D[] {
    const hits = population.filter((cubie) => this.boundsOf(cubie).intersectsBox(volume));
    if (this.debug) {
      console.debug(`[collision] ${hits.length} hit(s): ${hits.map((c) => c.name).join(', ')}`);
    }
    return hits;
  }

  private boundsOf(cubie: THREE.Object3D): THREE.Box3 {
    const cached = this.cache.get(cubie.uuid);
    if (cached && cached.position.equals(cubie.position)) return cached.bounds;

    this.root.updateWorldMatrix(true, true);
    _inverse.copy(this.root.matrixWorld).invert();

    const bounds = new THREE.Box3().setFromObject(cubie).applyMatrix4(_inverse);
    bounds.expandByScalar(-this.inset);

    this.cache.set(cubie.uuid, { bounds, position: cubie.position.clone() });
    return bounds;
  }
}
