import type { Object3D } from 'three';
import type { FaceId } from '../types/cube.ts';
import type { FaceRegistry } from './faceRegistry.ts';

/**
 * Per-face set of cubies reported as touching the face's collision volume.
 *
 * Sets only grow while a move is in progress. The aggregator never starts a
 * rotation itself; the dispatcher checks `quorumReached` after a traversal.
 */
export class CollisionAggregator {
  private readonly sets = new Map<FaceId, Set<Object3D>>();

  constructor(private readonly registry: Pick<FaceRegistry, 'get'>) {}

  report(face: FaceId, cubie: Object3D): void {
    let set = this.sets.get(face);
    if (!set) {
      set = new Set();
      this.sets.set(face, set);
    }
    set.add(cubie);
  }

  size(face: FaceId): number {
    return this.sets.get(face)?.size ?? 0;
  }

  quorumReached(face: FaceId): boolean {
    return this.size(face) >= this.registry.get(face).quorum;
  }

  members(face: FaceId): Object3D[] {
    return [...(this.sets.get(face) ?? [])];
  }

  clear(face: FaceId): void {
    this.sets.get(face)?.clear();
  }

  clearAll(): void {
    for (const set of this.sets.values()) set.clear();
  }
}
