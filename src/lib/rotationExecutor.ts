import * as THREE from 'three';
import type { Direction, Face, TurnSense } from '../types/cube.ts';
import { CUBIE_SPACING, ROTATION_DURATION_MS } from './constants.ts';
import type { AnimationDriver } from './animationDriver.ts';

const QUARTER = Math.PI / 2;

function snap(value: number, grid: number): number {
  const snapped = Math.round(value / grid) * grid;
  return snapped === 0 ? 0 : snapped;   // no -0
}

/** Pull a cubie back onto the lattice after a quarter turn */
export function snapToLattice(cubie: THREE.Object3D, spacing = CUBIE_SPACING): void {
  const { position, rotation } = cubie;
  position.set(snap(position.x, spacing), snap(position.y, spacing), snap(position.z, spacing));
  rotation.set(snap(rotation.x, QUARTER), snap(rotation.y, QUARTER), snap(rotation.z, QUARTER));
  cubie.updateMatrixWorld();
}

/** Target pivot Euler (radians) for one face turn */
export function targetRotation(face: Pick<Face, 'rotation'>, direction: Direction): THREE.Euler {
  return new THREE.Euler(
    THREE.MathUtils.degToRad(face.rotation.x * direction),
    THREE.MathUtils.degToRad(face.rotation.y * direction),
    THREE.MathUtils.degToRad(face.rotation.z * direction)
  );
}

/**
 * A positive angle about an axis is counter-clockwise seen from that axis'
 * positive side. Outer faces are seen from outside their layer; center
 * slices from the positive side of their axis.
 */
export function turnSense(face: Pick<Face, 'rotation' | 'axis' | 'layer'>, direction: Direction): TurnSense {
  const viewer = face.layer === 0 ? 1 : face.layer;
  return Math.sign(face.rotation[face.axis] * direction) === viewer ? 'CCW' : 'CW';
}

export interface RotationExecutorOptions {
  root: THREE.Object3D;
  driver: AnimationDriver;
  durationMs?: number;
  animated?: boolean;
}

/**
 * Turns one layer: the collided cubies are attached to the face pivot
 * (world transform kept), the pivot is rotated, and the cubies are attached
 * back to the cube root. `onComplete` fires only after the last cubie is
 * back under the root.
 */
export class RotationExecutor {
  private readonly root: THREE.Object3D;
  private readonly driver: AnimationDriver;
  private readonly durationMs: number;
  private animate: boolean;
  private running = false;

  constructor({ root, driver, durationMs = ROTATION_DURATION_MS, animated = true }: RotationExecutorOptions) {
    this.root = root;
    this.driver = driver;
    this.durationMs = durationMs;
    this.animate = animated;
  }

  get animated(): boolean {
    return this.animate;
  }

  setAnimated(animated: boolean): void {
    this.animate = animated;
  }

  execute(face: Face, direction: Direction, cubies: readonly THREE.Object3D[], onComplete: () => void): void {
    if (this.running) {
      throw new Error(`Rotation of ${face.id} requested while another rotation is running`);
    }
    this.running = true;

    const { pivot } = face;
    pivot.position.set(0, 0, 0);
    pivot.rotation.set(0, 0, 0);
    pivot.scale.set(1, 1, 1);
    pivot.updateMatrixWorld();

    for (const cubie of cubies) pivot.attach(cubie);

    const target = targetRotation(face, direction);

    const finish = () => {
      pivot.rotation.copy(target);
      pivot.updateMatrixWorld();
      for (const cubie of cubies) {
        this.root.attach(cubie);
        snapToLattice(cubie);
      }
      this.running = false;
      onComplete();
    };

    if (!this.animate) {
      finish();
      return;
    }

    this.driver.schedule(
      this.durationMs,
      (progress) => {
        pivot.rotation.set(target.x * progress, target.y * progress, target.z * progress);
      },
      finish
    );
  }
}
