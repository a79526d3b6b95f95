import { describe, it, expect, vi } from 'vitest';
import { Object3D } from 'three';
import { RotationExecutor, snapToLattice, targetRotation, turnSense } from './rotationExecutor.ts';
import { AnimationDriver } from './animationDriver.ts';
import { BoundsCollisionSystem } from './spatialIndex.ts';
import { buildCubeScene, homeOf, latticeKey, latticeOf } from './cubeModel.ts';
import { createFaceRegistry } from './faceRegistry.ts';
import { FACE_DEFINITIONS } from './constants.ts';

function setup(animated: boolean) {
  const scene = buildCubeScene();
  const registry = createFaceRegistry(FACE_DEFINITIONS, scene.nodes);
  const driver = new AnimationDriver();
  const executor = new RotationExecutor({ root: scene.root, driver, animated });
  const collision = new BoundsCollisionSystem(scene.root);
  const top = registry.get('TOP');
  const members = collision.traverse(top.volume, scene.cubies);
  return { scene, registry, driver, executor, top, members };
}

function findByHome(cubies: readonly Object3D[], key: string): Object3D {
  const cubie = cubies.find((c) => {
    const home = homeOf(c);
    return home !== undefined && latticeKey(home) === key;
  });
  if (!cubie) throw new Error(`no cubie at ${key}`);
  return cubie;
}

describe('RotationExecutor', () => {
  it('turns the layer instantly when animation is off', () => {
    const { scene, executor, top, members } = setup(false);
    const onComplete = vi.fn();

    executor.execute(top, 1, members, onComplete);

    expect(onComplete).toHaveBeenCalledTimes(1);
    // y -90°: (x, z) -> (-z, x)
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,1,0')))).toBe('0,1,1');
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,1,1')))).toBe('-1,1,1');
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '0,1,0')))).toBe('0,1,0');
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,0,0')))).toBe('1,0,0');
  });

  it('turns the other way for direction -1', () => {
    const { scene, executor, top, members } = setup(false);

    executor.execute(top, -1, members, () => {});

    // y +90°: (x, z) -> (z, -x)
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,1,0')))).toBe('0,1,-1');
  });

  it('returns every cubie to the root and leaves the pivot empty', () => {
    const { scene, executor, top, members } = setup(false);

    executor.execute(top, 1, members, () => {});

    expect(scene.cubies.every((c) => c.parent === scene.root)).toBe(true);
    expect(top.pivot.children).toHaveLength(0);
  });

  it('keeps cubies under the pivot until the animation completes', () => {
    const { scene, driver, executor, top, members } = setup(true);
    const onComplete = vi.fn();

    executor.execute(top, 1, members, onComplete);
    expect(members.every((c) => c.parent === top.pivot)).toBe(true);

    driver.tick(140);
    expect(top.pivot.rotation.y).toBeCloseTo(-Math.PI / 4);
    expect(onComplete).not.toHaveBeenCalled();

    driver.tick(140);
    expect(onComplete).toHaveBeenCalledTimes(1);
    expect(scene.cubies.every((c) => c.parent === scene.root)).toBe(true);
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,1,0')))).toBe('0,1,1');
  });

  it('clears a leftover pivot transform before attaching', () => {
    const { scene, executor, top, members } = setup(false);
    top.pivot.rotation.set(0, 1, 0);
    top.pivot.position.set(3, 0, 0);

    executor.execute(top, 1, members, () => {});

    expect(latticeKey(latticeOf(findByHome(scene.cubies, '1,1,0')))).toBe('0,1,1');
  });

  it('refuses a second rotation while one is running', () => {
    const { executor, top, members } = setup(true);
    executor.execute(top, 1, members, () => {});

    expect(() => executor.execute(top, 1, members, () => {})).toThrow(
      'Rotation of TOP requested while another rotation is running'
    );
  });

  it('toggles animation', () => {
    const { executor } = setup(true);
    executor.setAnimated(false);
    expect(executor.animated).toBe(false);
  });
});

describe('snapToLattice', () => {
  it('rounds position to the spacing grid and angles to quarter turns', () => {
    const node = new Object3D();
    node.position.set(1.0500001, -0.0000001, 2.1);
    node.rotation.set(Math.PI / 2 + 1e-9, -1e-12, Math.PI - 1e-9);

    snapToLattice(node);

    expect(node.position.x).toBe(1.05);
    expect(node.position.y).toBe(0);
    expect(node.position.z).toBe(2.1);
    expect(node.rotation.x).toBe(Math.PI / 2);
    expect(node.rotation.y).toBe(0);
    expect(node.rotation.z).toBe(Math.PI);
  });
});

describe('targetRotation', () => {
  it('scales the face delta by direction, in radians', () => {
    expect(targetRotation({ rotation: { x: 0, y: -90, z: 0 } }, -1).y).toBeCloseTo(Math.PI / 2);
    expect(targetRotation({ rotation: { x: 90, y: 0, z: 0 } }, 1).x).toBeCloseTo(Math.PI / 2);
  });
});

describe('turnSense', () => {
  const senses = (direction: 1 | -1) =>
    Object.fromEntries(FACE_DEFINITIONS.map((face) => [face.id, turnSense(face, direction)]));

  it('names the lowercase turn as seen from outside each face', () => {
    expect(senses(1)).toEqual({
      TOP: 'CW',
      BOTTOM: 'CCW',
      LEFT: 'CW',
      RIGHT: 'CW',
      FRONT: 'CCW',
      BACK: 'CCW',
      CENTER_VERTICAL: 'CW',
      CENTER_HORIZONTAL: 'CCW',
      CENTER_DOUBLE: 'CCW',
    });
  });

  it('flips with the direction', () => {
    const forward = senses(1);
    const backward = senses(-1);

    for (const face of FACE_DEFINITIONS) {
      expect(backward[face.id], face.id).toBe(forward[face.id] === 'CW' ? 'CCW' : 'CW');
    }
  });

  it('agrees with where the front turn moves the top edge', () => {
    const { scene, registry, executor } = setup(false);
    const front = registry.get('FRONT');
    const collision = new BoundsCollisionSystem(scene.root);

    executor.execute(front, 1, collision.traverse(front.volume, scene.cubies), () => {});

    // Seen from the front, top -> left is counter-clockwise
    expect(latticeKey(latticeOf(findByHome(scene.cubies, '0,1,1')))).toBe('-1,0,1');
    expect(turnSense(front, 1)).toBe('CCW');
  });
});
