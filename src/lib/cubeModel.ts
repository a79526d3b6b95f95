import * as THREE from 'three';
import type { Axis, ColorFamily, CubeScene, FaceDefinition, FaceId, FaceNodes, Lattice, Position3D } from '../types/cube.ts';
import {
  COLOR_HEX,
  CUBIE_SIZE,
  CUBIE_SPACING,
  FACE_DEFINITIONS,
  INNER_HEX,
  VOLUME_HALF_EXTENT,
  VOLUME_HALF_THICKNESS,
} from './constants.ts';

// Outward side → color family, in three.js box material order: +X, -X, +Y, -Y, +Z, -Z
const SIDE_COLORS: { axis: Axis; sign: Lattice; color: ColorFamily }[] = [
  { axis: 'x', sign: 1, color: 'BLUE' },
  { axis: 'x', sign: -1, color: 'GREEN' },
  { axis: 'y', sign: 1, color: 'WHITE' },
  { axis: 'y', sign: -1, color: 'YELLOW' },
  { axis: 'z', sign: 1, color: 'RED' },
  { axis: 'z', sign: -1, color: 'ORANGE' },
];

// Name tag order: up/down first, then front/back, then right/left
const TAG_ORDER: ColorFamily[] = ['WHITE', 'YELLOW', 'RED', 'ORANGE', 'BLUE', 'GREEN'];

const LATTICE: Lattice[] = [-1, 0, 1];

const homes = new WeakMap<THREE.Object3D, Position3D>();

const materialCache = new Map<string, THREE.MeshStandardMaterial>();

function getMaterial(hex: string): THREE.MeshStandardMaterial {
  let material = materialCache.get(hex);
  if (!material) {
    material = new THREE.MeshStandardMaterial({ color: hex, roughness: 0.35, metalness: 0.05 });
    materialCache.set(hex, material);
  }
  return material;
}

/** Color families facing outward for a lattice position, in name-tag order */
export function colorFamiliesAt(position: Position3D): ColorFamily[] {
  const families = SIDE_COLORS
    .filter(({ axis, sign }) => position[axis] === sign)
    .map(({ color }) => color);
  return TAG_ORDER.filter((c) => families.includes(c));
}

function createCubie(position: Position3D): THREE.Mesh {
  const materials = SIDE_COLORS.map(({ axis, sign, color }) =>
    getMaterial(position[axis] === sign ? COLOR_HEX[color] : INNER_HEX)
  );
  const mesh = new THREE.Mesh(new THREE.BoxGeometry(CUBIE_SIZE, CUBIE_SIZE, CUBIE_SIZE), materials);
  mesh.name = `cubie-${colorFamiliesAt(position).join('-')}`;
  mesh.position.set(position.x * CUBIE_SPACING, position.y * CUBIE_SPACING, position.z * CUBIE_SPACING);
  homes.set(mesh, position);
  return mesh;
}

/** Slab covering one layer of the lattice, in cube-root space */
export function createFaceVolume(def: Pick<FaceDefinition, 'axis' | 'layer'>): THREE.Box3 {
  const min = new THREE.Vector3(-VOLUME_HALF_EXTENT, -VOLUME_HALF_EXTENT, -VOLUME_HALF_EXTENT);
  const max = new THREE.Vector3(VOLUME_HALF_EXTENT, VOLUME_HALF_EXTENT, VOLUME_HALF_EXTENT);
  const center = def.layer * CUBIE_SPACING;
  min[def.axis] = center - VOLUME_HALF_THICKNESS;
  max[def.axis] = center + VOLUME_HALF_THICKNESS;
  return new THREE.Box3(min, max);
}

/**
 * Build the cube hierarchy: a root group holding 26 cubies (the core is
 * excluded) and one empty pivot per face, plus each face's collision volume.
 */
export function buildCubeScene(definitions: FaceDefinition[] = FACE_DEFINITIONS): CubeScene {
  const root = new THREE.Group();
  root.name = 'cube-root';

  const cubies: THREE.Object3D[] = [];
  for (const x of LATTICE) {
    for (const y of LATTICE) {
      for (const z of LATTICE) {
        if (x === 0 && y === 0 && z === 0) continue;
        const cubie = createCubie({ x, y, z });
        root.add(cubie);
        cubies.push(cubie);
      }
    }
  }

  const nodes: Partial<Record<FaceId, FaceNodes>> = {};
  for (const def of definitions) {
    const pivot = new THREE.Group();
    pivot.name = `${def.id}-pivot`;
    root.add(pivot);
    nodes[def.id] = { pivot, volume: createFaceVolume(def) };
  }

  root.updateMatrixWorld(true);
  return { root, cubies, nodes };
}

function toLattice(value: number): Lattice {
  const step = Math.round(value / CUBIE_SPACING);
  if (step < 0) return -1;
  if (step > 0) return 1;
  return 0;
}

/** Current lattice coordinate of a cubie, measured in its parent's space */
export function latticeOf(cubie: THREE.Object3D): Position3D {
  return {
    x: toLattice(cubie.position.x),
    y: toLattice(cubie.position.y),
    z: toLattice(cubie.position.z),
  };
}

/** Lattice coordinate the cubie was created at */
export function homeOf(cubie: THREE.Object3D): Position3D | undefined {
  return homes.get(cubie);
}

export function latticeKey(p: Position3D): string {
  return `${p.x},${p.y},${p.z}`;
}
