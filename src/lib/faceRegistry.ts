import type { Face, FaceDefinition, FaceId, FaceNodes } from '../types/cube.ts';
import { FACE_ORDER } from './constants.ts';

export class FaceRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FaceRegistryError';
  }
}

export interface FaceRegistry {
  /** Faces in `FACE_ORDER`; key tables, labels and the shuffle alphabet follow it */
  readonly faces: readonly Face[];
  get(id: FaceId): Face;
}

/**
 * Join face definitions with their scene nodes. Any malformed entry is fatal:
 * the registry is frozen and every later move depends on it.
 */
export function createFaceRegistry(
  definitions: readonly FaceDefinition[],
  nodes: Partial<Record<FaceId, FaceNodes>>
): FaceRegistry {
  const byId = new Map<FaceId, Face>();
  const byKey = new Map<string, Face>();

  for (const def of definitions) {
    if (!/^[a-z]$/i.test(def.key)) {
      throw new FaceRegistryError(`Face ${def.id}: key '${def.key}' must be a single letter`);
    }
    const key = def.key.toLowerCase();
    const clash = byKey.get(key);
    if (clash) {
      throw new FaceRegistryError(`Face ${def.id}: key '${key}' already bound to ${clash.id}`);
    }
    if (byId.has(def.id)) {
      throw new FaceRegistryError(`Face ${def.id} defined twice`);
    }
    if (def.quorum !== 8 && def.quorum !== 9) {
      throw new FaceRegistryError(`Face ${def.id}: quorum ${def.quorum} (expected 8 or 9)`);
    }
    if (def.rotation.x === 0 && def.rotation.y === 0 && def.rotation.z === 0) {
      throw new FaceRegistryError(`Face ${def.id}: rotation is zero`);
    }

    const faceNodes = nodes[def.id];
    if (!faceNodes?.pivot) {
      throw new FaceRegistryError(`Face ${def.id}: missing pivot node`);
    }
    if (!faceNodes.volume || faceNodes.volume.isEmpty()) {
      throw new FaceRegistryError(`Face ${def.id}: missing collision volume`);
    }

    const face: Face = Object.freeze({
      ...def,
      key,
      rotation: Object.freeze({ ...def.rotation }),
      pivot: faceNodes.pivot,
      volume: faceNodes.volume,
    });
    byId.set(def.id, face);
    byKey.set(key, face);
  }

  const faces = Object.freeze(
    FACE_ORDER.flatMap((id) => {
      const face = byId.get(id);
      return face ? [face] : [];
    })
  );

  return Object.freeze({
    faces,
    get(id: FaceId): Face {
      const face = byId.get(id);
      if (!face) throw new FaceRegistryError(`Unknown face ${id}`);
      return face;
    },
  });
}
