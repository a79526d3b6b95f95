import type { KeyBinding } from '../types/cube.ts';
import { SHUFFLE_KEY } from './constants.ts';
import { isCameraPresetIndex } from './cameraPresets.ts';
import type { FaceRegistry } from './faceRegistry.ts';

const NONE: KeyBinding = { kind: 'none' };

export type KeyResolver = (key: string) => KeyBinding;

/**
 * Lookup table built once from the registry: both cases of every face key,
 * the camera digits and the shuffle key. Everything else resolves to `none`.
 */
export function createKeyResolver(registry: Pick<FaceRegistry, 'faces'>): KeyResolver {
  const table = new Map<string, KeyBinding>();

  for (const face of registry.faces) {
    table.set(face.key, { kind: 'face', face: face.id, direction: 1 });
    table.set(face.key.toUpperCase(), { kind: 'face', face: face.id, direction: -1 });
  }
  for (let i = 1; i <= 7; i++) {
    if (isCameraPresetIndex(i)) table.set(String(i), { kind: 'camera', preset: i });
  }
  table.set(SHUFFLE_KEY, { kind: 'shuffle' });

  return (key) => table.get(key) ?? NONE;
}

/** Every face key in both cases, registry order, lowercase first */
export function shuffleAlphabet(registry: Pick<FaceRegistry, 'faces'>): string[] {
  return registry.faces.flatMap((face) => [face.key, face.key.toUpperCase()]);
}
