import * as THREE from 'three';
import type { CameraOrientation, CameraPresetIndex, CameraSelection } from '../types/cube.ts';
import { CAMERA_DISTANCE, CAMERA_PRESETS, OPPOSITE_PRESET_LABEL, OPPOSITE_ROLL_OFFSET } from './constants.ts';

export function isCameraPresetIndex(value: number): value is CameraPresetIndex {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

/** Wrap degrees into [-180, 180) */
export function normalizeDegrees(deg: number): number {
  return ((((deg + 180) % 360) + 360) % 360) - 180;
}

/**
 * Presets 1-6 are fixed views; 7 turns the current view by a fixed roll.
 * Pure: depends only on the index and the current orientation.
 */
export function resolveCameraPreset(index: CameraPresetIndex, current: CameraOrientation): CameraSelection {
  if (index === 7) {
    return {
      label: OPPOSITE_PRESET_LABEL,
      orientation: { ...current, roll: normalizeDegrees(current.roll + OPPOSITE_ROLL_OFFSET) },
    };
  }
  const preset = CAMERA_PRESETS[index];
  return { label: preset.label, orientation: { ...preset.orientation } };
}

export class CameraPresetSelector {
  private orientation: CameraOrientation;

  constructor(initial: CameraOrientation = CAMERA_PRESETS[1].orientation) {
    this.orientation = { ...initial };
  }

  get current(): CameraOrientation {
    return { ...this.orientation };
  }

  select(index: CameraPresetIndex): CameraSelection {
    const selection = resolveCameraPreset(index, this.orientation);
    this.orientation = selection.orientation;
    return selection;
  }
}

/**
 * Camera placement for an orientation: the front view looks down -z from
 * +z; yaw turns around y, pitch raises the camera, roll turns its up vector.
 */
export function cameraPose(
  orientation: CameraOrientation,
  distance = CAMERA_DISTANCE
): { position: THREE.Vector3; up: THREE.Vector3 } {
  const q = new THREE.Quaternion().setFromEuler(
    new THREE.Euler(
      THREE.MathUtils.degToRad(-orientation.pitch),
      THREE.MathUtils.degToRad(-orientation.yaw),
      THREE.MathUtils.degToRad(orientation.roll),
      'YXZ'
    )
  );
  return {
    position: new THREE.Vector3(0, 0, distance).applyQuaternion(q),
    up: new THREE.Vector3(0, 1, 0).applyQuaternion(q),
  };
}
