import type { Box3, Group, Object3D } from 'three';

// ── Face Types ──────────────────────────────────────────────────────

export type FaceId =
  | 'TOP'
  | 'BOTTOM'
  | 'LEFT'
  | 'RIGHT'
  | 'FRONT'
  | 'BACK'
  | 'CENTER_VERTICAL'
  | 'CENTER_HORIZONTAL'
  | 'CENTER_DOUBLE';

export type Axis = 'x' | 'y' | 'z';

export type Lattice = -1 | 0 | 1;

/** 1 = lowercase key, -1 = uppercase key */
export type Direction = 1 | -1;

/** Euler delta in degrees, applied once per unit direction */
export interface RotationDelta {
  x: number;
  y: number;
  z: number;
}

export interface FaceDefinition {
  id: FaceId;
  key: string;               // single lowercase letter
  rotation: RotationDelta;
  quorum: 8 | 9;             // 8 for center slices (core cubie excluded)
  axis: Axis;
  layer: Lattice;
}

/** Scene nodes a face needs at runtime */
export interface FaceNodes {
  pivot: Group;
  volume: Box3;              // collision volume in cube-root space
}

export interface Face extends FaceDefinition, FaceNodes {}

// ── Cubie Types ─────────────────────────────────────────────────────

export interface Position3D {
  x: Lattice;
  y: Lattice;
  z: Lattice;
}

export type ColorFamily = 'WHITE' | 'YELLOW' | 'RED' | 'ORANGE' | 'BLUE' | 'GREEN';

export interface CubeScene {
  root: Group;
  cubies: Object3D[];
  nodes: Partial<Record<FaceId, FaceNodes>>;
}

// ── Input Types ─────────────────────────────────────────────────────

export type CameraPresetIndex = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type KeyBinding =
  | { kind: 'face'; face: FaceId; direction: Direction }
  | { kind: 'camera'; preset: CameraPresetIndex }
  | { kind: 'shuffle' }
  | { kind: 'none' };

export type MoveSource = 'input' | 'shuffle';

export type AttemptResult = 'rotated' | 'pending' | 'camera' | 'shuffle' | 'ignored' | 'dropped';

// ── Engine State ────────────────────────────────────────────────────

export type EnginePhase = 'idle' | 'collecting' | 'rotating';

export type ShuffleState = 'idle' | 'running';

/** Turn sense as seen from outside the face (center slices: from the positive axis) */
export type TurnSense = 'CW' | 'CCW';

export interface MoveRecord {
  key: string;
  face: FaceId;
  direction: Direction;
  sense: TurnSense;
  cubies: number;
  animated: boolean;
  source: MoveSource;
}

// ── Camera Types ────────────────────────────────────────────────────

/** Degrees */
export interface CameraOrientation {
  yaw: number;
  pitch: number;
  roll: number;
}

export interface CameraSelection {
  label: string;
  orientation: CameraOrientation;
}
