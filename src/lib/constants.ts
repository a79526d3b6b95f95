import type { CameraOrientation, CameraPresetIndex, ColorFamily, FaceDefinition, FaceId } from '../types/cube.ts';

// ── Face Table ──────────────────────────────────────────────────────
// three.js y-up, +z toward the viewer. Rotation is the pivot delta for a
// lowercase key; uppercase keys apply the same delta negated.

export const FACE_DEFINITIONS: FaceDefinition[] = [
  { id: 'TOP',               key: 't', rotation: { x: 0,   y: -90, z: 0 },   quorum: 9, axis: 'y', layer: 1 },
  { id: 'BOTTOM',            key: 'd', rotation: { x: 0,   y: -90, z: 0 },   quorum: 9, axis: 'y', layer: -1 },
  { id: 'LEFT',              key: 'l', rotation: { x: 90,  y: 0,   z: 0 },   quorum: 9, axis: 'x', layer: -1 },
  { id: 'RIGHT',             key: 'r', rotation: { x: -90, y: 0,   z: 0 },   quorum: 9, axis: 'x', layer: 1 },
  { id: 'FRONT',             key: 'f', rotation: { x: 0,   y: 0,   z: 90 },  quorum: 9, axis: 'z', layer: 1 },
  { id: 'BACK',              key: 'b', rotation: { x: 0,   y: 0,   z: -90 }, quorum: 9, axis: 'z', layer: -1 },
  { id: 'CENTER_VERTICAL',   key: 'v', rotation: { x: 0,   y: -90, z: 0 },   quorum: 8, axis: 'y', layer: 0 },
  { id: 'CENTER_HORIZONTAL', key: 'h', rotation: { x: 90,  y: 0,   z: 0 },   quorum: 8, axis: 'x', layer: 0 },
  { id: 'CENTER_DOUBLE',     key: 'c', rotation: { x: 0,   y: 0,   z: 90 },  quorum: 8, axis: 'z', layer: 0 },
];

/** Registry order, whatever order the definitions come in */
export const FACE_ORDER: readonly FaceId[] = [
  'TOP',
  'BOTTOM',
  'LEFT',
  'RIGHT',
  'FRONT',
  'BACK',
  'CENTER_VERTICAL',
  'CENTER_HORIZONTAL',
  'CENTER_DOUBLE',
];

export const FACE_NAMES: Record<FaceId, string> = {
  TOP: 'Top',
  BOTTOM: 'Bottom',
  LEFT: 'Left',
  RIGHT: 'Right',
  FRONT: 'Front',
  BACK: 'Back',
  CENTER_VERTICAL: 'Center (vertical)',
  CENTER_HORIZONTAL: 'Center (horizontal)',
  CENTER_DOUBLE: 'Center (double)',
};

export const SHUFFLE_KEY = ' ';

// ── Geometry ────────────────────────────────────────────────────────

export const CUBIE_SIZE = 1;
export const CUBIE_SPACING = 1.05;       // lattice step between cubie centers
export const COLLIDER_INSET = 0.2;       // cubie collider shrink per side
export const VOLUME_HALF_THICKNESS = 0.25;
export const VOLUME_HALF_EXTENT = CUBIE_SPACING + 0.25;

// ── Timing (ms) ─────────────────────────────────────────────────────

export const ROTATION_DURATION_MS = 280;
export const SHUFFLE_LEAD_IN_MS = 1000;
export const SHUFFLE_STEP_MS = 150;
export const SHUFFLE_MIN_MOVES = 30;
export const SHUFFLE_MAX_MOVES = 60;

/** Translation applied to every cubie by the perturbation refresh */
export const PERTURB_OFFSET = 15;

// ── Colors ──────────────────────────────────────────────────────────

export const COLOR_HEX: Record<ColorFamily, string> = {
  WHITE: '#F9FAFB',
  YELLOW: '#FACC15',
  RED: '#DC2626',
  ORANGE: '#F97316',
  BLUE: '#2563EB',
  GREEN: '#16A34A',
};

export const INNER_HEX = '#111111';

// ── Camera Presets ──────────────────────────────────────────────────

export const CAMERA_DISTANCE = 10;

export const CAMERA_PRESETS: Record<Exclude<CameraPresetIndex, 7>, { label: string; orientation: CameraOrientation }> = {
  1: { label: 'Front',  orientation: { yaw: 0,   pitch: 0,   roll: 0 } },
  2: { label: 'Back',   orientation: { yaw: 0,   pitch: 180, roll: 180 } },
  3: { label: 'Left',   orientation: { yaw: 90,  pitch: 0,   roll: 0 } },
  4: { label: 'Right',  orientation: { yaw: -90, pitch: 0,   roll: 0 } },
  5: { label: 'Top',    orientation: { yaw: 0,   pitch: 90,  roll: 0 } },
  6: { label: 'Bottom', orientation: { yaw: 0,   pitch: -90, roll: 0 } },
};

export const OPPOSITE_PRESET_LABEL = 'Opposite side';
export const OPPOSITE_ROLL_OFFSET = -90;
