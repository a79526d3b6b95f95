import { Html } from '@react-three/drei';
import type { Face } from '../types/cube.ts';
import { CUBIE_SPACING } from '../lib/constants.ts';

const LABEL_DISTANCE = CUBIE_SPACING * 2.2;

/**
 * Outer faces get their label straight out from the layer; center slices
 * have no outward side, so theirs sits on the edge the slice crosses.
 */
export function labelPosition(face: Pick<Face, 'axis' | 'layer'>): [number, number, number] {
  const pos = { x: 0, y: 0, z: 0 };
  if (face.layer === 0) {
    pos.x = pos.y = pos.z = LABEL_DISTANCE;
    pos[face.axis] = 0;
  } else {
    pos[face.axis] = face.layer * LABEL_DISTANCE;
  }
  return [pos.x, pos.y, pos.z];
}

interface FaceLabelsProps {
  faces: readonly Face[];
}

export default function FaceLabels({ faces }: FaceLabelsProps) {
  return (
    <>
      {faces.map((face) => (
        <Html key={face.id} position={labelPosition(face)} center>
          <div className={`face-key-label ${face.layer === 0 ? 'slice' : ''}`}>
            {face.key.toUpperCase()}
          </div>
        </Html>
      ))}
    </>
  );
}
