import { useEffect } from 'react';
import { useThree } from '@react-three/fiber';
import { useGameStore } from '../stores/useGameStore.ts';
import { cameraPose } from '../lib/cameraPresets.ts';

/** Moves the camera to the orientation last picked with the digit keys */
export default function CameraRig() {
  const camera = useThree((s) => s.camera);
  const orientation = useGameStore((s) => s.camera);

  useEffect(() => {
    const { position, up } = cameraPose(orientation);
    camera.position.copy(position);
    camera.up.copy(up);
    camera.lookAt(0, 0, 0);
  }, [camera, orientation]);

  return null;
}
