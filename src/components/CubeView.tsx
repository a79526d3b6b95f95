import { useFrame } from '@react-three/fiber';
import type { CubeEngine } from '../lib/cubeEngine.ts';
import FaceLabels from './FaceLabels.tsx';

interface CubeViewProps {
  engine: CubeEngine;
}

/**
 * The engine owns the cube's scene graph (pivots, re-parenting), so it is
 * mounted as a primitive rather than rebuilt from React state. Each frame
 * advances the engine's timeline.
 */
export default function CubeView({ engine }: CubeViewProps) {
  useFrame((_, delta) => {
    engine.tick(delta * 1000);
  });

  return (
    <>
      <primitive object={engine.root} />
      <FaceLabels faces={engine.registry.faces} />
    </>
  );
}
