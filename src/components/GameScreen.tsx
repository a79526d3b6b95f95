import { Component, useCallback, useMemo } from 'react';
import type { ReactNode, ErrorInfo } from 'react';
import { Canvas } from '@react-three/fiber';
import { CubeEngine } from '../lib/cubeEngine.ts';
import { gameStoreListener } from '../stores/useGameStore.ts';
import { useKeystrokes } from '../hooks/useKeystrokes.ts';
import { CAMERA_DISTANCE } from '../lib/constants.ts';
import CubeView from './CubeView.tsx';
import CameraRig from './CameraRig.tsx';
import Hud from './Hud.tsx';

// ── Error Boundary for Three.js Canvas ──────────────────────────────

interface ErrorBoundaryProps {
  children: ReactNode;
}

interface ErrorBoundaryState {
  error: string | null;
}

class CanvasErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error: error.message || 'Canvas rendering failed' };
  }

  componentDidCatch(error: Error, _info: ErrorInfo) {
    console.error('Canvas error:', error);
  }

  render() {
    if (this.state.error) {
      return <div className="canvas-error">3D rendering failed: {this.state.error}</div>;
    }
    return this.props.children;
  }
}

// ── Game Screen ─────────────────────────────────────────────────────

interface GameScreenProps {
  debug?: boolean;
}

function CubeScene({ debug }: GameScreenProps) {
  // Registry errors throw here and land in the boundary
  const engine = useMemo(
    () => new CubeEngine({ debug, listener: gameStoreListener() }),
    [debug]
  );

  const onKey = useCallback((key: string) => {
    engine.attempt(key);
  }, [engine]);

  useKeystrokes(onKey);

  return (
    <Canvas camera={{ position: [0, 0, CAMERA_DISTANCE], fov: 40 }}>
      <ambientLight intensity={0.9} />
      <directionalLight position={[5, 8, 5]} intensity={0.6} />
      <directionalLight position={[-3, -4, -5]} intensity={0.3} />
      <CameraRig />
      <CubeView engine={engine} />
    </Canvas>
  );
}

export default function GameScreen({ debug = false }: GameScreenProps) {
  return (
    <div className="game-screen">
      <CanvasErrorBoundary>
        <CubeScene debug={debug} />
      </CanvasErrorBoundary>
      <Hud />
    </div>
  );
}
