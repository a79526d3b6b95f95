import { create } from 'zustand';
import type { CameraOrientation, CameraSelection, EnginePhase, MoveRecord } from '../types/cube.ts';
import { CAMERA_PRESETS, FACE_NAMES } from '../lib/constants.ts';
import type { EngineListener } from '../lib/cubeEngine.ts';

const HISTORY_LIMIT = 100;

interface GameState {
  phase: EnginePhase;
  isShuffling: boolean;
  lastKey: string | null;
  info: string | null;
  camera: CameraOrientation;
  moves: MoveRecord[];       // most recent last, capped
  moveCount: number;
}

interface GameStore extends GameState {
  // Actions
  recordKey: (key: string) => void;
  setPhase: (phase: EnginePhase) => void;
  recordMove: (move: MoveRecord) => void;
  setCamera: (selection: CameraSelection) => void;
  shuffleStarted: (count: number) => void;
  shuffleFinished: () => void;
  reset: () => void;
}

const initialState: GameState = {
  phase: 'idle',
  isShuffling: false,
  lastKey: null,
  info: null,
  camera: { ...CAMERA_PRESETS[1].orientation },
  moves: [],
  moveCount: 0,
};

export const useGameStore = create<GameStore>()((set) => ({
  ...initialState,

  recordKey: (key) => {
    // Any letter is shown, bound or not; digits and space are not
    if (/^[A-Za-z]$/.test(key)) set({ lastKey: key });
  },

  setPhase: (phase) => set({ phase }),

  recordMove: (move) =>
    set((state) => ({
      moves: [...state.moves, move].slice(-HISTORY_LIMIT),
      moveCount: state.moveCount + 1,
      info: move.source === 'input'
        ? `${FACE_NAMES[move.face]} ${move.sense}`
        : state.info,
    })),

  setCamera: (selection) => set({ camera: selection.orientation, info: selection.label }),

  shuffleStarted: (count) => set({ isShuffling: true, info: `Shuffling (${count} moves)...` }),

  shuffleFinished: () => set({ isShuffling: false, info: 'Shuffled' }),

  reset: () => set(initialState),
}));

/** Listener that mirrors engine events into the store */
export function gameStoreListener(): EngineListener {
  const store = () => useGameStore.getState();
  return {
    onKey: (key) => store().recordKey(key),
    onPhaseChange: (phase) => store().setPhase(phase),
    onMove: (move) => store().recordMove(move),
    onCamera: (selection) => store().setCamera(selection),
    onShuffleStart: (keys) => store().shuffleStarted(keys.length),
    onShuffleFinish: () => store().shuffleFinished(),
  };
}
