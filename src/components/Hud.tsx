import { useGameStore } from '../stores/useGameStore.ts';
import { FACE_DEFINITIONS, FACE_NAMES } from '../lib/constants.ts';

const CAMERA_KEYS = '1 Front · 2 Back · 3 Left · 4 Right · 5 Top · 6 Bottom · 7 Opposite';
const RECENT_MOVES = 12;

export default function Hud() {
  const lastKey = useGameStore((s) => s.lastKey);
  const info = useGameStore((s) => s.info);
  const phase = useGameStore((s) => s.phase);
  const isShuffling = useGameStore((s) => s.isShuffling);
  const moveCount = useGameStore((s) => s.moveCount);
  const moves = useGameStore((s) => s.moves);

  const recent = moves.slice(-RECENT_MOVES).map((m) => m.key).join(' ');

  const status = isShuffling ? 'Shuffling' : phase === 'rotating' ? 'Rotating' : 'Ready';

  return (
    <div className="hud">
      <div className="hud-top-left">
        {lastKey && <div className="pressed-key">{lastKey}</div>}
        <div className="hud-status">
          {status} · {moveCount} moves
        </div>
        {recent && <div className="hud-recent">{recent}</div>}
      </div>

      <div className="key-legend">
        {FACE_DEFINITIONS.map((face) => (
          <div key={face.id} className="key-legend-row">
            <kbd>{face.key.toUpperCase()}</kbd>
            <span>{FACE_NAMES[face.id]}</span>
          </div>
        ))}
        <div className="key-legend-hint">lowercase / Shift = direction</div>
        <div className="key-legend-hint">Space = shuffle</div>
        <div className="key-legend-hint">{CAMERA_KEYS}</div>
      </div>

      {info && <div className="hud-info">{info}</div>}
    </div>
  );
}
