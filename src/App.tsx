import GameScreen from './components/GameScreen.tsx';
import './App.css';

const debug = import.meta.env.VITE_CUBE_DEBUG === 'true';

export default function App() {
  return <GameScreen debug={debug} />;
}
