import { useEffect, useRef } from 'react';

/**
 * Forward single-character key presses (letters, digits, space) to `onKey`.
 * Named keys such as Shift or ArrowUp are ignored.
 */
export function useKeystrokes(onKey: (key: string) => void, enabled = true) {
  const handlerRef = useRef(onKey);
  handlerRef.current = onKey;

  useEffect(() => {
    if (!enabled) return;

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.repeat || e.ctrlKey || e.metaKey || e.altKey) return;
      if (e.key.length !== 1) return;
      if (e.key === ' ') e.preventDefault(); // no page scroll
      handlerRef.current(e.key);
    };

    window.addEventListener('keydown', onKeyDown);
    return () => window.removeEventListener('keydown', onKeyDown);
  }, [enabled]);
}
