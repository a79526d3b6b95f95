import { describe, it, expect, vi } from 'vitest';
import { CubeEngine } from './cubeEngine.ts';
import { FACE_DEFINITIONS } from './constants.ts';
import { homeOf, latticeKey, latticeOf } from './cubeModel.ts';
import { FaceRegistryError } from './faceRegistry.ts';
import { createSeededRandom } from './random.ts';
import type { MoveRecord } from '../types/cube.ts';

type Layout = Map<string, string>;   // home -> current lattice position

interface Point {
  x: number;
  y: number;
  z: number;
}

const keyOf = (p: Point) => `${p.x},${p.y},${p.z}`;

/** Where each cubie sits now, keyed by where it started */
function layoutOf(engine: CubeEngine): Layout {
  const layout: Layout = new Map();
  for (const cubie of engine.cubies) {
    const home = homeOf(cubie);
    if (!home) throw new Error(`${cubie.name} has no home`);
    layout.set(latticeKey(home), latticeKey(latticeOf(cubie)));
  }
  return layout;
}

function solvedPositions(): Map<string, Point> {
  const positions = new Map<string, Point>();
  for (const x of [-1, 0, 1]) {
    for (const y of [-1, 0, 1]) {
      for (const z of [-1, 0, 1]) {
        if (x === 0 && y === 0 && z === 0) continue;
        positions.set(keyOf({ x, y, z }), { x, y, z });
      }
    }
  }
  return positions;
}

/** Integer quarter-turn model of the same key sequence */
function expectedLayout(keys: readonly string[]): Layout {
  const positions = solvedPositions();
  for (const key of keys) {
    const face = FACE_DEFINITIONS.find((f) => f.key === key.toLowerCase());
    if (!face) throw new Error(`no face for ${key}`);
    const direction = key === key.toLowerCase() ? 1 : -1;
    const s = Math.sign(face.rotation[face.axis] * direction);
    for (const [home, p] of positions) {
      if (p[face.axis] !== face.layer) continue;
      let next: Point;
      if (face.axis === 'y') next = { x: s * p.z, y: p.y, z: -s * p.x };
      else if (face.axis === 'x') next = { x: p.x, y: -s * p.z, z: s * p.y };
      else next = { x: -s * p.y, y: s * p.x, z: p.z };
      positions.set(home, next);
    }
  }
  const layout: Layout = new Map();
  for (const [home, p] of positions) layout.set(home, keyOf(p));
  return layout;
}

describe('CubeEngine', () => {
  it('builds 26 cubies and nine faces', () => {
    const engine = new CubeEngine();

    expect(engine.cubies).toHaveLength(26);
    expect(engine.registry.faces).toHaveLength(9);
    expect(engine.phase).toBe('idle');
    expect(engine.animated).toBe(true);
  });

  it('turns top then bottom to the same layout as a quarter-turn model', () => {
    const engine = new CubeEngine();

    expect(engine.attempt('t')).toBe('rotated');
    engine.tick(280);
    expect(engine.phase).toBe('idle');
    expect(engine.attempt('d')).toBe('rotated');
    engine.tick(280);

    expect(layoutOf(engine)).toEqual(expectedLayout(['t', 'd']));
    expect(engine.cubies.every((c) => c.parent === engine.root)).toBe(true);
  });

  it('turns the opposite way for the uppercase key', () => {
    const lower = new CubeEngine();
    const upper = new CubeEngine();

    lower.attempt('f');
    lower.tick(280);
    upper.attempt('F');
    upper.tick(280);

    expect(layoutOf(lower)).toEqual(expectedLayout(['f']));
    expect(layoutOf(upper)).toEqual(expectedLayout(['F']));
    expect(layoutOf(upper)).not.toEqual(layoutOf(lower));

    upper.attempt('f');
    upper.tick(280);
    expect(layoutOf(upper)).toEqual(expectedLayout([]));
  });

  it('turns the center slices with eight cubies', () => {
    const onMove = vi.fn<(move: MoveRecord) => void>();
    const engine = new CubeEngine({ listener: { onMove } });

    for (const key of ['v', 'h', 'C']) {
      expect(engine.attempt(key)).toBe('rotated');
      engine.tick(280);
    }

    expect(layoutOf(engine)).toEqual(expectedLayout(['v', 'h', 'C']));
    expect(onMove.mock.calls.map(([move]) => move.cubies)).toEqual([8, 8, 8]);
  });

  it('drops a key pressed while a turn is animating', () => {
    const engine = new CubeEngine();

    expect(engine.attempt('t')).toBe('rotated');
    expect(engine.phase).toBe('rotating');
    expect(engine.attempt('T')).toBe('dropped');

    engine.tick(280);
    expect(engine.phase).toBe('idle');
    expect(layoutOf(engine)).toEqual(expectedLayout(['t']));
  });

  it('plays the same seeded shuffle on two engines', () => {
    const a = new CubeEngine({ random: createSeededRandom(42) });
    const b = new CubeEngine({ random: createSeededRandom(42) });

    expect(a.shuffle()).toBe(true);
    expect(b.shuffle()).toBe(true);
    expect(a.animated).toBe(false);
    a.tick(20_000);
    b.tick(20_000);

    expect(a.shufflePlan).toEqual(b.shufflePlan);
    expect(layoutOf(a)).toEqual(layoutOf(b));
    expect(layoutOf(a)).toEqual(expectedLayout(a.shufflePlan));
    expect(a.isShuffling).toBe(false);
    expect(a.animated).toBe(true);
    expect(a.phase).toBe('idle');
  });

  it('runs one shuffle at a time and gates manual keys while it runs', () => {
    const onShuffleStart = vi.fn();
    const onShuffleFinish = vi.fn();
    const engine = new CubeEngine({
      random: createSeededRandom(7),
      listener: { onShuffleStart, onShuffleFinish },
    });

    expect(engine.attempt(' ')).toBe('shuffle');
    expect(engine.shuffle()).toBe(false);
    expect(engine.attempt('t')).toBe('dropped');
    expect(engine.attempt(' ')).toBe('dropped');

    const plan = engine.shufflePlan;
    expect(plan.length).toBeGreaterThanOrEqual(30);
    expect(plan.length).toBeLessThanOrEqual(60);

    engine.tick(20_000);
    expect(onShuffleStart).toHaveBeenCalledTimes(1);
    expect(onShuffleFinish).toHaveBeenCalledTimes(1);
    expect(engine.attempt('t')).toBe('rotated');
  });

  it('refuses to shuffle while a turn is still animating', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const engine = new CubeEngine({ rotationMs: 1500, random: createSeededRandom(8) });

    expect(engine.attempt('t')).toBe('rotated');
    expect(engine.shuffle()).toBe(false);
    expect(engine.isShuffling).toBe(false);

    engine.tick(1500);
    expect(engine.shuffle()).toBe(true);
    engine.tick(20_000);

    expect(warn).not.toHaveBeenCalled();
    expect(layoutOf(engine)).toEqual(expectedLayout(['t', ...engine.shufflePlan]));
    warn.mockRestore();
  });

  it('reaches the same layout with the perturbation refresh', () => {
    const keys = ['r', 'b', 'L', 'c', 'd'];
    const engine = new CubeEngine({ refresh: 'perturb' });

    for (const key of keys) {
      expect(engine.attempt(key)).toBe('rotated');
      engine.tick(280);
    }

    expect(layoutOf(engine)).toEqual(expectedLayout(keys));
  });

  it('moves the camera without touching the cube', () => {
    const onCamera = vi.fn();
    const engine = new CubeEngine({ listener: { onCamera } });

    expect(engine.attempt('5')).toBe('camera');
    expect(engine.camera.current).toEqual({ yaw: 0, pitch: 90, roll: 0 });
    expect(onCamera).toHaveBeenCalledWith({ label: 'Top', orientation: { yaw: 0, pitch: 90, roll: 0 } });
    expect(layoutOf(engine)).toEqual(expectedLayout([]));
  });

  it('rejects a face table with a shared key', () => {
    const definitions = FACE_DEFINITIONS.map((f) => (f.id === 'LEFT' ? { ...f, key: 't' } : f));

    expect(() => new CubeEngine({ definitions })).toThrow(FaceRegistryError);
  });
});
