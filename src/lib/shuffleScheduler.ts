import type { AttemptResult, ShuffleState } from '../types/cube.ts';
import {
  SHUFFLE_LEAD_IN_MS,
  SHUFFLE_MAX_MOVES,
  SHUFFLE_MIN_MOVES,
  SHUFFLE_STEP_MS,
} from './constants.ts';
import type { AnimationDriver } from './animationDriver.ts';
import { choices, randomInt, type RandomSource } from './random.ts';

/** What the scheduler drives: the dispatcher plus the executor's animation switch */
export interface ShuffleTarget {
  play: (key: string) => AttemptResult;
  setAnimated: (animated: boolean) => void;
}

export interface ShuffleSchedulerOptions {
  driver: AnimationDriver;
  target: ShuffleTarget;
  alphabet: readonly string[];
  random?: RandomSource;
  minMoves?: number;
  maxMoves?: number;
  leadInMs?: number;
  stepMs?: number;
  onStart?: (keys: readonly string[]) => void;
  onFinish?: (keys: readonly string[]) => void;
}

/**
 * Plays a random move sequence with animation off, one move per step.
 * Only one sequence runs at a time and a running sequence cannot be aborted.
 */
export class ShuffleScheduler {
  private state: ShuffleState = 'idle';
  private plan: string[] = [];
  private readonly random: RandomSource;
  private readonly minMoves: number;
  private readonly maxMoves: number;
  private readonly leadInMs: number;
  private readonly stepMs: number;

  constructor(private readonly options: ShuffleSchedulerOptions) {
    this.random = options.random ?? Math.random;
    this.minMoves = options.minMoves ?? SHUFFLE_MIN_MOVES;
    this.maxMoves = options.maxMoves ?? SHUFFLE_MAX_MOVES;
    this.leadInMs = options.leadInMs ?? SHUFFLE_LEAD_IN_MS;
    this.stepMs = options.stepMs ?? SHUFFLE_STEP_MS;
  }

  get isActive(): boolean {
    return this.state === 'running';
  }

  /** Keys of the running (or last) sequence */
  get current(): readonly string[] {
    return this.plan;
  }

  /** Returns false when a sequence is already running */
  start(): boolean {
    if (this.state === 'running') return false;

    const count = randomInt(this.random, this.minMoves, this.maxMoves);
    const keys = choices(this.random, this.options.alphabet, count);

    this.state = 'running';
    this.plan = keys;
    this.options.target.setAnimated(false);
    this.options.onStart?.(keys);

    this.options.driver.after(this.leadInMs, () => this.step(keys, 0));
    return true;
  }

  private step(keys: readonly string[], index: number): void {
    if (index >= keys.length) {
      this.finish(keys);
      return;
    }
    const result = this.options.target.play(keys[index]);
    if (result !== 'rotated') {
      console.warn(`Shuffle move '${keys[index]}' (${index + 1}/${keys.length}) did not rotate: ${result}`);
    }
    this.options.driver.after(this.stepMs, () => this.step(keys, index + 1));
  }

  private finish(keys: readonly string[]): void {
    this.options.target.setAnimated(true);
    this.state = 'idle';
    this.options.onFinish?.(keys);
  }
}
