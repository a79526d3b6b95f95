interface Task {
  seq: number;
  start: number;
  due: number;
  onUpdate?: (progress: number) => void;
  onComplete: () => void;
}

/**
 * Frame-advanced timeline for pivot tweens and timed actions.
 *
 * The app advances it from `useFrame`; tests call `tick` directly. Tasks fire
 * in due-time order (ties in insertion order). A task scheduled from a firing
 * callback starts at that task's due time, so a chain of `after` calls keeps
 * its pacing whatever the frame size.
 */
export class AnimationDriver {
  private tasks: Task[] = [];
  private seq = 0;
  private clock = 0;

  get pending(): number {
    return this.tasks.length;
  }

  /** Tween over `durationMs`; `onUpdate` receives linear progress in [0, 1] */
  schedule(durationMs: number, onUpdate: (progress: number) => void, onComplete: () => void): void {
    this.push(durationMs, onComplete, onUpdate);
  }

  after(delayMs: number, action: () => void): void {
    this.push(delayMs, action);
  }

  tick(deltaMs: number): void {
    const target = this.clock + Math.max(0, deltaMs);

    let next = this.nextDue(target);
    while (next) {
      this.tasks = this.tasks.filter((t) => t !== next);
      this.clock = next.due;
      next.onUpdate?.(1);
      next.onComplete();
      next = this.nextDue(target);
    }

    this.clock = target;
    for (const task of this.tasks) {
      if (!task.onUpdate) continue;
      const span = task.due - task.start;
      task.onUpdate(span > 0 ? Math.min(1, (this.clock - task.start) / span) : 1);
    }
  }

  private push(durationMs: number, onComplete: () => void, onUpdate?: (progress: number) => void): void {
    const start = this.clock;
    this.tasks.push({ seq: this.seq++, start, due: start + Math.max(0, durationMs), onUpdate, onComplete });
  }

  private nextDue(target: number): Task | undefined {
    let best: Task | undefined;
    for (const task of this.tasks) {
      if (task.due > target) continue;
      if (!best || task.due < best.due || (task.due === best.due && task.seq < best.seq)) best = task;
    }
    return best;
  }
}
