type ArmedTimer = {
  roundId: string;
  handle: ReturnType<typeof setTimeout>;
};

/**
 * Serializes every mutating task for one session and owns its question timer.
 * Tasks run strictly in enqueue order; a failing task rejects its own promise
 * without stalling the tasks queued behind it.
 */
export class SessionWorker {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private timer: ArmedTimer | null = null;

  constructor(public readonly pin: string) {}

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      },
    );
    return result;
  }

  isIdle() {
    return this.pending === 0;
  }

  /** Replaces any armed timer; `onExpire` should enqueue the close through `run`. */
  armTimer(roundId: string, delayMs: number, onExpire: (roundId: string) => void) {
    this.cancelTimer();
    const handle = setTimeout(() => {
      if (this.timer?.roundId === roundId) {
        this.timer = null;
      }
      onExpire(roundId);
    }, Math.max(0, delayMs));
    this.timer = { roundId, handle };
  }

  armedRoundId() {
    return this.timer?.roundId ?? null;
  }

  cancelTimer() {
    if (!this.timer) return;
    clearTimeout(this.timer.handle);
    this.timer = null;
  }

  dispose() {
    this.cancelTimer();
  }
}
