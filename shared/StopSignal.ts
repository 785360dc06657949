/**
 * Stop Signal & Scheduler
 * Cooperative cancellation primitive for the supervisor's suspension points
 */

// ─────────────────────────────────────────────────────────────────────────────
// Scheduler
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Clock and timer source. `now()` is monotonic milliseconds; `schedule()`
 * returns a function that cancels the pending callback.
 */
export interface Scheduler {
  now(): number;
  schedule(callback: () => void, delayMs: number): () => void;
}

export const systemScheduler: Scheduler = {
  now: () => performance.now(),
  schedule: (callback, delayMs) => {
    const timer = setTimeout(callback, delayMs);
    return () => clearTimeout(timer);
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Stop Signal
// ─────────────────────────────────────────────────────────────────────────────

export type RaceOutcome<T> = { stopped: true } | { stopped: false; value: T };

export class StopSignal {
  private stopped = false;
  private listeners: Set<() => void> = new Set();

  constructor(private readonly scheduler: Scheduler = systemScheduler) {}

  get isSet(): boolean {
    return this.stopped;
  }

  /**
   * Set the signal. Wakes every pending wait/race; later calls are no-ops.
   */
  set(): void {
    if (this.stopped) return;
    this.stopped = true;

    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener();
    }
  }

  /**
   * Resolves once the signal is set.
   */
  whenSet(): Promise<void> {
    if (this.stopped) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.listeners.add(resolve);
    });
  }

  /**
   * Sleep for `durationMs`, waking early if the signal is set.
   * Resolves true when woken by the signal.
   */
  wait(durationMs: number): Promise<boolean> {
    if (this.stopped) return Promise.resolve(true);
    if (durationMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const onStop = () => {
        cancelTimer();
        resolve(true);
      };
      const cancelTimer = this.scheduler.schedule(() => {
        this.listeners.delete(onStop);
        resolve(false);
      }, durationMs);
      this.listeners.add(onStop);
    });
  }

  /**
   * Wait for `promise` unless the signal is set first. A promise abandoned this
   * way keeps running; its rejection is observed so it never goes unhandled.
   */
  race<T>(promise: Promise<T>): Promise<RaceOutcome<T>> {
    if (this.stopped) {
      void promise.catch(() => undefined);
      return Promise.resolve({ stopped: true });
    }

    return new Promise<RaceOutcome<T>>((resolve, reject) => {
      const onStop = () => {
        void promise.catch(() => undefined);
        resolve({ stopped: true });
      };
      this.listeners.add(onStop);

      void promise.then(
        (value) => {
          this.listeners.delete(onStop);
          resolve({ stopped: false, value });
        },
        (error: unknown) => {
          this.listeners.delete(onStop);
          reject(error);
        }
      );
    });
  }
}
