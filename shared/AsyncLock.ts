/**
 * Async Lock
 *
 * Serializes async critical sections in FIFO order. Each queued task runs only
 * after the previous one has settled, so concurrent connect/disconnect calls on a
 * session (or concurrent async metric writes) never interleave.
 */

interface QueuedTask {
  run: () => Promise<void>;
}

export interface AsyncLockStatus {
  queueLength: number;
  isLocked: boolean;
}

export class AsyncLock {
  private queue: QueuedTask[] = [];
  private isProcessing = false;

  /**
   * Run a task once every earlier task has settled. The task's result (or
   * failure) is returned to the caller; it never affects later tasks.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
      });

      if (!this.isProcessing) {
        void this.processNext();
      }
    });
  }

  private async processNext(): Promise<void> {
    const next = this.queue.shift();
    if (!next) {
      this.isProcessing = false;
      return;
    }

    this.isProcessing = true;
    await next.run();
    await this.processNext();
  }

  get isLocked(): boolean {
    return this.isProcessing;
  }

  getStatus(): AsyncLockStatus {
    return {
      queueLength: this.queue.length,
      isLocked: this.isProcessing,
    };
  }
}
