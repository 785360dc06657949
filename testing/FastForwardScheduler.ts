/**
 * Fast-Forward Scheduler
 * Virtual clock for tests. Once pending promise work has drained, the earliest
 * timer fires and the clock jumps to its due time, so back-offs and scan windows
 * complete without real waiting.
 */

import type { Scheduler } from '../shared/StopSignal';

interface PendingTimer {
  seq: number;
  dueAt: number;
  callback: () => void;
}

export class FastForwardScheduler implements Scheduler {
  /** Every delay passed to schedule(), in call order */
  readonly delays: number[] = [];

  private current = 0;
  private seq = 0;
  private timers: PendingTimer[] = [];
  private pumpQueued = false;

  /**
   * @param earlyByMs fire every timer this much before its due time, as a
   * coarse real clock can
   */
  constructor(startAt: number = 0, private readonly earlyByMs: number = 0) {
    this.current = startAt;
  }

  now(): number {
    return this.current;
  }

  schedule(callback: () => void, delayMs: number): () => void {
    const timer: PendingTimer = { seq: this.seq++, dueAt: this.current + Math.max(0, delayMs), callback };
    this.delays.push(delayMs);
    this.timers.push(timer);
    this.queuePump();

    return () => {
      this.timers = this.timers.filter((candidate) => candidate !== timer);
    };
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  private queuePump(): void {
    if (this.pumpQueued) return;
    this.pumpQueued = true;
    setImmediate(() => {
      this.pumpQueued = false;
      this.fireNext();
    });
  }

  private fireNext(): void {
    if (this.timers.length === 0) return;

    this.timers.sort((a, b) => a.dueAt - b.dueAt || a.seq - b.seq);
    const [next, ...rest] = this.timers;
    this.timers = rest;
    this.current = Math.max(this.current, next.dueAt - this.earlyByMs);
    next.callback();

    if (this.timers.length > 0) {
      this.queuePump();
    }
  }
}
