/**
 * Monitor Handle
 * Explicit ownership of a running Reconnector. Whoever starts a monitor keeps
 * the handle and passes it to whatever needs to query or stop it.
 */

import { v4 as uuidv4 } from 'uuid';
import { bleLogger } from '../ble-bridge/BleLogger';
import { describeError } from '../shared/errors';
import { Scheduler, systemScheduler } from '../shared/StopSignal';
import { Reconnector } from './Reconnector';
import { MonitorOutcome, ReconnectorOptions, ReconnectorStatus } from './types';

export interface StartMonitorOptions extends ReconnectorOptions {
  runtimeMs?: number;
}

export class MonitorHandle {
  readonly id: string = uuidv4();
  readonly done: Promise<MonitorOutcome>;

  private abortController = new AbortController();

  constructor(private readonly reconnector: Reconnector, private readonly scheduler: Scheduler, runtimeMs?: number) {
    this.done = reconnector.run({ runtimeMs, signal: this.abortController.signal });
    void this.done.catch((error: unknown) => {
      bleLogger.error(`Monitor ${this.id} for ${reconnector.address} failed: ${describeError(error)}`, undefined, 'MONITOR');
    });
  }

  get address(): string {
    return this.reconnector.address;
  }

  status(): ReconnectorStatus {
    return this.reconnector.getStatus();
  }

  /**
   * Cooperative stop; resolves once cleanup and the final record are done
   */
  stop(): Promise<MonitorOutcome> {
    this.reconnector.requestStop();
    return this.done;
  }

  /**
   * Request a stop, then force cancellation if the monitor has not finished
   * within `graceMs`
   */
  async cancel(graceMs: number = 0): Promise<MonitorOutcome> {
    this.reconnector.requestStop();
    if (graceMs <= 0) {
      this.abortController.abort();
      return this.done;
    }

    const cancelTimer = this.scheduler.schedule(() => this.abortController.abort(), graceMs);
    try {
      return await this.done;
    } finally {
      cancelTimer();
    }
  }
}

/**
 * Construct a Reconnector for `address`, start it, and hand back its handle
 */
export function startMonitor(address: string, options: StartMonitorOptions = {}): MonitorHandle {
  const { runtimeMs, ...reconnectorOptions } = options;
  const reconnector = new Reconnector(address, reconnectorOptions);
  const handle = new MonitorHandle(reconnector, options.scheduler ?? systemScheduler, runtimeMs);
  bleLogger.info(`Started monitor ${handle.id} for ${address}`, undefined, 'MONITOR');
  return handle;
}
