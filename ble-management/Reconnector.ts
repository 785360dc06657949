/**
 * Reconnector
 *
 * Keeps one peripheral connected: connect, poll signal strength while active,
 * and on any failure release the session and retry after an exponentially
 * growing back-off. Every suspension point races the stop signal, and every
 * transition is written to the metrics trail in causal order.
 */

import { EventEmitter } from 'events';
import { DeviceSession } from '../ble-bridge/DeviceSession';
import { SessionConfig } from '../ble-bridge/BleBridgeTypes';
import { BACKOFF, BLE_CONFIG, METRIC_EVENTS, METRIC_STATUS } from '../ble-bridge/BleBridgeConstants';
import { bleLogger } from '../ble-bridge/BleLogger';
import { IBleAdapter } from '../ble-bridge/interfaces/IBleAdapter';
import { ConnectFailedError, ConnectionLostError, NotConnectedError, describeError, errorName } from '../shared/errors';
import { MetricExtra, MetricsLogger } from '../shared/metrics';
import { clipToDeadline, nextBackoff } from '../shared/retry';
import { Scheduler, StopSignal, systemScheduler } from '../shared/StopSignal';
import { validateMetadata } from './metadata';
import {
  MonitorOutcome,
  MonitoredSession,
  ReconnectorOptions,
  ReconnectorPolicy,
  ReconnectorState,
  ReconnectorStatus,
  RunOptions,
  SessionFactory,
} from './types';

const defaultSessionFactory: SessionFactory = (config) => new DeviceSession(config);

// Turns a synchronous throw from connect() into a rejection
async function startConnect(session: MonitoredSession): Promise<boolean> {
  return session.connect();
}

type PollOutcome = 'continue' | 'ended';

export class Reconnector extends EventEmitter {
  readonly address: string;
  readonly policy: ReconnectorPolicy;
  readonly metrics: MetricsLogger | null;

  private sessionFactory: SessionFactory;
  private adapter?: IBleAdapter;
  private scheduler: Scheduler;
  private scopePayload: MetricExtra;

  // Runtime state, reset by run()
  private state: ReconnectorState = ReconnectorState.IDLE;
  private attempt = 0;
  private backoffMs: number;
  private stopSignal: StopSignal | null = null;
  private session: MonitoredSession | null = null;
  private running = false;
  private deadlineReached = false;

  constructor(address: string, options: ReconnectorOptions = {}) {
    super();
    const metadata = validateMetadata(options.metadata);
    const baseBackoffMs = Math.max(options.baseBackoffMs ?? BACKOFF.BASE_DELAY, BACKOFF.MIN_BASE_DELAY);

    this.address = address;
    this.policy = Object.freeze({
      connectTimeoutMs: Math.max(options.connectTimeoutMs ?? BLE_CONFIG.CONNECTION_TIMEOUT, BLE_CONFIG.MIN_CONNECTION_TIMEOUT),
      pollIntervalMs: Math.max(options.pollIntervalMs ?? BLE_CONFIG.POLL_INTERVAL, BLE_CONFIG.MIN_POLL_INTERVAL),
      baseBackoffMs,
      maxBackoffMs: Math.max(options.maxBackoffMs ?? BACKOFF.MAX_DELAY, baseBackoffMs),
      metadata,
      adapterId: options.adapterId,
      mtu: options.mtu,
    });
    this.scopePayload = { address, ...metadata };

    if (options.log instanceof MetricsLogger) {
      this.metrics = options.log;
    } else if (typeof options.log === 'string') {
      this.metrics = new MetricsLogger(options.log, { staticExtra: this.scopePayload });
    } else {
      this.metrics = null;
    }

    this.sessionFactory = options.sessionFactory ?? defaultSessionFactory;
    this.adapter = options.adapter;
    this.scheduler = options.scheduler ?? systemScheduler;
    this.backoffMs = this.policy.baseBackoffMs;
  }

  getStatus(): ReconnectorStatus {
    return {
      address: this.address,
      state: this.state,
      attempt: this.attempt,
      backoffMs: this.backoffMs,
      connected: this.state === ReconnectorState.ACTIVE && this.session !== null,
      running: this.running,
    };
  }

  /**
   * Ask the loop to stop at its next suspension point. Idempotent.
   */
  requestStop(): void {
    this.stopSignal?.set();
  }

  /**
   * Supervise until requestStop(), the runtime deadline, or an abort of `signal`
   */
  async run(options: RunOptions = {}): Promise<MonitorOutcome> {
    if (this.running) {
      throw new Error(`Reconnector for ${this.address} is already running`);
    }

    this.running = true;
    this.deadlineReached = false;
    this.attempt = 0;
    this.backoffMs = this.policy.baseBackoffMs;
    this.session = null;

    const stop = new StopSignal(this.scheduler);
    this.stopSignal = stop;
    const deadline =
      options.runtimeMs === undefined ? null : this.scheduler.now() + Math.max(0, options.runtimeMs);

    let cancelled = false;
    let releaseForced: () => void = () => undefined;
    const forced = new Promise<void>((resolve) => {
      releaseForced = resolve;
    });
    const onAbort = () => {
      cancelled = true;
      releaseForced();
      stop.set();
    };
    const signal = options.signal;
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.record(METRIC_EVENTS.MONITOR_START, { status: METRIC_STATUS.PENDING });
    bleLogger.info(`Monitoring ${this.address}`, { ...this.policy }, 'RECONNECT');

    try {
      await this.withScope(() => this.loop(stop, deadline, forced));
    } finally {
      signal?.removeEventListener('abort', onAbort);
      stop.set();
      this.setState(ReconnectorState.STOPPED);
      this.running = false;
      this.record(METRIC_EVENTS.MONITOR_STOP, {
        status: cancelled ? METRIC_STATUS.CANCELLED : METRIC_STATUS.OK,
        extra: { attempts: this.attempt },
      });
      bleLogger.info(`Monitor for ${this.address} stopped after ${this.attempt} attempt(s)`, undefined, 'RECONNECT');
    }

    return { status: cancelled ? 'cancelled' : 'ok', attempts: this.attempt };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // State machine
  // ───────────────────────────────────────────────────────────────────────────

  private async loop(stop: StopSignal, deadline: number | null, forced: Promise<void>): Promise<void> {
    while (!stop.isSet && !this.pastDeadline(deadline)) {
      this.attempt++;
      await this.attemptSession(stop, deadline, forced);

      if (stop.isSet || this.pastDeadline(deadline)) break;

      this.setState(ReconnectorState.BACKING_OFF);
      bleLogger.info(`Retrying ${this.address} in ${this.backoffMs}ms`, undefined, 'RECONNECT');
      const resume = await this.pause(stop, this.backoffMs, deadline);
      this.backoffMs = nextBackoff(this.backoffMs, this.policy.maxBackoffMs);
      if (!resume) break;
    }
  }

  private async attemptSession(stop: StopSignal, deadline: number | null, forced: Promise<void>): Promise<void> {
    const attempt = this.attempt;
    this.setState(ReconnectorState.CONNECTING);
    this.record(METRIC_EVENTS.CONNECT_ATTEMPT, { status: METRIC_STATUS.PENDING, extra: { attempt } });

    let session: MonitoredSession;
    try {
      session = this.sessionFactory(this.sessionConfig());
    } catch (error) {
      this.recordSessionError(error);
      return;
    }
    this.session = session;

    const connecting = startConnect(session);
    try {
      const outcome = await stop.race(connecting);
      if (outcome.stopped) {
        this.record(METRIC_EVENTS.CONNECT_ATTEMPT, { status: METRIC_STATUS.CANCELLED, extra: { attempt } });
        return;
      }
      if (!outcome.value) {
        throw new ConnectFailedError(this.address, 'session reported not connected');
      }

      this.backoffMs = this.policy.baseBackoffMs;
      this.record(METRIC_EVENTS.CONNECT_ATTEMPT, {
        status: METRIC_STATUS.OK,
        extra: { attempt, backoffMs: this.backoffMs },
      });
      await this.activePhase(session, stop, deadline);
    } catch (error) {
      this.recordSessionError(error);
    } finally {
      this.session = null;
      // Forced cancellation stops waiting on a connect or disconnect that hangs
      await Promise.race([this.releaseSession(session, connecting), forced]);
    }
  }

  private async activePhase(session: MonitoredSession, stop: StopSignal, deadline: number | null): Promise<void> {
    this.setState(ReconnectorState.ACTIVE);
    this.record(METRIC_EVENTS.SESSION_ACTIVE, { status: METRIC_STATUS.OK });

    try {
      while (!stop.isSet && !this.pastDeadline(deadline)) {
        if ((await this.pollOnce(session, stop)) === 'ended') break;
        if (!(await this.pause(stop, this.policy.pollIntervalMs, deadline))) break;
      }
    } finally {
      this.record(METRIC_EVENTS.SESSION_ACTIVE, { status: METRIC_STATUS.ENDED });
    }
  }

  private async pollOnce(session: MonitoredSession, stop: StopSignal): Promise<PollOutcome> {
    try {
      const outcome = await stop.race(session.readRssi());
      if (outcome.stopped) return 'ended';

      const rssi = outcome.value;
      this.record(METRIC_EVENTS.RSSI_SAMPLE, {
        status: rssi === null ? METRIC_STATUS.UNKNOWN : METRIC_STATUS.OK,
        value: rssi,
      });
      return 'continue';
    } catch (error) {
      if (error instanceof ConnectionLostError) {
        this.record(METRIC_EVENTS.SESSION_LOST, { status: METRIC_STATUS.ERROR, message: describeError(error) });
        bleLogger.warn(`Session lost for ${this.address}`, undefined, 'RECONNECT');
        return 'ended';
      }
      if (error instanceof NotConnectedError) {
        this.recordSessionError(error);
        return 'ended';
      }

      // Transient read failure; keep polling
      this.record(METRIC_EVENTS.RSSI_SAMPLE, { status: METRIC_STATUS.ERROR, message: describeError(error) });
      return 'continue';
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Helpers
  // ───────────────────────────────────────────────────────────────────────────

  private sessionConfig(): SessionConfig {
    return {
      address: this.address,
      adapterId: this.policy.adapterId,
      connectTimeoutMs: this.policy.connectTimeoutMs,
      mtu: this.policy.mtu,
      metrics: this.metrics ?? undefined,
      metadata: this.policy.metadata,
      adapter: this.adapter,
    };
  }

  /**
   * Disconnect once any in-flight connect has settled; never throws
   */
  private async releaseSession(session: MonitoredSession, connecting: Promise<boolean>): Promise<void> {
    try {
      await connecting;
    } catch (error) {
      bleLogger.debug(`Abandoned connect settled with: ${describeError(error)}`, undefined, 'RECONNECT');
    }

    try {
      await session.disconnect();
    } catch (error) {
      bleLogger.debug(`Session release failed for ${this.address}: ${describeError(error)}`, undefined, 'RECONNECT');
    }
  }

  private recordSessionError(error: unknown): void {
    this.record(METRIC_EVENTS.SESSION_ERROR, {
      status: METRIC_STATUS.ERROR,
      message: describeError(error),
      extra: { exception: errorName(error) },
    });
    bleLogger.warn(`Reconnector session error for ${this.address}: ${describeError(error)}`, undefined, 'RECONNECT');
  }

  /**
   * Sleep up to `durationMs`. Resolves false when woken by the stop signal or
   * when the sleep was cut to end at the deadline, whatever the clock reads on
   * wake-up (timers may fire a fraction of a millisecond early).
   */
  private async pause(stop: StopSignal, durationMs: number, deadline: number | null): Promise<boolean> {
    const now = this.scheduler.now();
    const sleepMs = clipToDeadline(durationMs, now, deadline);
    const endsAtDeadline = deadline !== null && sleepMs >= deadline - now;
    const stopped = await stop.wait(sleepMs);
    if (stopped) return false;
    if (endsAtDeadline) {
      this.deadlineReached = true;
      return false;
    }
    return true;
  }

  private pastDeadline(deadline: number | null): boolean {
    if (deadline === null) return false;
    return this.deadlineReached || this.scheduler.now() >= deadline;
  }

  private setState(state: ReconnectorState): void {
    const previous = this.state;
    if (previous === state) return;
    this.state = state;
    this.emit('stateChange', state, previous);
  }

  private withScope<T>(fn: () => Promise<T>): Promise<T> {
    return this.metrics ? this.metrics.scope(this.scopePayload, fn) : fn();
  }

  private record(
    event: string,
    options: { status: string; value?: number | null; message?: string; extra?: MetricExtra }
  ): void {
    this.metrics?.log(event, { ...options, extra: { ...this.scopePayload, ...(options.extra ?? {}) } });
  }
}
