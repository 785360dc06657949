/**
 * Device Session
 *
 * Owns one link to one peripheral. connect/disconnect are serialized through a
 * session lock and are idempotent. Operations on a session that was never
 * connected fail with NotConnectedError; operations on a link that dropped fail
 * with ConnectionLostError.
 */

import { EventEmitter } from 'events';
import { IBleAdapter, IBleLink } from './interfaces/IBleAdapter';
import { Metadata, NotifyCallback, SessionConfig, SessionState } from './BleBridgeTypes';
import { BLE_CONFIG, METRIC_EVENTS, METRIC_STATUS } from './BleBridgeConstants';
import { bleLogger } from './BleLogger';
import { getDefaultAdapter } from './BleAdapterFactory';
import { AsyncLock } from '../shared/AsyncLock';
import {
  CapabilityUnsupportedError,
  ConnectFailedError,
  ConnectionLostError,
  NotConnectedError,
  SupervisorError,
  describeError,
  errorName,
} from '../shared/errors';
import type { LogOptions, MetricsLogger, MetricsScope } from '../shared/metrics';

export class DeviceSession extends EventEmitter {
  readonly address: string;
  readonly adapterId?: string;
  readonly connectTimeoutMs: number;
  readonly mtu?: number;
  readonly metadata: Metadata;

  private adapter: IBleAdapter;
  private metrics: MetricsLogger | null;
  private link: IBleLink | null = null;
  private _state: SessionState = SessionState.DISCONNECTED;
  private lock = new AsyncLock();
  private metricsScope: MetricsScope | null = null;
  private subscriptions: Map<string, NotifyCallback> = new Map();
  private removeDisconnectListener: (() => void) | null = null;
  private negotiatedMtu: number | null = null;

  constructor(config: SessionConfig) {
    super();
    this.address = config.address;
    this.adapterId = config.adapterId;
    this.connectTimeoutMs = Math.max(
      config.connectTimeoutMs ?? BLE_CONFIG.CONNECTION_TIMEOUT,
      BLE_CONFIG.MIN_CONNECTION_TIMEOUT
    );
    this.mtu = config.mtu;
    this.metadata = { ...(config.metadata ?? {}) };
    this.metrics = config.metrics ?? null;
    this.adapter = config.adapter ?? getDefaultAdapter();
  }

  get state(): SessionState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === SessionState.CONNECTED && (this.link?.isConnected() ?? false);
  }

  /** Negotiated transfer unit, when the link supports and reported one */
  get transferUnit(): number | null {
    return this.negotiatedMtu;
  }

  get subscribedAttributes(): string[] {
    return Array.from(this.subscriptions.keys());
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Open the link. Resolves true when connected (immediately if already);
   * rejects with ConnectFailedError otherwise. Never retries.
   */
  connect(): Promise<boolean> {
    return this.lock.run(async () => {
      if (this.isConnected) {
        return true;
      }

      await this.discardLink();
      this.openMetricsScope();
      this.setState(SessionState.CONNECTING);
      bleLogger.logConnection(this.address, 'CONNECT', { timeoutMs: this.connectTimeoutMs });

      const link = this.adapter.createLink();
      let opened: boolean;
      try {
        opened = await link.open(this.address, this.adapterId, this.connectTimeoutMs);
      } catch (error) {
        this.record(METRIC_EVENTS.CONNECT, { status: METRIC_STATUS.ERROR, message: describeError(error) });
        bleLogger.logConnectionError(this.address, 'CONNECT', error);
        await this.abandonConnect(link);
        throw new ConnectFailedError(this.address, describeError(error), { cause: error });
      }

      if (!opened) {
        this.record(METRIC_EVENTS.CONNECT, { status: METRIC_STATUS.FAILED });
        bleLogger.logConnectionError(this.address, 'CONNECT', 'link did not come up');
        await this.abandonConnect(link);
        throw new ConnectFailedError(this.address, 'link did not come up');
      }

      this.link = link;
      this.removeDisconnectListener = link.onDisconnect(() => this.markLost());
      this.setState(SessionState.CONNECTED);
      this.record(METRIC_EVENTS.CONNECT, { status: METRIC_STATUS.OK });
      bleLogger.logConnection(this.address, 'CONNECTED');

      await this.negotiateTransferUnit(link);
      return true;
    });
  }

  /**
   * Close the link. Never throws; always clears subscriptions and the metrics scope.
   */
  disconnect(): Promise<void> {
    return this.lock.run(async () => {
      const link = this.link;
      if (!link) {
        this.subscriptions.clear();
        this.setState(SessionState.DISCONNECTED);
        this.closeMetricsScope();
        return;
      }

      if (link.isConnected()) {
        for (const id of Array.from(this.subscriptions.keys())) {
          try {
            await link.unsubscribeNotifications(id);
          } catch (error) {
            bleLogger.debug(`Unsubscribe ${id} during disconnect failed: ${describeError(error)}`, undefined, 'SESSION');
          }
        }
      }

      this.removeDisconnectListener?.();
      this.removeDisconnectListener = null;

      try {
        await link.close();
        this.record(METRIC_EVENTS.DISCONNECT, { status: METRIC_STATUS.OK });
        bleLogger.logConnection(this.address, 'DISCONNECTED');
      } catch (error) {
        this.record(METRIC_EVENTS.DISCONNECT, { status: METRIC_STATUS.ERROR, message: describeError(error) });
        bleLogger.warn(`Disconnect encountered error for ${this.address}: ${describeError(error)}`, undefined, 'SESSION');
      } finally {
        this.link = null;
        this.negotiatedMtu = null;
        this.subscriptions.clear();
        this.setState(SessionState.DISCONNECTED);
        this.closeMetricsScope();
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Current signal strength, or null when the link cannot report one or a read
   * failed while the link stayed up
   */
  async readRssi(): Promise<number | null> {
    const link = this.requireLink('readRssi');
    if (!link.capabilities.signalStrength) {
      return null;
    }

    let rssi: number | null;
    try {
      rssi = await link.readSignalStrength();
    } catch (error) {
      this.throwIfLost(link, error);
      bleLogger.debug(`Signal read failed for ${this.address}: ${describeError(error)}`, undefined, 'SESSION');
      return null;
    }

    if (rssi !== null) {
      this.record(METRIC_EVENTS.RSSI, { status: METRIC_STATUS.OK, value: rssi });
    }
    return rssi;
  }

  async readAttribute(id: string): Promise<Buffer> {
    const link = this.requireLink('readAttribute');
    const data = await this.guard(link, () => link.readAttribute(id));
    this.record(METRIC_EVENTS.READ_ATTRIBUTE, {
      status: METRIC_STATUS.OK,
      extra: { attribute: id, length: data.length },
    });
    return data;
  }

  async writeAttribute(id: string, data: Buffer, ackRequired: boolean = false): Promise<void> {
    const link = this.requireLink('writeAttribute');
    await this.guard(link, () => link.writeAttribute(id, data, ackRequired));
    this.record(METRIC_EVENTS.WRITE_ATTRIBUTE, {
      status: METRIC_STATUS.OK,
      extra: { attribute: id, length: data.length, ackRequired },
    });
  }

  async startNotify(id: string, callback: NotifyCallback): Promise<void> {
    const link = this.requireLink('startNotify');
    if (!link.capabilities.notifications) {
      throw new CapabilityUnsupportedError('notifications');
    }

    await this.guard(link, () => link.subscribeNotifications(id, (data) => this.deliverNotification(id, callback, data)));
    this.subscriptions.set(id, callback);
    this.record(METRIC_EVENTS.NOTIFY_START, { status: METRIC_STATUS.OK, extra: { attribute: id } });
  }

  async stopNotify(id: string): Promise<void> {
    const link = this.requireLink('stopNotify');
    if (!this.subscriptions.has(id)) return;

    try {
      await link.unsubscribeNotifications(id);
    } catch (error) {
      bleLogger.debug(`Unsubscribe ${id} failed: ${describeError(error)}`, undefined, 'SESSION');
    }
    this.subscriptions.delete(id);
    this.record(METRIC_EVENTS.NOTIFY_STOP, { status: METRIC_STATUS.OK, extra: { attribute: id } });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ───────────────────────────────────────────────────────────────────────────

  private setState(state: SessionState): void {
    const previous = this._state;
    if (previous === state) return;
    this._state = state;
    this.emit('stateChange', state, previous);
  }

  private requireLink(operation: string): IBleLink {
    if (this._state === SessionState.LOST) {
      throw new ConnectionLostError(this.address);
    }
    if (this._state !== SessionState.CONNECTED || !this.link) {
      throw new NotConnectedError(this.address, operation);
    }
    if (!this.link.isConnected()) {
      this.markLost();
      throw new ConnectionLostError(this.address);
    }
    return this.link;
  }

  private async guard<T>(link: IBleLink, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.throwIfLost(link, error);
      throw error;
    }
  }

  // A failure on a link that is no longer up is a loss, not noise
  private throwIfLost(link: IBleLink, error: unknown): void {
    if (error instanceof SupervisorError) throw error;
    if (this._state === SessionState.CONNECTED && this.link === link && !link.isConnected()) {
      this.markLost();
    }
    if (this._state === SessionState.LOST) {
      throw new ConnectionLostError(this.address, { cause: error });
    }
  }

  private markLost(): void {
    if (this._state !== SessionState.CONNECTED) return;

    this.setState(SessionState.LOST);
    this.record(METRIC_EVENTS.CONNECTION_LOST, { status: METRIC_STATUS.ERROR });
    bleLogger.warn(`Connection to ${this.address} dropped`, undefined, 'SESSION');
    this.emit('lost', this.address);
  }

  private async negotiateTransferUnit(link: IBleLink): Promise<void> {
    if (this.mtu === undefined || !link.capabilities.transferUnit) return;

    try {
      const negotiated = await link.requestPreferredTransferUnit(this.mtu);
      this.negotiatedMtu = negotiated;
      this.record(METRIC_EVENTS.MTU, { status: METRIC_STATUS.OK, value: negotiated ?? this.mtu });
    } catch (error) {
      this.record(METRIC_EVENTS.MTU, { status: METRIC_STATUS.ERROR, message: describeError(error) });
      bleLogger.debug(`Transfer unit request failed for ${this.address}: ${describeError(error)}`, undefined, 'SESSION');
    }
  }

  private deliverNotification(id: string, callback: NotifyCallback, data: Buffer): void {
    const report = (error: unknown) => {
      this.record(METRIC_EVENTS.NOTIFY_CALLBACK, {
        status: METRIC_STATUS.ERROR,
        message: describeError(error),
        extra: { attribute: id, exception: errorName(error) },
      });
      bleLogger.error(`Notification callback raised for ${id}: ${describeError(error)}`, undefined, 'SESSION');
    };

    try {
      void Promise.resolve(callback(data)).catch(report);
    } catch (error) {
      report(error);
    }
  }

  private async abandonConnect(link: IBleLink): Promise<void> {
    try {
      await link.close();
    } catch (error) {
      bleLogger.debug(`Closing failed link for ${this.address} failed: ${describeError(error)}`, undefined, 'SESSION');
    }
    this.setState(SessionState.DISCONNECTED);
    this.closeMetricsScope();
  }

  // Release a link left behind by an earlier loss before reconnecting
  private async discardLink(): Promise<void> {
    const link = this.link;
    if (!link) return;

    this.removeDisconnectListener?.();
    this.removeDisconnectListener = null;
    this.link = null;
    this.subscriptions.clear();
    try {
      await link.close();
    } catch (error) {
      bleLogger.debug(`Closing stale link for ${this.address} failed: ${describeError(error)}`, undefined, 'SESSION');
    }
  }

  private openMetricsScope(): void {
    if (!this.metrics || this.metricsScope) return;
    this.metricsScope = this.metrics.openScope({ address: this.address, ...this.metadata });
  }

  private closeMetricsScope(): void {
    this.metricsScope?.close();
    this.metricsScope = null;
  }

  private record(event: string, options: LogOptions): void {
    this.metricsScope?.log(event, options);
  }
}
