/**
 * Simulated Transport
 * In-process adapter with scriptable peripherals, advertisements and link faults.
 * Used when no radio is present (BLE_TRANSPORT=simulated) and by the test suite.
 */

import {
  AdvertisementDescriptor,
  IBleAdapter,
  IBleLink,
  LinkCapabilities,
  NotificationHandler,
  ObservationCallback,
  ObservationHints,
  ObservationSubscription,
  PeripheralDescriptor,
} from '../interfaces/IBleAdapter';
import { bleLogger } from '../BleLogger';
import { normalizeAddress, normalizeServiceId } from '../identifiers';
import { AdapterUnavailableError, CapabilityUnsupportedError } from '../../shared/errors';
import { Scheduler, systemScheduler } from '../../shared/StopSignal';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SimulatedPeripheralOptions {
  address: string;
  name?: string;
  /** null makes signal reads return no value */
  rssi?: number | null;
  serviceIds?: string[];
  attributes?: Record<string, Buffer>;
  capabilities?: Partial<LinkCapabilities>;
  maxTransferUnit?: number;
}

export interface ScriptedAdvertisement {
  peripheral: PeripheralDescriptor;
  advertisement?: AdvertisementDescriptor;
  /** Delay from the start of the observation */
  delayMs?: number;
}

export interface SimulatedTransportOptions {
  available?: boolean;
  scheduler?: Scheduler;
}

export interface RecordedWrite {
  id: string;
  data: Buffer;
  ackRequired: boolean;
}

const DEFAULT_CAPABILITIES: LinkCapabilities = {
  signalStrength: true,
  transferUnit: true,
  notifications: true,
};

// ─────────────────────────────────────────────────────────────────────────────
// Simulated Peripheral
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Device-side state shared by every link opened to the same address.
 * Fault fields are public so tests can flip them between operations.
 */
export class SimulatedPeripheral {
  readonly address: string;
  readonly name?: string;
  readonly serviceIds: string[];
  readonly capabilities: LinkCapabilities;
  readonly maxTransferUnit: number;
  readonly writes: RecordedWrite[] = [];

  rssi: number | null;
  connected = false;
  openCount = 0;
  closeCount = 0;

  /** Number of upcoming opens that throw */
  failOpens = 0;
  /** Number of upcoming opens that resolve false */
  refuseOpens = 0;
  failSignalReads = false;
  failTransferUnit = false;
  failClose = false;

  private attributes: Map<string, Buffer> = new Map();
  private notificationHandlers: Map<string, NotificationHandler> = new Map();
  private disconnectListeners: Set<() => void> = new Set();

  constructor(options: SimulatedPeripheralOptions) {
    this.address = options.address;
    this.name = options.name;
    this.rssi = options.rssi === undefined ? -60 : options.rssi;
    this.serviceIds = options.serviceIds ?? [];
    this.capabilities = { ...DEFAULT_CAPABILITIES, ...(options.capabilities ?? {}) };
    this.maxTransferUnit = options.maxTransferUnit ?? 247;
    for (const [id, value] of Object.entries(options.attributes ?? {})) {
      this.attributes.set(normalizeServiceId(id), value);
    }
  }

  get subscribedIds(): string[] {
    return Array.from(this.notificationHandlers.keys());
  }

  getAttribute(id: string): Buffer | undefined {
    return this.attributes.get(normalizeServiceId(id));
  }

  setAttribute(id: string, value: Buffer): void {
    this.attributes.set(normalizeServiceId(id), value);
  }

  /** Deliver an inbound notification; returns false when nothing is subscribed */
  notify(id: string, data: Buffer): boolean {
    const handler = this.notificationHandlers.get(normalizeServiceId(id));
    if (!handler) return false;
    handler(data);
    return true;
  }

  /** Drop the link from the device side */
  drop(): void {
    if (!this.connected) return;
    this.connected = false;
    for (const listener of Array.from(this.disconnectListeners)) {
      listener();
    }
  }

  toDescriptor(): PeripheralDescriptor {
    return {
      address: this.address,
      name: this.name,
      rssi: this.rssi ?? undefined,
      serviceIds: this.serviceIds,
    };
  }

  /** @internal */
  addDisconnectListener(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  /** @internal */
  setNotificationHandler(id: string, handler: NotificationHandler | null): void {
    const key = normalizeServiceId(id);
    if (handler) {
      this.notificationHandlers.set(key, handler);
    } else {
      this.notificationHandlers.delete(key);
    }
  }

  /** @internal */
  clearNotificationHandlers(): void {
    this.notificationHandlers.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Simulated Link
// ─────────────────────────────────────────────────────────────────────────────

class SimulatedLink implements IBleLink {
  private device: SimulatedPeripheral | null = null;
  private removeDisconnectListener: (() => void) | null = null;
  private disconnectListeners: Set<() => void> = new Set();

  constructor(private readonly transport: SimulatedTransport) {}

  get capabilities(): LinkCapabilities {
    return this.device?.capabilities ?? DEFAULT_CAPABILITIES;
  }

  async open(address: string, _adapterId: string | undefined, _timeoutMs: number): Promise<boolean> {
    const device = this.transport.getPeripheral(address);
    if (!device) return false;

    // Attached before the outcome is known, like a half-open radio link
    this.device = device;
    device.openCount++;
    if (device.failOpens > 0) {
      device.failOpens--;
      throw new Error(`Simulated connect failure for ${address}`);
    }
    if (device.refuseOpens > 0) {
      device.refuseOpens--;
      return false;
    }

    device.connected = true;
    this.removeDisconnectListener = device.addDisconnectListener(() => {
      for (const listener of Array.from(this.disconnectListeners)) {
        listener();
      }
    });
    return true;
  }

  async close(): Promise<void> {
    const device = this.device;
    if (!device) return;

    this.removeDisconnectListener?.();
    this.removeDisconnectListener = null;
    device.closeCount++;
    device.connected = false;
    device.clearNotificationHandlers();

    if (device.failClose) {
      throw new Error(`Simulated disconnect failure for ${device.address}`);
    }
  }

  isConnected(): boolean {
    return this.device?.connected ?? false;
  }

  async readSignalStrength(): Promise<number | null> {
    const device = this.requireConnected();
    if (device.failSignalReads) {
      throw new Error('Simulated signal read failure');
    }
    return device.rssi;
  }

  async readAttribute(id: string): Promise<Buffer> {
    const value = this.requireConnected().getAttribute(id);
    if (!value) {
      throw new Error(`Attribute ${id} not found on peripheral`);
    }
    return Buffer.from(value);
  }

  async writeAttribute(id: string, data: Buffer, ackRequired: boolean): Promise<void> {
    const device = this.requireConnected();
    device.setAttribute(id, Buffer.from(data));
    device.writes.push({ id: normalizeServiceId(id), data: Buffer.from(data), ackRequired });
  }

  async subscribeNotifications(id: string, handler: NotificationHandler): Promise<void> {
    this.requireConnected().setNotificationHandler(id, handler);
  }

  async unsubscribeNotifications(id: string): Promise<void> {
    this.requireConnected().setNotificationHandler(id, null);
  }

  async requestPreferredTransferUnit(size: number): Promise<number | null> {
    const device = this.requireConnected();
    if (!device.capabilities.transferUnit) {
      throw new CapabilityUnsupportedError('transfer unit negotiation');
    }
    if (device.failTransferUnit) {
      throw new Error('Simulated transfer unit negotiation failure');
    }
    return Math.min(size, device.maxTransferUnit);
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  private requireConnected(): SimulatedPeripheral {
    if (!this.device || !this.device.connected) {
      throw new Error('Simulated link is down');
    }
    return this.device;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Simulated Transport
// ─────────────────────────────────────────────────────────────────────────────

export class SimulatedTransport implements IBleAdapter {
  readonly name = 'simulated';
  readonly observedHints: ObservationHints[] = [];

  available: boolean;

  private scheduler: Scheduler;
  private peripherals: Map<string, SimulatedPeripheral> = new Map();
  private script: ScriptedAdvertisement[] = [];
  private observers: Set<ObservationCallback> = new Set();

  constructor(options: SimulatedTransportOptions = {}) {
    this.available = options.available ?? true;
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  addPeripheral(options: SimulatedPeripheralOptions): SimulatedPeripheral {
    const device = new SimulatedPeripheral(options);
    this.peripherals.set(normalizeAddress(options.address), device);
    return device;
  }

  getPeripheral(address: string): SimulatedPeripheral | undefined {
    return this.peripherals.get(normalizeAddress(address));
  }

  /**
   * Queue advertisements replayed at the start of every observation
   */
  scriptAdvertisements(advertisements: ScriptedAdvertisement[]): void {
    this.script.push(...advertisements);
  }

  /** Deliver one advertisement to every active observation right now */
  advertise(peripheral: PeripheralDescriptor, advertisement?: AdvertisementDescriptor): void {
    for (const observer of Array.from(this.observers)) {
      observer(peripheral, advertisement);
    }
  }

  get activeObservations(): number {
    return this.observers.size;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async beginObservation(hints: ObservationHints, onObservation: ObservationCallback): Promise<ObservationSubscription> {
    if (!this.available) {
      throw new AdapterUnavailableError('Simulated adapter is switched off');
    }

    this.observedHints.push(hints);
    this.observers.add(onObservation);
    bleLogger.debug(`Simulated observation started (${this.script.length} scripted)`, undefined, 'SIMULATED');

    const cancels = this.script.map((entry) =>
      this.scheduler.schedule(() => {
        if (this.observers.has(onObservation)) {
          onObservation(entry.peripheral, entry.advertisement);
        }
      }, entry.delayMs ?? 0)
    );

    return {
      stop: async () => {
        this.observers.delete(onObservation);
        for (const cancel of cancels) {
          cancel();
        }
      },
    };
  }

  createLink(): IBleLink {
    return new SimulatedLink(this);
  }
}
