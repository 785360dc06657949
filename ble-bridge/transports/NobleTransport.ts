/**
 * Noble Transport Implementation
 * Binds the adapter interface to @abandonware/noble (Windows/macOS/Linux HCI).
 *
 * Noble is a process-wide singleton, so its 'discover' and 'stateChange'
 * events are registered once and fanned out through a private emitter to every
 * active observation and link.
 */

import { EventEmitter } from 'events';
import type { Characteristic, Peripheral } from '@abandonware/noble';
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
import { BLE_CONFIG } from '../BleBridgeConstants';
import { bleLogger } from '../BleLogger';
import { normalizeAddress, normalizeServiceId } from '../identifiers';
import { AdapterUnavailableError, CapabilityUnsupportedError, describeError } from '../../shared/errors';

type NobleModule = typeof import('@abandonware/noble');

// Noble will be dynamically loaded
let noble: NobleModule | null = null;
let nobleLoadFailed = false;

function loadNoble(): NobleModule | null {
  if (noble || nobleLoadFailed) return noble;

  try {
    const loaded: NobleModule = require('@abandonware/noble');
    noble = loaded;
    bleLogger.info('Noble library loaded', undefined, 'NOBLE');
  } catch (error) {
    nobleLoadFailed = true;
    bleLogger.warn('Noble not available', error, 'NOBLE');
  }
  return noble;
}

export function isNobleLoadable(): boolean {
  return loadNoble() !== null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Descriptor conversion
// ─────────────────────────────────────────────────────────────────────────────

function peripheralAddress(peripheral: Peripheral): string {
  // macOS hides hardware addresses; the CoreBluetooth id is the stable key there
  const address = peripheral.address;
  return address && address !== 'unknown' ? address : peripheral.id;
}

function describePeripheral(peripheral: Peripheral): PeripheralDescriptor {
  return {
    address: peripheralAddress(peripheral),
    name: peripheral.advertisement?.localName || undefined,
    rssi: peripheral.rssi,
    serviceIds: peripheral.advertisement?.serviceUuids ?? [],
    details: { id: peripheral.id, addressType: peripheral.addressType },
  };
}

function describeAdvertisement(peripheral: Peripheral): AdvertisementDescriptor | undefined {
  const advertisement = peripheral.advertisement;
  if (!advertisement) return undefined;

  // First two bytes are the little-endian company identifier
  const manufacturerData = new Map<number, Buffer>();
  const rawManufacturer = advertisement.manufacturerData;
  if (rawManufacturer && rawManufacturer.length >= 2) {
    manufacturerData.set(rawManufacturer.readUInt16LE(0), rawManufacturer.subarray(2));
  }

  const serviceData = new Map<string, Buffer>();
  for (const entry of advertisement.serviceData ?? []) {
    serviceData.set(normalizeServiceId(entry.uuid), entry.data);
  }

  return {
    localName: advertisement.localName || undefined,
    rssi: peripheral.rssi,
    serviceIds: advertisement.serviceUuids ?? [],
    manufacturerData,
    serviceData,
    txPower: typeof advertisement.txPowerLevel === 'number' ? advertisement.txPowerLevel : undefined,
    connectable: peripheral.connectable,
    platformData: { id: peripheral.id, addressType: peripheral.addressType },
  };
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Link
// ─────────────────────────────────────────────────────────────────────────────

class NobleLink implements IBleLink {
  readonly capabilities: LinkCapabilities = {
    signalStrength: true,
    // Noble negotiates MTU itself during connect and exposes no request call
    transferUnit: false,
    notifications: true,
  };

  private peripheral: Peripheral | null = null;
  private characteristics: Map<string, Characteristic> = new Map();
  private notificationHandlers: Map<string, (data: Buffer) => void> = new Map();
  private disconnectListeners: Set<() => void> = new Set();

  constructor(private readonly adapter: NobleTransport) {}

  async open(address: string, adapterId: string | undefined, timeoutMs: number): Promise<boolean> {
    if (adapterId) {
      bleLogger.debug(`Noble uses the default HCI adapter; ignoring adapterId ${adapterId}`, undefined, 'NOBLE');
    }

    const startedAt = Date.now();
    const peripheral = await this.adapter.findPeripheral(address, timeoutMs);
    if (!peripheral) {
      bleLogger.warn(`Peripheral ${address} not seen within ${timeoutMs}ms`, undefined, 'NOBLE');
      return false;
    }

    const remaining = Math.max(1, timeoutMs - (Date.now() - startedAt));
    try {
      await withTimeout(peripheral.connectAsync(), remaining, `Connect to ${address}`);
    } catch (error) {
      // Leave noble's peripheral in a clean state for the next attempt
      peripheral.disconnectAsync().catch((cleanupError: unknown) => {
        bleLogger.debug(`Cleanup disconnect failed for ${address}`, cleanupError, 'NOBLE');
      });
      throw error;
    }

    this.peripheral = peripheral;
    this.characteristics.clear();
    peripheral.once('disconnect', this.handleDisconnect);
    return peripheral.state === 'connected';
  }

  async close(): Promise<void> {
    const peripheral = this.peripheral;
    if (!peripheral) return;

    peripheral.removeListener('disconnect', this.handleDisconnect);
    this.peripheral = null;
    this.characteristics.clear();
    this.notificationHandlers.clear();

    if (peripheral.state === 'connected' || peripheral.state === 'connecting') {
      await peripheral.disconnectAsync();
    }
  }

  isConnected(): boolean {
    return this.peripheral?.state === 'connected';
  }

  async readSignalStrength(): Promise<number | null> {
    const rssi = await this.requirePeripheral().updateRssiAsync();
    return Number.isFinite(rssi) ? rssi : null;
  }

  async readAttribute(id: string): Promise<Buffer> {
    const characteristic = await this.characteristic(id);
    return characteristic.readAsync();
  }

  async writeAttribute(id: string, data: Buffer, ackRequired: boolean): Promise<void> {
    const characteristic = await this.characteristic(id);
    // Noble's second argument is withoutResponse
    await characteristic.writeAsync(data, !ackRequired);
  }

  async subscribeNotifications(id: string, handler: NotificationHandler): Promise<void> {
    const key = normalizeServiceId(id);
    const characteristic = await this.characteristic(id);

    const previous = this.notificationHandlers.get(key);
    if (previous) {
      characteristic.removeListener('data', previous);
    }

    const listener = (data: Buffer) => handler(data);
    this.notificationHandlers.set(key, listener);
    characteristic.on('data', listener);
    await characteristic.subscribeAsync();
  }

  async unsubscribeNotifications(id: string): Promise<void> {
    const key = normalizeServiceId(id);
    const characteristic = this.characteristics.get(key);
    const listener = this.notificationHandlers.get(key);
    this.notificationHandlers.delete(key);
    if (!characteristic) return;

    if (listener) {
      characteristic.removeListener('data', listener);
    }
    await characteristic.unsubscribeAsync();
  }

  async requestPreferredTransferUnit(_size: number): Promise<number | null> {
    throw new CapabilityUnsupportedError('transfer unit negotiation');
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private handleDisconnect = (): void => {
    bleLogger.info('Peripheral disconnect event received', undefined, 'NOBLE');
    this.characteristics.clear();
    for (const listener of Array.from(this.disconnectListeners)) {
      listener();
    }
  };

  private requirePeripheral(): Peripheral {
    if (!this.peripheral) {
      throw new Error('Noble link is not open');
    }
    return this.peripheral;
  }

  private async characteristic(id: string): Promise<Characteristic> {
    const key = normalizeServiceId(id);
    const cached = this.characteristics.get(key);
    if (cached) return cached;

    const { characteristics } = await this.requirePeripheral().discoverSomeServicesAndCharacteristicsAsync([], [key]);
    const found = characteristics.find((candidate) => normalizeServiceId(candidate.uuid) === key);
    if (!found) {
      throw new Error(`Attribute ${id} not found on peripheral`);
    }

    this.characteristics.set(key, found);
    return found;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Noble Transport
// ─────────────────────────────────────────────────────────────────────────────

export class NobleTransport implements IBleAdapter {
  readonly name = 'noble';

  private events = new EventEmitter();
  private wired = false;
  private radioState = 'unknown';
  private knownPeripherals: Map<string, Peripheral> = new Map();
  private activeObservations = 0;

  async isAvailable(): Promise<boolean> {
    const loaded = this.bind();
    if (!loaded) return false;
    if (this.radioState === 'poweredOn') return true;
    return this.waitForPoweredOn(BLE_CONFIG.ADAPTER_READY_TIMEOUT);
  }

  async beginObservation(hints: ObservationHints, onObservation: ObservationCallback): Promise<ObservationSubscription> {
    if (!(await this.isAvailable())) {
      throw new AdapterUnavailableError(`Bluetooth adapter not ready (state: ${this.radioState})`);
    }
    const loaded = this.bind();
    if (!loaded) {
      throw new AdapterUnavailableError('Noble not available');
    }

    if (hints.scanningMode === 'passive') {
      bleLogger.debug('Noble scans actively; passive mode hint ignored', undefined, 'NOBLE');
    }

    const listener = (peripheral: Peripheral) => {
      onObservation(describePeripheral(peripheral), describeAdvertisement(peripheral));
    };
    this.events.on('discover', listener);

    this.activeObservations++;
    try {
      await loaded.startScanningAsync([...hints.serviceIds], hints.allowDuplicates);
    } catch (error) {
      this.events.off('discover', listener);
      this.activeObservations--;
      throw new AdapterUnavailableError(`Scan could not start: ${describeError(error)}`, { cause: error });
    }

    let stopped = false;
    return {
      stop: async () => {
        if (stopped) return;
        stopped = true;
        this.events.off('discover', listener);
        this.activeObservations--;
        if (this.activeObservations === 0) {
          await loaded.stopScanningAsync();
        }
      },
    };
  }

  createLink(): IBleLink {
    return new NobleLink(this);
  }

  /**
   * Resolve a peripheral by address, scanning briefly when it has not been seen yet
   */
  async findPeripheral(address: string, timeoutMs: number): Promise<Peripheral | null> {
    const key = normalizeAddress(address);
    const known = this.knownPeripherals.get(key);
    if (known) {
      this.knownPeripherals.delete(key);
      return known;
    }

    return new Promise<Peripheral | null>((resolve, reject) => {
      let subscription: ObservationSubscription | null = null;
      let settled = false;

      const finish = (peripheral: Peripheral | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.events.off('discover', onDiscover);
        const stopping = subscription ? subscription.stop() : Promise.resolve();
        stopping.then(
          () => resolve(peripheral),
          (error: unknown) => {
            bleLogger.debug('Stopping lookup scan failed', error, 'NOBLE');
            resolve(peripheral);
          }
        );
      };

      const onDiscover = (peripheral: Peripheral) => {
        if (normalizeAddress(peripheralAddress(peripheral)) === key) {
          finish(peripheral);
        }
      };

      const timer = setTimeout(() => finish(null), timeoutMs);
      this.events.on('discover', onDiscover);

      this.beginObservation({ serviceIds: [], allowDuplicates: false }, () => undefined).then(
        (started) => {
          subscription = started;
          if (settled) {
            started.stop().catch((error: unknown) => bleLogger.debug('Late scan stop failed', error, 'NOBLE'));
          }
        },
        (error: unknown) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          this.events.off('discover', onDiscover);
          reject(error);
        }
      );
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private bind(): NobleModule | null {
    const loaded = loadNoble();
    if (!loaded || this.wired) return loaded;

    this.wired = true;
    this.radioState = loaded._state;

    loaded.on('stateChange', (state: string) => {
      bleLogger.info(`Bluetooth state: ${state}`, undefined, 'NOBLE');
      this.radioState = state;
      this.events.emit('stateChange', state);
    });

    loaded.on('discover', (peripheral: Peripheral) => {
      this.rememberPeripheral(peripheral);
      this.events.emit('discover', peripheral);
    });

    return loaded;
  }

  // Insertion order doubles as recency: re-seen advertisers move to the back
  private rememberPeripheral(peripheral: Peripheral): void {
    const key = normalizeAddress(peripheralAddress(peripheral));
    this.knownPeripherals.delete(key);
    this.knownPeripherals.set(key, peripheral);

    while (this.knownPeripherals.size > BLE_CONFIG.MAX_KNOWN_PERIPHERALS) {
      const oldest = this.knownPeripherals.keys().next();
      if (oldest.done) break;
      this.knownPeripherals.delete(oldest.value);
    }
  }

  private waitForPoweredOn(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.events.off('stateChange', onState);
        bleLogger.warn(`Bluetooth adapter not powered on after ${timeoutMs}ms (state: ${this.radioState})`, undefined, 'NOBLE');
        resolve(false);
      }, timeoutMs);

      const onState = (state: string) => {
        if (state === 'poweredOn') {
          clearTimeout(timer);
          this.events.off('stateChange', onState);
          resolve(true);
        }
      };

      this.events.on('stateChange', onState);
    });
  }
}
