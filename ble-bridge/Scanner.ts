/**
 * Scanner - one bounded discovery pass with allow-lists and de-duplication
 */

import {
  AdvertisementDescriptor,
  IBleAdapter,
  ObservationHints,
  ObservationSubscription,
  PeripheralDescriptor,
  ScanningMode,
} from './interfaces/IBleAdapter';
import { BLE_CONFIG } from './BleBridgeConstants';
import { bleLogger } from './BleLogger';
import { getDefaultAdapter } from './BleAdapterFactory';
import { normalizeAddress, normalizeName, normalizeServiceId } from './identifiers';
import { ScanResult } from './ScanResult';
import { AdapterUnavailableError, describeError } from '../shared/errors';
import { Scheduler, StopSignal, systemScheduler } from '../shared/StopSignal';

export type ScanCallback = (result: ScanResult) => void | Promise<void>;

export interface ScannerOptions {
  serviceIds?: Iterable<string>;
  addresses?: Iterable<string>;
  names?: Iterable<string>;
  maxResults?: number;
  returnDuplicates?: boolean;
  scanningMode?: ScanningMode;
  adapterId?: string;
  detectionOptions?: Record<string, unknown>;
  callback?: ScanCallback;
}

function normalizedSet(values: Iterable<string> | undefined, normalize: (value: string) => string): ReadonlySet<string> {
  return new Set(Array.from(values ?? [], normalize));
}

// ─────────────────────────────────────────────────────────────────────────────
// Scanner Config
// ─────────────────────────────────────────────────────────────────────────────

export class ScannerConfig {
  readonly serviceIds: ReadonlySet<string>;
  readonly addresses: ReadonlySet<string>;
  readonly names: ReadonlySet<string>;
  readonly maxResults?: number;
  readonly returnDuplicates: boolean;
  readonly scanningMode?: ScanningMode;
  readonly adapterId?: string;
  readonly detectionOptions: Readonly<Record<string, unknown>>;
  readonly callback?: ScanCallback;

  constructor(options: ScannerOptions = {}) {
    if (options.maxResults !== undefined && (!Number.isInteger(options.maxResults) || options.maxResults <= 0)) {
      throw new RangeError('maxResults must be a positive integer when provided');
    }

    this.serviceIds = normalizedSet(options.serviceIds, normalizeServiceId);
    this.addresses = normalizedSet(options.addresses, normalizeAddress);
    this.names = normalizedSet(options.names, normalizeName);
    this.maxResults = options.maxResults;
    this.returnDuplicates = options.returnDuplicates ?? false;
    this.scanningMode = options.scanningMode;
    this.adapterId = options.adapterId;
    this.detectionOptions = Object.freeze({ ...(options.detectionOptions ?? {}) });
    this.callback = options.callback;
    Object.freeze(this);
  }

  /**
   * True when the observation passes every configured allow-list.
   * Empty lists do not filter.
   */
  allows(peripheral: PeripheralDescriptor, advertisement?: AdvertisementDescriptor): boolean {
    if (this.addresses.size > 0 && !this.addresses.has(normalizeAddress(peripheral.address))) {
      return false;
    }

    if (this.names.size > 0) {
      const observedName = advertisement?.localName || peripheral.name;
      if (!observedName || !this.names.has(normalizeName(observedName))) {
        return false;
      }
    }

    if (this.serviceIds.size > 0) {
      const observed = new Set<string>();
      for (const id of advertisement?.serviceIds ?? []) observed.add(normalizeServiceId(id));
      for (const id of peripheral.serviceIds ?? []) observed.add(normalizeServiceId(id));
      for (const required of this.serviceIds) {
        if (!observed.has(required)) return false;
      }
    }

    return true;
  }

  observationHints(): ObservationHints {
    return {
      serviceIds: Array.from(this.serviceIds),
      allowDuplicates: this.returnDuplicates,
      scanningMode: this.scanningMode,
      adapterId: this.adapterId,
      detectionOptions: this.detectionOptions,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Scanner
// ─────────────────────────────────────────────────────────────────────────────

export class Scanner {
  readonly config: ScannerConfig;

  private adapter: IBleAdapter;
  private scheduler: Scheduler;
  private uniqueResults: Map<string, ScanResult> = new Map();
  private allResults: ScanResult[] = [];
  private stopSignal: StopSignal | null = null;

  constructor(config: ScannerConfig | ScannerOptions = {}, adapter?: IBleAdapter, scheduler: Scheduler = systemScheduler) {
    this.config = config instanceof ScannerConfig ? config : new ScannerConfig(config);
    this.adapter = adapter ?? getDefaultAdapter();
    this.scheduler = scheduler;
  }

  reset(): void {
    this.uniqueResults.clear();
    this.allResults = [];
  }

  /**
   * Accepted results so far: one per address (latest observation, first-seen
   * order) or, with returnDuplicates, every accepted observation in order
   */
  results(): ScanResult[] {
    if (this.config.returnDuplicates) {
      return [...this.allResults];
    }
    return Array.from(this.uniqueResults.values());
  }

  /** End a running pass early */
  stop(): void {
    this.stopSignal?.set();
  }

  async run(timeoutMs: number = BLE_CONFIG.SCAN_TIMEOUT): Promise<ScanResult[]> {
    this.reset();
    const stop = new StopSignal(this.scheduler);
    this.stopSignal = stop;

    if (!(await this.adapter.isAvailable())) {
      return this.degrade(timeoutMs, stop);
    }

    let subscription: ObservationSubscription;
    try {
      subscription = await this.adapter.beginObservation(this.config.observationHints(), (peripheral, advertisement) =>
        this.handleObservation(peripheral, advertisement, stop)
      );
    } catch (error) {
      if (error instanceof AdapterUnavailableError) {
        return this.degrade(timeoutMs, stop);
      }
      throw error;
    }

    try {
      await stop.wait(timeoutMs);
    } finally {
      stop.set();
      try {
        await subscription.stop();
      } catch (error) {
        bleLogger.warn(`Stopping observation failed: ${describeError(error)}`, undefined, 'SCANNER');
      }
    }

    const results = this.results();
    bleLogger.debug(`Scan finished with ${results.length} result(s)`, undefined, 'SCANNER');
    return results;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────────────

  private async degrade(timeoutMs: number, stop: StopSignal): Promise<ScanResult[]> {
    bleLogger.warn('Bluetooth adapter unavailable; returning empty scan results', undefined, 'SCANNER');
    await stop.wait(Math.min(timeoutMs, BLE_CONFIG.UNAVAILABLE_GRACE));
    return [];
  }

  private handleObservation(
    peripheral: PeripheralDescriptor,
    advertisement: AdvertisementDescriptor | undefined,
    stop: StopSignal
  ): void {
    if (stop.isSet || !this.config.allows(peripheral, advertisement)) {
      return;
    }

    const result = ScanResult.fromObservation(peripheral, advertisement, this.scheduler.now());

    let collected: number;
    if (this.config.returnDuplicates) {
      this.allResults.push(result);
      collected = this.allResults.length;
    } else {
      // Map.set on a known address keeps its first-seen position
      const key = normalizeAddress(result.address);
      const existing = this.uniqueResults.has(key);
      this.uniqueResults.set(key, result);
      collected = this.uniqueResults.size;
      if (!existing) {
        bleLogger.debug(`Discovered ${result.address} (${result.name ?? 'unnamed'})`, undefined, 'SCANNER');
      }
    }

    this.dispatchCallback(result);

    if (this.config.maxResults !== undefined && collected >= this.config.maxResults) {
      stop.set();
    }
  }

  private dispatchCallback(result: ScanResult): void {
    const callback = this.config.callback;
    if (!callback) return;

    const report = (error: unknown) => {
      bleLogger.error(`Scanner callback raised: ${describeError(error)}`, undefined, 'SCANNER');
    };

    try {
      void Promise.resolve(callback(result)).catch(report);
    } catch (error) {
      report(error);
    }
  }
}

/**
 * One-shot discovery pass
 */
export function discover(
  timeoutMs: number = BLE_CONFIG.SCAN_TIMEOUT,
  filters: ScannerOptions = {},
  adapter?: IBleAdapter,
  scheduler?: Scheduler
): Promise<ScanResult[]> {
  return new Scanner(new ScannerConfig(filters), adapter, scheduler).run(timeoutMs);
}
