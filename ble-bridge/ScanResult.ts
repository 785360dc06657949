/**
 * Scan Result - immutable snapshot of one observed advertisement
 */

import type { AdvertisementDescriptor, PeripheralDescriptor } from './interfaces/IBleAdapter';
import type { ScanResultJSON } from './BleBridgeTypes';
import { normalizeServiceId } from './identifiers';

export interface ScanResultInit {
  address: string;
  name?: string;
  rssi?: number;
  serviceIds?: Iterable<string>;
  manufacturerData?: ReadonlyMap<number, Buffer>;
  serviceData?: ReadonlyMap<string, Buffer>;
  connectable?: boolean;
  txPower?: number;
  observedAt?: number;
  extra?: Record<string, unknown>;
}

// Ordered, de-duplicated, normalized service ids
function uniqueServiceIds(ids: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const id of ids) {
    seen.add(normalizeServiceId(id));
  }
  return Array.from(seen);
}

export class ScanResult {
  readonly address: string;
  readonly name?: string;
  readonly rssi?: number;
  readonly serviceIds: readonly string[];
  readonly manufacturerData: ReadonlyMap<number, Buffer>;
  readonly serviceData: ReadonlyMap<string, Buffer>;
  readonly connectable?: boolean;
  readonly txPower?: number;
  readonly observedAt?: number;
  readonly extra: Readonly<Record<string, unknown>>;

  constructor(init: ScanResultInit) {
    this.address = init.address;
    this.name = init.name;
    this.rssi = init.rssi;
    this.serviceIds = Object.freeze(uniqueServiceIds(init.serviceIds ?? []));
    this.manufacturerData = new Map(init.manufacturerData ?? []);
    this.serviceData = new Map(init.serviceData ?? []);
    this.connectable = init.connectable;
    this.txPower = init.txPower;
    this.observedAt = init.observedAt;
    this.extra = Object.freeze({ ...(init.extra ?? {}) });
    Object.freeze(this);
  }

  /**
   * Build from what the binding reported. Advertisement values win where both
   * sides carry one (RSSI, service ids); the name is the peripheral's.
   */
  static fromObservation(
    peripheral: PeripheralDescriptor,
    advertisement?: AdvertisementDescriptor,
    observedAt?: number
  ): ScanResult {
    const advertised = advertisement?.serviceIds ?? [];
    const extra: Record<string, unknown> = {};
    if (peripheral.details !== undefined) extra.details = peripheral.details;
    if (advertisement?.platformData !== undefined) extra.platformData = advertisement.platformData;

    return new ScanResult({
      address: peripheral.address,
      name: peripheral.name ?? advertisement?.localName,
      rssi: advertisement?.rssi ?? peripheral.rssi,
      serviceIds: advertised.length > 0 ? advertised : peripheral.serviceIds ?? [],
      manufacturerData: advertisement?.manufacturerData,
      serviceData: advertisement?.serviceData,
      connectable: advertisement?.connectable,
      txPower: advertisement?.txPower,
      observedAt,
      extra,
    });
  }

  toJSON(): ScanResultJSON {
    const json: ScanResultJSON = {
      address: this.address,
      name: this.name ?? null,
      rssi: this.rssi ?? null,
      serviceIds: [...this.serviceIds],
      connectable: this.connectable ?? null,
      txPower: this.txPower ?? null,
      observedAt: this.observedAt ?? null,
    };

    if (this.manufacturerData.size > 0) {
      const manufacturerData: Record<string, string> = {};
      for (const [company, payload] of this.manufacturerData) {
        manufacturerData[String(company)] = payload.toString('hex');
      }
      json.manufacturerData = manufacturerData;
    }
    if (this.serviceData.size > 0) {
      const serviceData: Record<string, string> = {};
      for (const [serviceId, payload] of this.serviceData) {
        serviceData[serviceId] = payload.toString('hex');
      }
      json.serviceData = serviceData;
    }
    if (Object.keys(this.extra).length > 0) {
      json.extra = { ...this.extra };
    }

    return json;
  }
}
