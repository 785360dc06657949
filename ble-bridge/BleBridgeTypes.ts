/**
 * BLE Bridge Types - session states and public scan/session shapes
 */

import type { MetricsLogger } from '../shared/metrics';
import type { IBleAdapter } from './interfaces/IBleAdapter';

// Device session states
export enum SessionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  LOST = 'lost',
}

// Values allowed in session/monitor metadata (merged into every metric record)
export type MetadataValue = string | number | boolean | null;
export type Metadata = Readonly<Record<string, MetadataValue>>;

export interface SessionConfig {
  address: string;
  adapterId?: string;
  connectTimeoutMs?: number;
  mtu?: number;
  metrics?: MetricsLogger;
  metadata?: Metadata;
  adapter?: IBleAdapter;
}

// JSON projection of a ScanResult for façades
export interface ScanResultJSON {
  address: string;
  name: string | null;
  rssi: number | null;
  serviceIds: string[];
  manufacturerData?: Record<string, string>;
  serviceData?: Record<string, string>;
  connectable: boolean | null;
  txPower: number | null;
  observedAt: number | null;
  extra?: Record<string, unknown>;
}

export type NotifyCallback = (data: Buffer) => void | Promise<void>;

export interface SessionEvents {
  stateChange: (state: SessionState, previous: SessionState) => void;
  lost: (address: string) => void;
}
