/**
 * BLE Bridge - discovery and single-device sessions over an abstract adapter
 *
 * Default binding: @abandonware/noble (HCI socket / CoreBluetooth / WinRT)
 * BLE_TRANSPORT=simulated: in-process radio for development and tests
 */

// ─────────────────────────────────────────────────────────────────────────────
// Discovery
// ─────────────────────────────────────────────────────────────────────────────

export { Scanner, ScannerConfig, discover } from './Scanner';
export type { ScannerOptions, ScanCallback } from './Scanner';
export { ScanResult } from './ScanResult';
export type { ScanResultInit } from './ScanResult';

// ─────────────────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────────────────

export { DeviceSession } from './DeviceSession';
export { SessionState } from './BleBridgeTypes';
export type {
  SessionConfig,
  Metadata,
  MetadataValue,
  NotifyCallback,
  ScanResultJSON,
  SessionEvents,
} from './BleBridgeTypes';

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export type {
  IBleAdapter,
  IBleLink,
  LinkCapabilities,
  ObservationHints,
  ObservationCallback,
  ObservationSubscription,
  PeripheralDescriptor,
  AdvertisementDescriptor,
  NotificationHandler,
  ScanningMode,
} from './interfaces/IBleAdapter';

export { createBleAdapter, getDefaultAdapter, setDefaultAdapter } from './BleAdapterFactory';
export type { CreatedAdapter } from './BleAdapterFactory';
export { NobleTransport } from './transports/NobleTransport';
export { SimulatedTransport, SimulatedPeripheral } from './transports/SimulatedTransport';
export type { SimulatedPeripheralOptions, ScriptedAdvertisement } from './transports/SimulatedTransport';

// ─────────────────────────────────────────────────────────────────────────────
// Platform & Constants
// ─────────────────────────────────────────────────────────────────────────────

export { detectPlatform, getPlatformConfig } from './PlatformConfig';
export type { PlatformType, BLEPlatformConfig } from './PlatformConfig';
export { BLE_CONFIG, BACKOFF, METRICS, METRIC_EVENTS, METRIC_STATUS } from './BleBridgeConstants';
export { normalizeAddress, normalizeServiceId } from './identifiers';

// ─────────────────────────────────────────────────────────────────────────────
// Logging
// ─────────────────────────────────────────────────────────────────────────────

export { BleLogger, bleLogger, parseLogLevel } from './BleLogger';
export type { LogLevel } from './BleLogger';
