/**
 * BLE Bridge Constants - supervisor defaults and policy floors
 */

export const BLE_CONFIG = {
  // Discovery
  SCAN_TIMEOUT: 6000,            // Default discover() window
  UNAVAILABLE_GRACE: 100,        // Wait before returning [] when there is no radio
  ADAPTER_READY_TIMEOUT: 5000,   // How long to wait for the radio to power on
  MAX_KNOWN_PERIPHERALS: 256,    // Advertisers cached for connect lookups

  // Connection
  CONNECTION_TIMEOUT: 10000,
  MIN_CONNECTION_TIMEOUT: 1000,

  // Signal polling while connected
  POLL_INTERVAL: 5000,
  MIN_POLL_INTERVAL: 100,
} as const;

export const BACKOFF = {
  BASE_DELAY: 2000,
  MIN_BASE_DELAY: 500,
  MAX_DELAY: 60000,
  MULTIPLIER: 2,
} as const;

// Bluetooth SIG base UUID tail; 128-bit ids ending in it collapse to their 16-bit form
export const BLUETOOTH_BASE_UUID_SUFFIX = '00001000800000805f9b34fb';

export const METRICS = {
  FILE_NAME: 'metrics.csv',
  FIELDS: ['timestamp', 'event', 'status', 'value', 'message', 'extra'] as const,
} as const;

// Event tags written by the supervisor; consumers of the metrics file key on these
export const METRIC_EVENTS = {
  MONITOR_START: 'monitor_start',
  MONITOR_STOP: 'monitor_stop',
  CONNECT_ATTEMPT: 'connect_attempt',
  SESSION_ACTIVE: 'session_active',
  SESSION_ERROR: 'session_error',
  SESSION_LOST: 'session_lost',
  RSSI_SAMPLE: 'rssi_sample',

  // Emitted by DeviceSession
  CONNECT: 'connect',
  DISCONNECT: 'disconnect',
  CONNECTION_LOST: 'connection_lost',
  MTU: 'mtu',
  RSSI: 'rssi',
  READ_ATTRIBUTE: 'read_attribute',
  WRITE_ATTRIBUTE: 'write_attribute',
  NOTIFY_START: 'notify_start',
  NOTIFY_STOP: 'notify_stop',
  NOTIFY_CALLBACK: 'notify_callback',
} as const;

export const METRIC_STATUS = {
  OK: 'ok',
  ERROR: 'error',
  PENDING: 'pending',
  FAILED: 'failed',
  UNKNOWN: 'unknown',
  ENDED: 'ended',
  CANCELLED: 'cancelled',
} as const;
