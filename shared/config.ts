/**
 * Supervisor configuration
 * Defaults from BleBridgeConstants, overridden by environment variables.
 */

import { config as loadDotenv } from 'dotenv';
import { resolve } from 'path';
import { BACKOFF, BLE_CONFIG, METRICS } from '../ble-bridge/BleBridgeConstants';
import { bleLogger } from '../ble-bridge/BleLogger';

export type TransportKind = 'noble' | 'simulated';

export interface SupervisorSettings {
  metricsPath: string;
  connectTimeoutMs: number;
  pollIntervalMs: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  scanTimeoutMs: number;
  transport: TransportKind;
}

export const ENV_KEYS = {
  METRICS_PATH: 'SUPERVISOR_METRICS_PATH',
  CONNECT_TIMEOUT: 'SUPERVISOR_CONNECT_TIMEOUT_MS',
  POLL_INTERVAL: 'SUPERVISOR_POLL_INTERVAL_MS',
  BASE_BACKOFF: 'SUPERVISOR_BASE_BACKOFF_MS',
  MAX_BACKOFF: 'SUPERVISOR_MAX_BACKOFF_MS',
  SCAN_TIMEOUT: 'SUPERVISOR_SCAN_TIMEOUT_MS',
  TRANSPORT: 'BLE_TRANSPORT',
} as const;

/**
 * Load a .env file into process.env. Variables already set are kept.
 * Returns false when the file could not be read.
 */
export function loadEnvFile(envPath: string = resolve(process.cwd(), '.env')): boolean {
  const result = loadDotenv({ path: envPath });
  if (result.error) {
    bleLogger.debug(`No env file loaded from ${envPath}`, result.error, 'CONFIG');
    return false;
  }
  bleLogger.info(`Loaded env from: ${envPath}`, undefined, 'CONFIG');
  return true;
}

function readDuration(env: NodeJS.ProcessEnv, key: string, fallback: number, floor = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    bleLogger.warn(`Ignoring ${key}=${raw}: not a non-negative number, using ${fallback}`, undefined, 'CONFIG');
    return fallback;
  }
  if (parsed < floor) {
    bleLogger.warn(`${key}=${parsed} is below the minimum, using ${floor}`, undefined, 'CONFIG');
    return floor;
  }
  return parsed;
}

export function parseTransportKind(raw: string | undefined): TransportKind {
  const value = raw?.trim().toLowerCase();
  if (!value || value === 'noble') return 'noble';
  if (value === 'simulated') return 'simulated';

  bleLogger.warn(`Unknown ${ENV_KEYS.TRANSPORT}=${raw}, using noble`, undefined, 'CONFIG');
  return 'noble';
}

export function loadSupervisorSettings(env: NodeJS.ProcessEnv = process.env): SupervisorSettings {
  const baseBackoffMs = readDuration(env, ENV_KEYS.BASE_BACKOFF, BACKOFF.BASE_DELAY, BACKOFF.MIN_BASE_DELAY);
  const maxBackoffMs = Math.max(readDuration(env, ENV_KEYS.MAX_BACKOFF, BACKOFF.MAX_DELAY, baseBackoffMs), baseBackoffMs);

  return {
    metricsPath: env[ENV_KEYS.METRICS_PATH]?.trim() || METRICS.FILE_NAME,
    connectTimeoutMs: readDuration(
      env,
      ENV_KEYS.CONNECT_TIMEOUT,
      BLE_CONFIG.CONNECTION_TIMEOUT,
      BLE_CONFIG.MIN_CONNECTION_TIMEOUT
    ),
    pollIntervalMs: readDuration(env, ENV_KEYS.POLL_INTERVAL, BLE_CONFIG.POLL_INTERVAL, BLE_CONFIG.MIN_POLL_INTERVAL),
    baseBackoffMs,
    maxBackoffMs,
    scanTimeoutMs: readDuration(env, ENV_KEYS.SCAN_TIMEOUT, BLE_CONFIG.SCAN_TIMEOUT),
    transport: parseTransportKind(env[ENV_KEYS.TRANSPORT]),
  };
}
