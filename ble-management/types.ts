/**
 * Connection Supervisor Types
 * Reconnector states, policy and the session contract it drives
 */

import type { Metadata, SessionConfig } from '../ble-bridge/BleBridgeTypes';
import type { IBleAdapter } from '../ble-bridge/interfaces/IBleAdapter';
import type { MetricsLogger } from '../shared/metrics';
import type { Scheduler } from '../shared/StopSignal';

// ─────────────────────────────────────────────────────────────────────────────
// State Machine
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Idle → Connecting → Active → BackingOff → Connecting → … → Stopped
 */
export enum ReconnectorState {
  IDLE = 'idle',
  CONNECTING = 'connecting',
  ACTIVE = 'active',
  BACKING_OFF = 'backing_off',
  STOPPED = 'stopped',
}

// ─────────────────────────────────────────────────────────────────────────────
// Sessions
// ─────────────────────────────────────────────────────────────────────────────

/** The part of DeviceSession the supervisor relies on */
export interface MonitoredSession {
  connect(): Promise<boolean>;
  disconnect(): Promise<void>;
  readRssi(): Promise<number | null>;
}

export type SessionFactory = (config: SessionConfig) => MonitoredSession;

// ─────────────────────────────────────────────────────────────────────────────
// Policy & Results
// ─────────────────────────────────────────────────────────────────────────────

export interface ReconnectorPolicy {
  readonly connectTimeoutMs: number;
  readonly pollIntervalMs: number;
  readonly baseBackoffMs: number;
  readonly maxBackoffMs: number;
  readonly metadata: Metadata;
  readonly adapterId?: string;
  readonly mtu?: number;
}

export interface ReconnectorOptions {
  /** A logger, or a path to build one for this monitor */
  log?: MetricsLogger | string;
  adapterId?: string;
  mtu?: number;
  connectTimeoutMs?: number;
  pollIntervalMs?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  metadata?: unknown;
  sessionFactory?: SessionFactory;
  adapter?: IBleAdapter;
  scheduler?: Scheduler;
}

export interface RunOptions {
  /** Overall deadline measured from the start of run */
  runtimeMs?: number;
  /** Forced cancellation; the trail then ends with monitor_stop cancelled */
  signal?: AbortSignal;
}

export type MonitorStatus = 'ok' | 'cancelled';

export interface MonitorOutcome {
  status: MonitorStatus;
  attempts: number;
}

export interface ReconnectorStatus {
  address: string;
  state: ReconnectorState;
  attempt: number;
  backoffMs: number;
  connected: boolean;
  running: boolean;
}
