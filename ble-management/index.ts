/**
 * Connection Supervisor Module
 * Reconnection state machine and the handles that own running monitors
 */

// ─────────────────────────────────────────────────────────────────
// Core Types & Enums
// ─────────────────────────────────────────────────────────────────

export { ReconnectorState } from './types';

export type {
  MonitoredSession,
  SessionFactory,
  ReconnectorPolicy,
  ReconnectorOptions,
  RunOptions,
  MonitorStatus,
  MonitorOutcome,
  ReconnectorStatus,
} from './types';

// ─────────────────────────────────────────────────────────────────
// Supervisor
// ─────────────────────────────────────────────────────────────────

export { Reconnector } from './Reconnector';
export { MonitorHandle, startMonitor } from './MonitorHandle';
export type { StartMonitorOptions } from './MonitorHandle';

// ─────────────────────────────────────────────────────────────────
// Metadata
// ─────────────────────────────────────────────────────────────────

export { validateMetadata, parseMetadata } from './metadata';
