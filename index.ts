/**
 * BLE Link Supervisor
 * Discovery, single-device sessions, an auto-reconnecting monitor and an
 * append-only CSV health log.
 */

export * from './ble-bridge';
export * from './ble-management';
export * from './shared/metrics';
export * from './shared/errors';
export { AsyncLock } from './shared/AsyncLock';
export { StopSignal, systemScheduler } from './shared/StopSignal';
export type { Scheduler, RaceOutcome } from './shared/StopSignal';
export { calculateBackoff, nextBackoff, clipToDeadline } from './shared/retry';
export { loadSupervisorSettings, loadEnvFile, parseTransportKind, ENV_KEYS } from './shared/config';
export type { SupervisorSettings, TransportKind } from './shared/config';
