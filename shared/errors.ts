/**
 * Supervisor Error Types
 * Failure taxonomy shared by the scanner, sessions, reconnector and metrics sink
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Codes
// ─────────────────────────────────────────────────────────────────────────────

export enum SupervisorErrorCode {
  ADAPTER_UNAVAILABLE = 'adapter_unavailable',
  CONNECT_FAILED = 'connect_failed',
  CONNECTION_LOST = 'connection_lost',
  NOT_CONNECTED = 'not_connected',
  INVALID_METADATA = 'invalid_metadata',
  LOGGING_FAILURE = 'logging_failure',
  CAPABILITY_UNSUPPORTED = 'capability_unsupported',
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Classes
// ─────────────────────────────────────────────────────────────────────────────

export class SupervisorError extends Error {
  readonly code: SupervisorErrorCode;

  constructor(code: SupervisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SupervisorError';
    this.code = code;
  }
}

/** The radio binding cannot be loaded or is not powered on. */
export class AdapterUnavailableError extends SupervisorError {
  constructor(message = 'Bluetooth adapter unavailable', options?: { cause?: unknown }) {
    super(SupervisorErrorCode.ADAPTER_UNAVAILABLE, message, options);
    this.name = 'AdapterUnavailableError';
  }
}

export class ConnectFailedError extends SupervisorError {
  readonly address: string;

  constructor(address: string, reason: string, options?: { cause?: unknown }) {
    super(SupervisorErrorCode.CONNECT_FAILED, `Connection to ${address} failed: ${reason}`, options);
    this.name = 'ConnectFailedError';
    this.address = address;
  }
}

/** The link was up and has gone away underneath an operation. */
export class ConnectionLostError extends SupervisorError {
  readonly address: string;

  constructor(address: string, options?: { cause?: unknown }) {
    super(SupervisorErrorCode.CONNECTION_LOST, `Connection to ${address} has dropped`, options);
    this.name = 'ConnectionLostError';
    this.address = address;
  }
}

export class NotConnectedError extends SupervisorError {
  constructor(address: string, operation: string) {
    super(SupervisorErrorCode.NOT_CONNECTED, `${operation} requires a connected session (${address})`);
    this.name = 'NotConnectedError';
  }
}

export class InvalidMetadataError extends SupervisorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SupervisorErrorCode.INVALID_METADATA, message, options);
    this.name = 'InvalidMetadataError';
  }
}

export class LoggingFailureError extends SupervisorError {
  readonly path: string;

  constructor(path: string, operation: string, options?: { cause?: unknown }) {
    const reason = options?.cause === undefined ? 'unknown error' : describeError(options.cause);
    super(SupervisorErrorCode.LOGGING_FAILURE, `Metrics ${operation} failed for ${path}: ${reason}`, options);
    this.name = 'LoggingFailureError';
    this.path = path;
  }
}

export class CapabilityUnsupportedError extends SupervisorError {
  constructor(capability: string) {
    super(SupervisorErrorCode.CAPABILITY_UNSUPPORTED, `Adapter link does not support ${capability}`);
    this.name = 'CapabilityUnsupportedError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Render any thrown value as a single human-readable string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Name of the thrown value's constructor, used as the `exception` field of records
 */
export function errorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return typeof error;
}
