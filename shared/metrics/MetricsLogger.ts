/**
 * Metrics Logger
 *
 * Append-only CSV audit trail of connection health. Records are written with
 * one synchronous append per line and no buffering, so a tailing reader sees
 * each record as soon as `log` returns. Storage failures are reported through
 * `onFailure` and never reach the caller.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { AsyncLock } from '../AsyncLock';
import { LoggingFailureError, describeError, errorName } from '../errors';
import { METRICS, METRIC_STATUS } from '../../ble-bridge/BleBridgeConstants';
import { bleLogger } from '../../ble-bridge/BleLogger';
import { MetricExtra, encodeExtra, encodeRow, formatValue, singleLine } from './csv';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MetricField = (typeof METRICS.FIELDS)[number];

export const DEFAULT_FIELDS: readonly MetricField[] = METRICS.FIELDS;

export interface LogOptions {
  status?: string | null;
  value?: number | null;
  message?: string | null;
  extra?: MetricExtra | null;
}

export interface TimerOptions {
  status?: string;
  errorStatus?: string;
  extra?: MetricExtra;
}

export interface MetricsLoggerOptions {
  fields?: readonly MetricField[];
  staticExtra?: MetricExtra;
  clock?: () => Date;
  onFailure?: (error: LoggingFailureError) => void;
}

/** One row as written, before the timestamp is assigned. */
interface PendingRecord {
  event: string;
  status: string;
  value: string;
  message: string;
  extra: string;
}

export interface MetricRecord {
  timestamp: string;
  event: string;
  status: string;
  value: string;
  message: string;
  extra: string;
}

const COLUMN_NAMES: ReadonlySet<string> = new Set<string>(METRICS.FIELDS);

function isMetricField(name: string): name is MetricField {
  return COLUMN_NAMES.has(name);
}

function yieldToEventLoop(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

// ─────────────────────────────────────────────────────────────────────────────
// Metrics Logger
// ─────────────────────────────────────────────────────────────────────────────

export class MetricsLogger {
  readonly path: string;
  readonly fields: readonly MetricField[];

  private readonly staticExtra: MetricExtra;
  private readonly clock: () => Date;
  private readonly onFailure: (error: LoggingFailureError) => void;
  private readonly context = new AsyncLocalStorage<readonly MetricExtra[]>();
  private readonly writeLock = new AsyncLock();
  private lastTimestampMs = Number.NEGATIVE_INFINITY;

  constructor(filePath: string, options: MetricsLoggerOptions = {}) {
    const fields = options.fields ? Array.from(new Set(options.fields)) : [...DEFAULT_FIELDS];
    if (fields.length === 0) {
      throw new RangeError('fields must contain at least one column');
    }
    for (const field of fields) {
      if (!isMetricField(field)) {
        throw new RangeError(`unknown metrics column: ${String(field)}`);
      }
    }

    this.path = path.resolve(filePath);
    this.fields = fields;
    this.staticExtra = { ...(options.staticExtra ?? {}) };
    this.clock = options.clock ?? (() => new Date());
    this.onFailure = options.onFailure ?? ((error) => bleLogger.warn(error.message, undefined, 'METRICS'));

    this.ensureHeader();
  }

  /**
   * Write the header row only when the file is absent or empty
   */
  private ensureHeader(): void {
    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      if (fs.existsSync(this.path) && fs.statSync(this.path).size > 0) {
        return;
      }
      fs.appendFileSync(this.path, encodeRow(this.fields), 'utf8');
    } catch (error) {
      this.onFailure(new LoggingFailureError(this.path, 'header write', { cause: error }));
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Logging
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Append one record synchronously
   */
  log(event: string, options: LogOptions = {}): void {
    const pending = this.tryPrepare(event, options);
    if (pending) {
      this.write(pending);
    }
  }

  /**
   * Non-blocking variant. Context fields are captured now; the physical write
   * happens after yielding, in the order logAsync was called.
   */
  logAsync(event: string, options: LogOptions = {}): Promise<void> {
    const pending = this.tryPrepare(event, options);
    if (!pending) return Promise.resolve();
    return this.writeLock.run(async () => {
      await yieldToEventLoop();
      this.write(pending);
    });
  }

  logStatus(event: string, status: string, options: Omit<LogOptions, 'status'> = {}): void {
    this.log(event, { ...options, status });
  }

  /**
   * Log loosely-typed payloads; keys that are not columns go to `extra`
   */
  logMany(records: Iterable<Record<string, unknown>>): void {
    for (const payload of records) {
      const extra: MetricExtra = {};
      for (const [key, value] of Object.entries(payload)) {
        if (!isMetricField(key)) {
          extra[key] = value;
        }
      }

      const rawValue = payload.value;
      this.log(payload.event === undefined ? 'unknown' : String(payload.event), {
        status: payload.status === undefined || payload.status === null ? null : String(payload.status),
        value: rawValue === undefined || rawValue === null ? null : Number(rawValue),
        message: payload.message === undefined || payload.message === null ? null : String(payload.message),
        extra,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Scopes
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` with `extra` merged into every record logged inside it.
   * The fields are gone once `fn` returns, throws or its promise settles.
   */
  scope<T>(extra: MetricExtra, fn: () => T): T {
    return this.context.run([...this.currentStack(), { ...extra }], fn);
  }

  /**
   * A scope not tied to a block; fields apply to records logged through the
   * returned handle until it is closed.
   */
  openScope(extra: MetricExtra): MetricsScope {
    return new MetricsScope(this, extra);
  }

  /**
   * Time `fn`, logging exactly one record: `status` with the duration on
   * success, or `errorStatus` with the cause on failure (then re-thrown).
   */
  async timer<T>(event: string, fn: () => Promise<T> | T, options: TimerOptions = {}): Promise<T> {
    const payload: MetricExtra = { ...(options.extra ?? {}) };
    const start = performance.now();

    try {
      const result = await this.scope(payload, fn);
      const durationMs = performance.now() - start;
      this.log(event, {
        status: options.status ?? METRIC_STATUS.OK,
        value: durationMs,
        extra: { ...payload, durationMs },
      });
      return result;
    } catch (error) {
      const durationMs = performance.now() - start;
      this.log(event, {
        status: options.errorStatus ?? METRIC_STATUS.ERROR,
        value: durationMs,
        message: describeError(error),
        extra: { ...payload, exception: errorName(error), durationMs },
      });
      throw error;
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private currentStack(): readonly MetricExtra[] {
    return this.context.getStore() ?? [];
  }

  private combinedExtra(extra: MetricExtra | null | undefined): MetricExtra {
    const payload: MetricExtra = { ...this.staticExtra };
    for (const layer of this.currentStack()) {
      Object.assign(payload, layer);
    }
    if (extra) {
      Object.assign(payload, extra);
    }
    return payload;
  }

  private tryPrepare(event: string, options: LogOptions): PendingRecord | null {
    try {
      return this.prepare(event, options);
    } catch (error) {
      this.onFailure(new LoggingFailureError(this.path, `encoding of "${event}"`, { cause: error }));
      return null;
    }
  }

  private prepare(event: string, options: LogOptions): PendingRecord {
    return {
      event,
      status: options.status ?? '',
      value: formatValue(options.value),
      message: options.message ? singleLine(options.message) : '',
      extra: encodeExtra(this.combinedExtra(options.extra)),
    };
  }

  private timestamp(): string {
    let now: number;
    try {
      now = this.clock().getTime();
    } catch {
      now = Date.now();
    }
    if (Number.isNaN(now)) {
      now = Date.now();
    }

    // Never let a row's timestamp go backwards relative to the previous one
    this.lastTimestampMs = Math.max(this.lastTimestampMs, now);
    return new Date(this.lastTimestampMs).toISOString();
  }

  private write(pending: PendingRecord): void {
    const record: MetricRecord = { timestamp: this.timestamp(), ...pending };
    const line = encodeRow(this.fields.map((field) => record[field]));

    try {
      fs.appendFileSync(this.path, line, 'utf8');
    } catch (error) {
      this.onFailure(new LoggingFailureError(this.path, `write of "${pending.event}"`, { cause: error }));
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Open Scope Handle
// ─────────────────────────────────────────────────────────────────────────────

export class MetricsScope {
  private fields: MetricExtra | null;

  constructor(private readonly logger: MetricsLogger, fields: MetricExtra) {
    this.fields = { ...fields };
  }

  get isOpen(): boolean {
    return this.fields !== null;
  }

  log(event: string, options: LogOptions = {}): void {
    this.logger.log(event, this.withFields(options));
  }

  logAsync(event: string, options: LogOptions = {}): Promise<void> {
    return this.logger.logAsync(event, this.withFields(options));
  }

  close(): void {
    this.fields = null;
  }

  private withFields(options: LogOptions): LogOptions {
    if (!this.fields) return options;
    return { ...options, extra: { ...this.fields, ...(options.extra ?? {}) } };
  }
}
