/**
 * BLE Diagnostic Logger
 * Operator-facing log of adapter, session and supervisor activity.
 * The connection-health audit trail lives in the metrics file, not here.
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = raw?.trim().toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return fallback;
}

export interface BleLoggerOptions {
  level?: LogLevel;
  filePath?: string;
}

export class BleLogger {
  private level: LogLevel;
  private logFilePath = '';
  private logStream: fs.WriteStream | null = null;

  constructor(options: BleLoggerOptions = {}) {
    this.level = options.level ?? 'INFO';
    if (options.filePath) {
      this.openFile(options.filePath);
    }
  }

  private openFile(filePath: string): void {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.logStream = fs.createWriteStream(filePath, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.warn('BLE Logger: file logging disabled -', error.message);
        this.logStream = null;
        this.logFilePath = '';
      });
      this.logFilePath = filePath;
    } catch (error) {
      // Continue with console-only logging
      console.warn('BLE Logger: file logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
    }
  }

  private formatMessage(level: LogLevel, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data instanceof Error ? { error: data.message, name: data.name } : data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  log(level: LogLevel, message: string, data?: unknown, category: string = 'BLE'): void {
    if (!this.isEnabled(level)) return;

    const formattedMessage = this.formatMessage(level, category, message, data);

    if (level === 'ERROR') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  info(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('INFO', message, data, category);
  }

  warn(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('WARN', message, data, category);
  }

  error(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('ERROR', message, data, category);
  }

  debug(message: string, data?: unknown, category: string = 'BLE'): void {
    this.log('DEBUG', message, data, category);
  }

  // Connection-specific logging
  logConnection(address: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${address}`, details, 'CONNECTION');
  }

  logConnectionError(address: string, phase: string, error: unknown): void {
    this.error(`${phase} FAILED - ${address}`, {
      error: error instanceof Error ? error.message : String(error),
    }, 'CONNECTION');
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Singleton instance, configured from the environment at load time
export const bleLogger = new BleLogger({
  level: parseLogLevel(process.env.BLE_LOG_LEVEL),
  filePath: process.env.BLE_LOG_FILE || undefined,
});
