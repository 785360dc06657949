import * as fs from 'fs';
import { ENV_KEYS, loadEnvFile, loadSupervisorSettings, parseTransportKind } from './config';
import { makeTempDir, TempDir } from '../testing/tempFiles';

describe('supervisor configuration', () => {
  describe('loadSupervisorSettings', () => {
    test('should use the built-in defaults for an empty environment', () => {
      expect(loadSupervisorSettings({})).toEqual({
        metricsPath: 'metrics.csv',
        connectTimeoutMs: 10000,
        pollIntervalMs: 5000,
        baseBackoffMs: 2000,
        maxBackoffMs: 60000,
        scanTimeoutMs: 6000,
        transport: 'noble',
      });
    });

    test('should read overrides from the environment', () => {
      const settings = loadSupervisorSettings({
        [ENV_KEYS.METRICS_PATH]: ' logs/health.csv ',
        [ENV_KEYS.CONNECT_TIMEOUT]: '3000',
        [ENV_KEYS.POLL_INTERVAL]: '250',
        [ENV_KEYS.BASE_BACKOFF]: '1000',
        [ENV_KEYS.MAX_BACKOFF]: '8000',
        [ENV_KEYS.SCAN_TIMEOUT]: '2500',
        [ENV_KEYS.TRANSPORT]: 'simulated',
      });

      expect(settings).toEqual({
        metricsPath: 'logs/health.csv',
        connectTimeoutMs: 3000,
        pollIntervalMs: 250,
        baseBackoffMs: 1000,
        maxBackoffMs: 8000,
        scanTimeoutMs: 2500,
        transport: 'simulated',
      });
    });

    test('should raise durations below their floors', () => {
      const settings = loadSupervisorSettings({
        [ENV_KEYS.CONNECT_TIMEOUT]: '10',
        [ENV_KEYS.POLL_INTERVAL]: '5',
        [ENV_KEYS.BASE_BACKOFF]: '100',
      });

      expect(settings.connectTimeoutMs).toBe(1000);
      expect(settings.pollIntervalMs).toBe(100);
      expect(settings.baseBackoffMs).toBe(500);
    });

    test('should keep the maximum back-off at or above the base', () => {
      const settings = loadSupervisorSettings({
        [ENV_KEYS.BASE_BACKOFF]: '5000',
        [ENV_KEYS.MAX_BACKOFF]: '1000',
      });

      expect(settings.baseBackoffMs).toBe(5000);
      expect(settings.maxBackoffMs).toBe(5000);
    });

    test('should ignore values that are not non-negative numbers', () => {
      const settings = loadSupervisorSettings({
        [ENV_KEYS.POLL_INTERVAL]: 'soon',
        [ENV_KEYS.SCAN_TIMEOUT]: '-1',
      });

      expect(settings.pollIntervalMs).toBe(5000);
      expect(settings.scanTimeoutMs).toBe(6000);
    });
  });

  describe('parseTransportKind', () => {
    test('should accept known transports case-insensitively', () => {
      expect(parseTransportKind(' Simulated ')).toBe('simulated');
      expect(parseTransportKind('NOBLE')).toBe('noble');
      expect(parseTransportKind(undefined)).toBe('noble');
    });

    test('should fall back to noble for unknown values', () => {
      expect(parseTransportKind('bluez')).toBe('noble');
    });
  });

  describe('loadEnvFile', () => {
    const KEY = 'SUPERVISOR_CONFIG_TEST_VALUE';
    let temp: TempDir;

    beforeEach(() => {
      temp = makeTempDir('config');
      delete process.env[KEY];
    });

    afterEach(() => {
      temp.cleanup();
      delete process.env[KEY];
    });

    test('should load variables from a .env file', () => {
      const envPath = temp.file('.env');
      fs.writeFileSync(envPath, `${KEY}=from-file\n`);

      expect(loadEnvFile(envPath)).toBe(true);
      expect(process.env[KEY]).toBe('from-file');
    });

    test('should keep variables that are already set', () => {
      const envPath = temp.file('.env');
      fs.writeFileSync(envPath, `${KEY}=from-file\n`);
      process.env[KEY] = 'from-shell';

      loadEnvFile(envPath);
      expect(process.env[KEY]).toBe('from-shell');
    });

    test('should report a missing file', () => {
      expect(loadEnvFile(temp.file('missing.env'))).toBe(false);
    });
  });
});
