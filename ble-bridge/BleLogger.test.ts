import { BleLogger, parseLogLevel } from './BleLogger';

describe('BleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should parse log levels case-insensitively', () => {
    expect(parseLogLevel(' debug ')).toBe('DEBUG');
    expect(parseLogLevel('Warn')).toBe('WARN');
    expect(parseLogLevel('verbose')).toBe('INFO');
    expect(parseLogLevel(undefined, 'ERROR')).toBe('ERROR');
  });

  test('should drop messages below the configured level', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new BleLogger({ level: 'WARN' });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('Radio state poweredOff', undefined, 'NOBLE');

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] \[NOBLE\] Radio state poweredOff$/);
  });

  test('should append structured data and errors', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new BleLogger({ level: 'DEBUG' });

    logger.logConnectionError('AA:BB', 'CONNECT', new Error('refused'));

    expect(errorSpy.mock.calls[0][0]).toMatch(/\[ERROR\] \[CONNECTION\] CONNECT FAILED - AA:BB \| \{"error":"refused"\}$/);
  });
});
