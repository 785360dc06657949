import { DeviceSession } from './DeviceSession';
import { SessionState } from './BleBridgeTypes';
import { SimulatedPeripheral, SimulatedTransport } from './transports/SimulatedTransport';
import { MetricsLogger, parseExtra, readMetricRecords } from '../shared/metrics';
import {
  CapabilityUnsupportedError,
  ConnectFailedError,
  ConnectionLostError,
  NotConnectedError,
} from '../shared/errors';
import { makeTempDir, TempDir } from '../testing/tempFiles';

const ADDRESS = 'C0:FF:EE:00:00:01';

const flushAsync = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('DeviceSession', () => {
  let temp: TempDir;
  let metrics: MetricsLogger;
  let transport: SimulatedTransport;
  let peripheral: SimulatedPeripheral;

  beforeEach(() => {
    temp = makeTempDir('session');
    metrics = new MetricsLogger(temp.file('metrics.csv'));
    transport = new SimulatedTransport();
    peripheral = transport.addPeripheral({
      address: ADDRESS,
      name: 'Bench Tag',
      rssi: -58,
      attributes: { '2a19': Buffer.from([87]) },
    });
  });

  afterEach(() => {
    temp.cleanup();
  });

  const createSession = (overrides: { mtu?: number; address?: string } = {}) =>
    new DeviceSession({
      address: overrides.address ?? ADDRESS,
      adapter: transport,
      metrics,
      metadata: { site: 'lab' },
      mtu: overrides.mtu,
    });

  const recorded = () => readMetricRecords(metrics.path).map((row) => `${row.event}:${row.status}`);

  describe('Lifecycle', () => {
    test('should connect once and report connected', async () => {
      const session = createSession();
      const states: SessionState[] = [];
      session.on('stateChange', (state: SessionState) => states.push(state));

      await expect(session.connect()).resolves.toBe(true);
      await expect(session.connect()).resolves.toBe(true);

      expect(session.isConnected).toBe(true);
      expect(peripheral.openCount).toBe(1);
      expect(states).toEqual([SessionState.CONNECTING, SessionState.CONNECTED]);
      expect(recorded()).toEqual(['connect:ok']);
    });

    test('should serialize concurrent connects', async () => {
      const session = createSession();

      await expect(Promise.all([session.connect(), session.connect()])).resolves.toEqual([true, true]);
      expect(peripheral.openCount).toBe(1);
    });

    test('should tag records with the address and metadata', async () => {
      const session = createSession();
      await session.connect();

      const [row] = readMetricRecords(metrics.path);
      expect(row.extra).toBe(`{"address":"${ADDRESS}","site":"lab"}`);
    });

    test('should fail with ConnectFailedError when the link throws', async () => {
      peripheral.failOpens = 1;
      const session = createSession();

      const failure = session.connect();
      await expect(failure).rejects.toBeInstanceOf(ConnectFailedError);
      await expect(failure).rejects.toThrow(`Connection to ${ADDRESS} failed: Simulated connect failure for ${ADDRESS}`);
      expect(session.state).toBe(SessionState.DISCONNECTED);

      await expect(session.connect()).resolves.toBe(true);
      expect(recorded()).toEqual(['connect:error', 'connect:ok']);
    });

    test('should close the half-open link when connect fails', async () => {
      peripheral.failOpens = 1;
      const session = createSession();

      await expect(session.connect()).rejects.toBeInstanceOf(ConnectFailedError);

      expect(peripheral.closeCount).toBe(1);
      expect(peripheral.connected).toBe(false);
    });

    test('should still fail cleanly when closing the half-open link throws', async () => {
      peripheral.refuseOpens = 1;
      peripheral.failClose = true;
      const session = createSession();

      await expect(session.connect()).rejects.toThrow(`Connection to ${ADDRESS} failed: link did not come up`);

      expect(peripheral.closeCount).toBe(1);
      expect(session.state).toBe(SessionState.DISCONNECTED);
    });

    test('should fail when the link does not come up', async () => {
      peripheral.refuseOpens = 1;
      const session = createSession();

      await expect(session.connect()).rejects.toThrow(`Connection to ${ADDRESS} failed: link did not come up`);
      expect(recorded()).toEqual(['connect:failed']);
    });

    test('should fail for a peripheral that is not there', async () => {
      const session = createSession({ address: 'C0:FF:EE:00:00:99' });

      await expect(session.connect()).rejects.toBeInstanceOf(ConnectFailedError);
    });

    test('should disconnect cleanly and allow a later connect', async () => {
      const session = createSession();
      await session.connect();
      await session.disconnect();

      expect(session.state).toBe(SessionState.DISCONNECTED);
      expect(peripheral.connected).toBe(false);
      await expect(session.connect()).resolves.toBe(true);
      expect(recorded()).toEqual(['connect:ok', 'disconnect:ok', 'connect:ok']);
    });

    test('should never throw from disconnect', async () => {
      const session = createSession();
      await expect(session.disconnect()).resolves.toBeUndefined();

      await session.connect();
      peripheral.failClose = true;
      await expect(session.disconnect()).resolves.toBeUndefined();

      expect(session.state).toBe(SessionState.DISCONNECTED);
      const rows = readMetricRecords(metrics.path);
      expect(rows[1].event).toBe('disconnect');
      expect(rows[1].status).toBe('error');
      expect(rows[1].message).toBe(`Simulated disconnect failure for ${ADDRESS}`);
    });
  });

  describe('Connection loss', () => {
    test('should move to lost when the peripheral drops the link', async () => {
      const session = createSession();
      const lost = jest.fn();
      session.on('lost', lost);
      await session.connect();

      peripheral.drop();

      expect(session.state).toBe(SessionState.LOST);
      expect(session.isConnected).toBe(false);
      expect(lost).toHaveBeenCalledWith(ADDRESS);
      await expect(session.readRssi()).rejects.toBeInstanceOf(ConnectionLostError);
      await expect(session.readAttribute('2a19')).rejects.toBeInstanceOf(ConnectionLostError);
      expect(recorded()).toEqual(['connect:ok', 'connection_lost:error']);
    });

    test('should reconnect after a loss', async () => {
      const session = createSession();
      await session.connect();
      peripheral.drop();

      await expect(session.connect()).resolves.toBe(true);
      expect(session.state).toBe(SessionState.CONNECTED);
      expect(peripheral.openCount).toBe(2);
      await expect(session.readRssi()).resolves.toBe(-58);
    });
  });

  describe('Operations', () => {
    test('should reject operations before connect with NotConnectedError', async () => {
      const session = createSession();

      await expect(session.readRssi()).rejects.toBeInstanceOf(NotConnectedError);
      await expect(session.writeAttribute('2a06', Buffer.from([1]))).rejects.toThrow(
        `writeAttribute requires a connected session (${ADDRESS})`
      );
      await expect(session.startNotify('2a37', () => undefined)).rejects.toBeInstanceOf(NotConnectedError);
    });

    test('should read signal strength and record it', async () => {
      const session = createSession();
      await session.connect();

      await expect(session.readRssi()).resolves.toBe(-58);
      const rows = readMetricRecords(metrics.path);
      expect(rows[1].event).toBe('rssi');
      expect(rows[1].value).toBe('-58');
    });

    test('should return null when a signal read fails on a live link', async () => {
      const session = createSession();
      await session.connect();
      peripheral.failSignalReads = true;

      await expect(session.readRssi()).resolves.toBeNull();
      expect(session.isConnected).toBe(true);
      expect(recorded()).toEqual(['connect:ok']);
    });

    test('should return null when the link cannot report signal strength', async () => {
      transport.addPeripheral({ address: 'C0:FF:EE:00:00:02', capabilities: { signalStrength: false } });
      const session = createSession({ address: 'C0:FF:EE:00:00:02' });
      await session.connect();

      await expect(session.readRssi()).resolves.toBeNull();
    });

    test('should read and write attributes', async () => {
      const session = createSession();
      await session.connect();

      await expect(session.readAttribute('2A19')).resolves.toEqual(Buffer.from([87]));
      await session.writeAttribute('2a06', Buffer.from([1, 2]), true);

      expect(peripheral.writes).toEqual([{ id: '2a06', data: Buffer.from([1, 2]), ackRequired: true }]);
      const rows = readMetricRecords(metrics.path);
      expect(parseExtra(rows[1])).toEqual({ address: ADDRESS, attribute: '2A19', length: 1, site: 'lab' });
      expect(parseExtra(rows[2])).toEqual({ address: ADDRESS, attribute: '2a06', length: 2, ackRequired: true, site: 'lab' });
    });

    test('should surface a failed read that leaves the link up', async () => {
      const session = createSession();
      await session.connect();

      await expect(session.readAttribute('ffff')).rejects.toThrow('Attribute ffff not found on peripheral');
      expect(session.state).toBe(SessionState.CONNECTED);
    });
  });

  describe('Transfer unit', () => {
    test('should negotiate the requested size within the peripheral limit', async () => {
      const session = createSession({ mtu: 512 });
      await session.connect();

      expect(session.transferUnit).toBe(247);
      const rows = readMetricRecords(metrics.path);
      expect(rows.map((row) => `${row.event}:${row.status}:${row.value}`)).toEqual(['connect:ok:', 'mtu:ok:247']);
    });

    test('should skip negotiation when the link lacks the capability', async () => {
      transport.addPeripheral({ address: 'C0:FF:EE:00:00:03', capabilities: { transferUnit: false } });
      const session = createSession({ address: 'C0:FF:EE:00:00:03', mtu: 185 });
      await session.connect();

      expect(session.transferUnit).toBeNull();
      expect(recorded()).toEqual(['connect:ok']);
    });

    test('should stay connected when negotiation fails', async () => {
      peripheral.failTransferUnit = true;
      const session = createSession({ mtu: 185 });

      await expect(session.connect()).resolves.toBe(true);
      expect(session.transferUnit).toBeNull();
      expect(recorded()).toEqual(['connect:ok', 'mtu:error']);
    });
  });

  describe('Notifications', () => {
    test('should deliver notifications until stopped', async () => {
      const session = createSession();
      await session.connect();
      const received: number[] = [];

      await session.startNotify('2a37', (data) => {
        received.push(data[0]);
      });
      expect(session.subscribedAttributes).toEqual(['2a37']);
      peripheral.notify('2a37', Buffer.from([5]));

      await session.stopNotify('2a37');
      expect(peripheral.notify('2a37', Buffer.from([6]))).toBe(false);

      expect(received).toEqual([5]);
      expect(session.subscribedAttributes).toEqual([]);
      expect(recorded()).toEqual(['connect:ok', 'notify_start:ok', 'notify_stop:ok']);
    });

    test('should isolate callback failures from the session', async () => {
      const session = createSession();
      await session.connect();

      await session.startNotify('2a37', () => {
        throw new Error('callback failed');
      });
      await session.startNotify('2a38', async () => {
        throw new RangeError('async callback failed');
      });

      expect(() => peripheral.notify('2a37', Buffer.from([1]))).not.toThrow();
      peripheral.notify('2a38', Buffer.from([2]));
      await flushAsync();

      expect(session.isConnected).toBe(true);
      const failures = readMetricRecords(metrics.path).filter((row) => row.event === 'notify_callback');
      expect(failures.map((row) => [row.status, row.message, parseExtra(row).exception])).toEqual([
        ['error', 'callback failed', 'Error'],
        ['error', 'async callback failed', 'RangeError'],
      ]);
    });

    test('should refuse notifications when the link cannot deliver them', async () => {
      transport.addPeripheral({ address: 'C0:FF:EE:00:00:04', capabilities: { notifications: false } });
      const session = createSession({ address: 'C0:FF:EE:00:00:04' });
      await session.connect();

      await expect(session.startNotify('2a37', () => undefined)).rejects.toBeInstanceOf(CapabilityUnsupportedError);
    });

    test('should clear subscriptions on disconnect', async () => {
      const session = createSession();
      await session.connect();
      await session.startNotify('2a37', () => undefined);

      await session.disconnect();

      expect(session.subscribedAttributes).toEqual([]);
      expect(peripheral.subscribedIds).toEqual([]);
    });
  });
});
