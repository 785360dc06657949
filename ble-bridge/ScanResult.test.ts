import { ScanResult } from './ScanResult';
import { normalizeAddress, normalizeServiceId } from './identifiers';

describe('identifiers', () => {
  test('should collapse Bluetooth base UUIDs to their short form', () => {
    expect(normalizeServiceId('0000180F-0000-1000-8000-00805F9B34FB')).toBe('180f');
    expect(normalizeServiceId(' 180F ')).toBe('180f');
  });

  test('should keep vendor UUIDs in compact lower case', () => {
    expect(normalizeServiceId('6E400001-B5A3-F393-E0A9-E50E24DCCA9E')).toBe('6e400001b5a3f393e0a9e50e24dcca9e');
  });

  test('should compare addresses case-insensitively', () => {
    expect(normalizeAddress(' AA:BB:CC:00:11:22 ')).toBe('aa:bb:cc:00:11:22');
  });
});

describe('ScanResult', () => {
  test('should normalize and de-duplicate service ids in order', () => {
    const result = new ScanResult({
      address: 'AA:BB:CC:00:11:22',
      serviceIds: ['0000180F-0000-1000-8000-00805F9B34FB', 'ABCD', '180f'],
    });

    expect(result.serviceIds).toEqual(['180f', 'abcd']);
  });

  test('should be immutable', () => {
    const result = new ScanResult({ address: 'AA:BB:CC:00:11:22', extra: { source: 'test' } });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.serviceIds)).toBe(true);
    expect(Object.isFrozen(result.extra)).toBe(true);
  });

  describe('fromObservation', () => {
    test('should prefer advertisement values and the peripheral name', () => {
      const result = ScanResult.fromObservation(
        { address: 'AA:BB:CC:00:11:22', name: 'Bench Sensor', rssi: -80, serviceIds: ['aaaa'] },
        { localName: 'Adv Name', rssi: -55, serviceIds: ['180f'], connectable: true, txPower: 4 },
        1234
      );

      expect(result.name).toBe('Bench Sensor');
      expect(result.rssi).toBe(-55);
      expect(result.serviceIds).toEqual(['180f']);
      expect(result.connectable).toBe(true);
      expect(result.txPower).toBe(4);
      expect(result.observedAt).toBe(1234);
    });

    test('should fall back to peripheral values', () => {
      const result = ScanResult.fromObservation(
        { address: 'AA:BB:CC:00:11:22', rssi: -80, serviceIds: ['aaaa'] },
        { localName: 'Adv Name' }
      );

      expect(result.name).toBe('Adv Name');
      expect(result.rssi).toBe(-80);
      expect(result.serviceIds).toEqual(['aaaa']);
    });

    test('should keep binding details in extra', () => {
      const result = ScanResult.fromObservation(
        { address: 'AA:BB:CC:00:11:22', details: { addressType: 'random' } },
        { platformData: { id: 'p1' } }
      );

      expect(result.extra).toEqual({ details: { addressType: 'random' }, platformData: { id: 'p1' } });
    });
  });

  describe('toJSON', () => {
    test('should project absent values as null and payloads as hex', () => {
      const result = new ScanResult({
        address: 'AA:BB:CC:00:11:22',
        rssi: -61,
        serviceIds: ['180f'],
        manufacturerData: new Map([[0x004c, Buffer.from([0x01, 0x02])]]),
        serviceData: new Map([['180f', Buffer.from([0x64])]]),
      });

      expect(result.toJSON()).toEqual({
        address: 'AA:BB:CC:00:11:22',
        name: null,
        rssi: -61,
        serviceIds: ['180f'],
        manufacturerData: { '76': '0102' },
        serviceData: { '180f': '64' },
        connectable: null,
        txPower: null,
        observedAt: null,
      });
    });

    test('should omit empty optional sections', () => {
      const json = new ScanResult({ address: 'AA:BB:CC:00:11:22', name: 'Tag' }).toJSON();

      expect(json).not.toHaveProperty('manufacturerData');
      expect(json).not.toHaveProperty('serviceData');
      expect(json).not.toHaveProperty('extra');
      expect(json.name).toBe('Tag');
    });
  });
});
