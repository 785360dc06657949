/**
 * BLE Adapter Factory - platform-aware binding selector
 *
 * BLE_TRANSPORT=noble (default): @abandonware/noble
 * BLE_TRANSPORT=simulated: in-process simulated radio
 */

import type { TransportKind } from '../shared/config';
import { loadSupervisorSettings } from '../shared/config';
import { IBleAdapter } from './interfaces/IBleAdapter';
import { BLEPlatformConfig, getPlatformConfig } from './PlatformConfig';
import { bleLogger } from './BleLogger';
import { NobleTransport, isNobleLoadable } from './transports/NobleTransport';
import { SimulatedTransport } from './transports/SimulatedTransport';

export interface CreatedAdapter {
  adapter: IBleAdapter;
  config: BLEPlatformConfig;
}

/**
 * Create the adapter for a transport. When noble cannot be loaded the result is
 * a switched-off simulated radio, so callers see an unavailable adapter.
 */
export function createBleAdapter(transport: TransportKind = loadSupervisorSettings().transport): CreatedAdapter {
  if (transport === 'simulated') {
    bleLogger.info('Using simulated BLE transport', undefined, 'FACTORY');
    return { adapter: new SimulatedTransport(), config: getPlatformConfig('simulated') };
  }

  if (!isNobleLoadable()) {
    bleLogger.warn('Noble could not be loaded - no radio available', undefined, 'FACTORY');
    return { adapter: new SimulatedTransport({ available: false }), config: getPlatformConfig('simulated') };
  }

  const config = getPlatformConfig('noble');
  bleLogger.info(`Platform ${config.platform} - using @abandonware/noble`, undefined, 'FACTORY');
  return { adapter: new NobleTransport(), config };
}

let defaultAdapter: IBleAdapter | null = null;

/**
 * Process-wide adapter used when a Scanner or DeviceSession is built without one
 */
export function getDefaultAdapter(): IBleAdapter {
  if (!defaultAdapter) {
    defaultAdapter = createBleAdapter().adapter;
  }
  return defaultAdapter;
}

export function setDefaultAdapter(adapter: IBleAdapter | null): void {
  defaultAdapter = adapter;
}
