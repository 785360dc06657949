/**
 * Platform Configuration
 * Detects the current platform and describes what the selected binding supports
 */

import type { TransportKind } from '../shared/config';

// ─────────────────────────────────────────────────────────────────────────────
// Platform Detection
// ─────────────────────────────────────────────────────────────────────────────

export type PlatformType = 'windows' | 'macos' | 'linux' | 'unknown';

export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): PlatformType {
  switch (nodePlatform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    case 'linux':
      return 'linux';
    default:
      return 'unknown';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Platform Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface BLEPlatformConfig {
  platform: PlatformType;
  transportType: TransportKind;

  features: {
    supportsAdapterSelection: boolean;   // adapterId is honoured
    supportsPassiveScanning: boolean;
    supportsTransferUnitRequest: boolean;
    requiresRadio: boolean;
  };
}

const NOBLE_FEATURES: BLEPlatformConfig['features'] = {
  supportsAdapterSelection: false,
  supportsPassiveScanning: false,
  supportsTransferUnitRequest: false,
  requiresRadio: true,
};

const SIMULATED_FEATURES: BLEPlatformConfig['features'] = {
  supportsAdapterSelection: false,
  supportsPassiveScanning: true,
  supportsTransferUnitRequest: true,
  requiresRadio: false,
};

/**
 * Get the BLE configuration for a transport on the current platform
 */
export function getPlatformConfig(transportType: TransportKind, platform: PlatformType = detectPlatform()): BLEPlatformConfig {
  if (transportType === 'simulated') {
    return { platform, transportType, features: { ...SIMULATED_FEATURES } };
  }

  if (platform === 'unknown') {
    console.warn('[PlatformConfig] Unknown platform - trying Noble anyway');
  }
  return { platform, transportType, features: { ...NOBLE_FEATURES } };
}
