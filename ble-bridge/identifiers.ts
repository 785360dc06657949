import { BLUETOOTH_BASE_UUID_SUFFIX } from './BleBridgeConstants';

// Addresses compare case-insensitively, ignoring surrounding whitespace
export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Canonical service/attribute id: lower case, no dashes, and 128-bit ids built
 * on the Bluetooth base UUID collapsed to their 16-bit form ("180f").
 */
export function normalizeServiceId(id: string): string {
  const compact = id.trim().toLowerCase().replace(/-/g, '');
  if (compact.length === 32 && compact.startsWith('0000') && compact.endsWith(BLUETOOTH_BASE_UUID_SUFFIX)) {
    return compact.slice(4, 8);
  }
  return compact;
}
