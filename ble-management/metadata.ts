/**
 * Monitor metadata validation
 * Metadata is merged into every metric record, so only flat JSON scalars are allowed.
 */

import type { Metadata, MetadataValue } from '../ble-bridge/BleBridgeTypes';
import { InvalidMetadataError, describeError } from '../shared/errors';

function isMetadataValue(value: unknown): value is MetadataValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return false;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Accept undefined/null (no metadata) or a plain object of scalar values
 */
export function validateMetadata(value: unknown): Metadata {
  if (value === undefined || value === null) return {};

  if (!isPlainRecord(value)) {
    throw new InvalidMetadataError('Metadata must be a JSON object');
  }

  const metadata: Record<string, MetadataValue> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isMetadataValue(entry)) {
      throw new InvalidMetadataError(`Metadata field "${key}" must be a string, finite number, boolean or null`);
    }
    metadata[key] = entry;
  }
  return metadata;
}

/**
 * Parse metadata supplied as JSON text. Empty input means no metadata.
 */
export function parseMetadata(raw: string | null | undefined): Metadata {
  if (raw === undefined || raw === null || raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new InvalidMetadataError(`Metadata is not valid JSON: ${describeError(error)}`, { cause: error });
  }
  return validateMetadata(parsed);
}
