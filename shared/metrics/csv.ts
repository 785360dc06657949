/**
 * CSV encoding for metric rows
 */

export type MetricExtra = Record<string, unknown>;

const NEEDS_QUOTING = /[",\r\n]/;
const LINE_BREAKS = /\r\n|\r|\n/g;
const NON_ASCII = /[\u0080-\uffff]/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Rebuilds plain objects with sorted keys as JSON.stringify walks them
function sortedKeysReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = value[key];
  }
  return sorted;
}

export function escapeNonAscii(text: string): string {
  return text.replace(NON_ASCII, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Compact, key-sorted, ASCII-only JSON. Empty mappings encode as ''.
 * Values JSON cannot represent (bigint, cycles) are stringified individually.
 */
export function encodeExtra(extra: MetricExtra): string {
  if (Object.keys(extra).length === 0) return '';

  let json: string;
  try {
    json = JSON.stringify(extra, sortedKeysReplacer);
  } catch {
    const flattened: Record<string, string> = {};
    for (const [key, value] of Object.entries(extra)) {
      flattened[key] = stringifyValue(value);
    }
    json = JSON.stringify(flattened, sortedKeysReplacer);
  }
  return escapeNonAscii(json);
}

// String() throws on objects without a usable toPrimitive (null prototype)
function stringifyValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export function encodeField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function encodeRow(values: readonly string[]): string {
  return values.map(encodeField).join(',') + '\n';
}

// One record per physical line
export function singleLine(text: string): string {
  return text.replace(LINE_BREAKS, ' ');
}

export function formatValue(value: number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}
