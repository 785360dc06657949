/**
 * Metrics Reader
 * Parses the metrics CSV back into rows for tailing consumers and tests.
 */

import * as fs from 'fs';
import { METRICS } from '../../ble-bridge/BleBridgeConstants';
import { bleLogger } from '../../ble-bridge/BleLogger';
import { describeError } from '../errors';
import type { MetricField } from './MetricsLogger';
import type { MetricExtra } from './csv';

export type MetricRow = Partial<Record<MetricField, string>>;

// Split CSV text into records of raw fields (RFC 4180 quoting)
function tokenize(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  // Trailing record without a final newline
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

export function parseMetricsCsv(text: string): MetricRow[] {
  const [header, ...records] = tokenize(text);
  if (!header) return [];

  return records.map((values) => {
    const row: MetricRow = {};
    header.forEach((column, index) => {
      if (isColumn(column)) {
        row[column] = values[index] ?? '';
      }
    });
    return row;
  });
}

/**
 * Read every record in the file. A missing file reads as no records.
 */
export function readMetricRecords(filePath: string): MetricRow[] {
  if (!fs.existsSync(filePath)) return [];
  return parseMetricsCsv(fs.readFileSync(filePath, 'utf8'));
}

/** Decode a row's `extra` column; empty or malformed JSON yields {} */
export function parseExtra(row: MetricRow): MetricExtra {
  if (!row.extra) return {};
  try {
    const parsed: unknown = JSON.parse(row.extra);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch (error) {
    bleLogger.debug(`Unreadable extra column: ${describeError(error)}`, undefined, 'METRICS');
  }
  return {};
}

const COLUMN_NAMES: ReadonlySet<string> = new Set<string>(METRICS.FIELDS);

function isColumn(name: string): name is MetricField {
  return COLUMN_NAMES.has(name);
}
