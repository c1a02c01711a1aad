/**
 * CSV export of report rows
 */

import type { Config } from '../config';
import { OUTPUT_COLUMNS, type OrderAnalyticsRecord } from './types';

export interface CsvOptions {
  /** Single-character field delimiter (default ",") */
  delimiter?: string;
}

function formatValue(value: string | number | null, delimiter: string): string {
  const s = value === null ? '' : String(value);
  if (s.includes(delimiter) || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

/**
 * Render report rows as CSV: a quoted header, then one line per record.
 * Null values become empty fields.
 */
export function toCsv(records: OrderAnalyticsRecord[], options: CsvOptions = {}): string {
  const delimiter = options.delimiter ?? ',';
  const header = OUTPUT_COLUMNS.map((column) => `"${column}"`).join(delimiter);
  const lines = records.map((record) =>
    OUTPUT_COLUMNS.map((column) => formatValue(record[column], delimiter)).join(delimiter)
  );
  return [header, ...lines].join('\n');
}

export function csvOptionsFromConfig(config: Pick<Config, 'CSV_DELIMITER'>): CsvOptions {
  return { delimiter: config.CSV_DELIMITER };
}
