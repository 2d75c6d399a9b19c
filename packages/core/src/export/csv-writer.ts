/**
 * CSV serialization of a metrics table.
 *
 * Numbers are written at full precision; undefined cells are empty.
 * Fields containing the separator, a quote or a line break are quoted.
 */

import type { CellValue, MetricsTable } from './metrics-table.js';

/** CSV column separator. */
const SEP = ',';

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function formatCell(value: CellValue): string {
  if (value === undefined) return '';
  return escapeCsvField(String(value));
}

/**
 * Generate a CSV string: a header row of column names, then one line per row.
 */
export function writeMetricsCsv(table: MetricsTable): string {
  const header = table.columns.map(escapeCsvField).join(SEP);
  const rows = table.rows.map((row) =>
    table.columns.map((column) => formatCell(row[column])).join(SEP),
  );
  return [header, ...rows].join('\n');
}
