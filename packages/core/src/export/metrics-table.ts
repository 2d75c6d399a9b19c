/**
 * Flatten metric records into a table with one row per record.
 *
 * Columns are the fixed identity columns followed by the union of metric
 * names seen in any record: registered metrics in registry order first,
 * then any others alphabetically. Cells for metrics a record lacks are
 * left undefined.
 */

import type { MetricRecord } from '../types/index.js';
import { METRIC_NAMES } from '../metrics/registry.js';
import { serializeParameters } from '../utils/serialize.js';

export const IDENTITY_COLUMNS = [
  'dataset',
  'algorithm',
  'name',
  'count',
  'batch_mode',
  'parameters',
] as const;

export type CellValue = string | number | boolean | undefined;

export type TableRow = Readonly<Record<string, CellValue>>;

export interface MetricsTable {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
}

export function flattenMetricRecords(records: readonly MetricRecord[]): MetricsTable {
  const seen = new Set<string>();
  for (const record of records) {
    for (const name of Object.keys(record.metrics)) seen.add(name);
  }

  const registered: string[] = METRIC_NAMES.filter((name) => seen.has(name));
  const extra = [...seen].filter((name) => !registered.includes(name)).sort();
  const metricColumns = [...registered, ...extra];

  const rows = records.map((record): TableRow => {
    const row: Record<string, CellValue> = {
      dataset: record.dataset,
      algorithm: record.algorithm,
      name: record.name,
      count: record.count,
      batch_mode: record.batchMode,
      parameters: serializeParameters(record.parameters),
    };
    for (const column of metricColumns) {
      row[column] = record.metrics[column];
    }
    return row;
  });

  return { columns: [...IDENTITY_COLUMNS, ...metricColumns], rows };
}
