/**
 * Exporter flow: every dataset in the store → metrics for all its runs →
 * one flat table → CSV file.
 *
 * Problems confined to one run or one dataset are reported as diagnostics
 * and the export continues with the rest.
 */

import { ok, err, type Result } from 'neverthrow';
import type { MetricRecord } from '../types/index.js';
import type { DatasetProvider } from '../datasets/dataset-provider.js';
import type { ResultsStore, ResultsStoreError } from '../results/results-store.js';
import type { MetricsCache } from '../metrics/metrics-cache.js';
import { computeAllMetricsForRuns } from '../metrics/metrics-engine.js';
import { flattenMetricRecords, type MetricsTable } from '../export/metrics-table.js';
import { writeMetricsCsv } from '../export/csv-writer.js';
import { writeFileAtomic } from '../utils/atomic-write.js';
import type { DiagnosticHandler } from './diagnostics.js';

export interface ExportOptions {
  readonly batchMode?: boolean;
  readonly forceRecompute?: boolean;
  readonly cache?: MetricsCache;
  readonly recallEpsilon?: number;
  /** Called before each dataset is processed. */
  readonly onDataset?: (dataset: string) => void;
  readonly onDiagnostic?: DiagnosticHandler;
}

export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportError';
  }
}

/** Yield `first`, then whatever `iterator` has left. */
async function* resume<T>(first: T, iterator: AsyncIterator<T>): AsyncGenerator<T> {
  yield first;
  for (;;) {
    const next = await iterator.next();
    if (next.done) return;
    yield next.value;
  }
}

/**
 * Compute metric records for every dataset in the store.
 *
 * Datasets with no stored runs, or whose ground truth cannot be loaded,
 * contribute no records. A dataset whose only files are unreadable reports
 * those files, not an empty dataset. Each dataset's runs are read once.
 */
export async function collectExportRecords(
  store: ResultsStore,
  provider: DatasetProvider,
  options: ExportOptions = {},
): Promise<Result<MetricRecord[], ResultsStoreError>> {
  const datasets = await store.listDatasets();
  if (datasets.isErr()) return err(datasets.error);

  const batchMode = options.batchMode ?? false;
  const records: MetricRecord[] = [];

  for (const name of datasets.value) {
    options.onDataset?.(name);

    let invalidFiles = 0;
    const stored = store.iterateRuns(name, {
      batchMode,
      onDiagnostic: (d) => {
        invalidFiles += 1;
        options.onDiagnostic?.({ kind: 'invalid_file', dataset: name, path: d.path, reason: d.reason });
      },
    });
    const iterator = stored[Symbol.asyncIterator]();

    const first = await iterator.next();
    if (first.done) {
      if (invalidFiles === 0) options.onDiagnostic?.({ kind: 'empty_dataset', dataset: name });
      continue;
    }

    const dataset = await provider.getDataset(name);
    if (dataset.isErr()) {
      await iterator.return?.();
      options.onDiagnostic?.({
        kind: 'dataset_unavailable',
        dataset: name,
        reason: dataset.error.message,
      });
      continue;
    }

    const runs = resume(first.value, iterator);

    const datasetRecords = await computeAllMetricsForRuns(dataset.value, runs, {
      forceRecompute: options.forceRecompute,
      cache: options.cache,
      recallEpsilon: options.recallEpsilon,
      onDiagnostic: (d) =>
        options.onDiagnostic?.({
          kind: 'skipped_run',
          dataset: d.dataset,
          runId: d.runId,
          algorithm: d.algorithm,
          reason: d.reason,
        }),
    });
    records.push(...datasetRecords);
  }

  return ok(records);
}

/**
 * Write the table as CSV. Nothing is written for an empty table.
 *
 * Returns whether a file was written.
 */
export async function writeMetricsTable(
  filePath: string,
  table: MetricsTable,
): Promise<Result<boolean, ExportError>> {
  if (table.rows.length === 0) return ok(false);

  try {
    await writeFileAtomic(filePath, writeMetricsCsv(table) + '\n');
    return ok(true);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new ExportError(`Failed to write ${filePath}: ${message}`));
  }
}

/**
 * Full export: collect, flatten, write.
 */
export async function exportMetrics(
  store: ResultsStore,
  provider: DatasetProvider,
  filePath: string,
  options: ExportOptions = {},
): Promise<Result<MetricsTable & { readonly written: boolean }, ResultsStoreError | ExportError>> {
  const records = await collectExportRecords(store, provider, options);
  if (records.isErr()) return err(records.error);

  const table = flattenMetricRecords(records.value);
  const written = await writeMetricsTable(filePath, table);
  if (written.isErr()) return err(written.error);

  return ok({ ...table, written: written.value });
}
