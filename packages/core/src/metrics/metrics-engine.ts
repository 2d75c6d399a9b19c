/**
 * Metrics engine: derives MetricRecords from raw runs.
 *
 * Failures are isolated to a single run. A malformed run is reported
 * through `onDiagnostic` and skipped; a metric whose raw inputs are
 * missing is simply absent from that run's record.
 */

import { ok, err, type Result } from 'neverthrow';
import type {
  Dataset,
  GroundTruth,
  MetricRecord,
  MetricValues,
  RunRecord,
} from '../types/index.js';
import { METRICS, type MetricRegistry } from './registry.js';
import { metricsCacheKey, type MetricsCache } from './metrics-cache.js';

/** Default absolute tie tolerance for k-nn recall. */
export const DEFAULT_RECALL_EPSILON = 1e-3;

export type RunRecordError = {
  readonly kind: 'malformed_record';
  readonly runId: string;
  readonly reason: string;
};

/** A run that was skipped while computing a batch. */
export interface MetricsDiagnostic {
  readonly runId: string;
  readonly dataset: string;
  readonly algorithm: string;
  readonly reason: string;
}

export interface ComputeMetricOptions {
  readonly recallEpsilon?: number;
  readonly registry?: MetricRegistry;
}

export interface ComputeAllMetricsOptions extends ComputeMetricOptions {
  /** Bypass cache lookups and overwrite the cached entries. */
  readonly forceRecompute?: boolean;
  readonly cache?: MetricsCache;
  readonly onDiagnostic?: (diagnostic: MetricsDiagnostic) => void;
}

/**
 * Check that a run's raw arrays line up with the ground truth.
 */
export function validateRun(
  run: RunRecord,
  groundTruth: GroundTruth,
): Result<void, RunRecordError> {
  const queryCount = groundTruth.distances.length;
  const malformed = (reason: string): Result<void, RunRecordError> =>
    err({ kind: 'malformed_record', runId: run.id, reason });

  if (!Number.isInteger(run.count) || run.count < 1) {
    return malformed(`count must be a positive integer, got ${run.count}`);
  }
  if (run.neighbors.length !== queryCount) {
    return malformed(`expected ${queryCount} neighbor rows, got ${run.neighbors.length}`);
  }
  if (run.distances.length !== queryCount) {
    return malformed(`expected ${queryCount} distance rows, got ${run.distances.length}`);
  }
  if (run.times.length !== queryCount) {
    return malformed(`expected ${queryCount} query times, got ${run.times.length}`);
  }

  for (let i = 0; i < queryCount; i++) {
    const neighbors = run.neighbors[i] ?? [];
    const distances = run.distances[i] ?? [];
    if (neighbors.length !== distances.length) {
      return malformed(
        `query ${i}: ${neighbors.length} neighbors but ${distances.length} distances`,
      );
    }
    const truth = groundTruth.distances[i] ?? [];
    if (truth.length < run.count) {
      return malformed(
        `query ${i}: ground truth has ${truth.length} neighbors, fewer than k=${run.count}`,
      );
    }
  }

  return ok(undefined);
}

/**
 * Compute one named metric for a run that has passed `validateRun`.
 *
 * Returns undefined for unknown names and when the run lacks the raw
 * data the metric needs.
 */
export function computeMetric(
  name: string,
  run: RunRecord,
  groundTruth: GroundTruth,
  options: ComputeMetricOptions = {},
): number | undefined {
  const registry: MetricRegistry = options.registry ?? METRICS;
  if (!Object.hasOwn(registry, name)) return undefined;
  const definition = registry[name];
  if (!definition) return undefined;

  const value = definition.compute({
    run,
    groundTruth,
    recallEpsilon: options.recallEpsilon ?? DEFAULT_RECALL_EPSILON,
  });

  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

/**
 * Compute every registered metric the run supports.
 */
export function computeMetricsForRun(
  run: RunRecord,
  groundTruth: GroundTruth,
  options: ComputeMetricOptions = {},
): Result<MetricRecord, RunRecordError> {
  return validateRun(run, groundTruth).map(() =>
    toMetricRecord(run, computeValidatedMetrics(run, groundTruth, options)),
  );
}

function computeValidatedMetrics(
  run: RunRecord,
  groundTruth: GroundTruth,
  options: ComputeMetricOptions,
): MetricValues {
  const registry: MetricRegistry = options.registry ?? METRICS;
  const metrics: Record<string, number> = {};
  for (const name of Object.keys(registry)) {
    const value = computeMetric(name, run, groundTruth, options);
    if (value !== undefined) metrics[name] = value;
  }
  return metrics;
}

/**
 * Compute metrics for every run of one dataset.
 *
 * Every run is validated first; malformed runs are skipped and reported
 * through `onDiagnostic`, even when the cache holds values for them.
 * Cached values are reused unless `forceRecompute` is set; freshly computed
 * values are written back to the cache. Runs are processed sequentially.
 */
export async function computeAllMetricsForRuns(
  dataset: Dataset,
  runs: Iterable<RunRecord> | AsyncIterable<RunRecord>,
  options: ComputeAllMetricsOptions = {},
): Promise<MetricRecord[]> {
  const records: MetricRecord[] = [];

  for await (const run of runs) {
    const valid = validateRun(run, dataset.groundTruth);
    if (valid.isErr()) {
      options.onDiagnostic?.({
        runId: run.id,
        dataset: dataset.metadata.name,
        algorithm: run.algorithm,
        reason: valid.error.reason,
      });
      continue;
    }

    const key = metricsCacheKey(run);
    const cached = options.forceRecompute ? undefined : options.cache?.get(key);
    const metrics = cached ?? computeValidatedMetrics(run, dataset.groundTruth, options);
    if (!cached) options.cache?.put(key, metrics);

    records.push(toMetricRecord(run, metrics, dataset.metadata.name));
  }

  return records;
}

function toMetricRecord(
  run: RunRecord,
  metrics: MetricValues,
  dataset: string = run.dataset,
): MetricRecord {
  return {
    runId: run.id,
    dataset,
    algorithm: run.algorithm,
    name: run.name,
    count: run.count,
    batchMode: run.batchMode,
    parameters: run.parameters,
    metrics: { ...metrics },
  };
}
