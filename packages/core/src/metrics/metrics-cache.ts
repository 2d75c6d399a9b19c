/**
 * Metrics cache keyed by run identity and metric-set version.
 *
 * The cache is the only mutable state shared across metric computations.
 * Entries for one key are independent of every other key, and recomputing
 * an entry from the same run always yields the same values.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from 'neverthrow';
import type { MetricValues, RunRecord } from '../types/index.js';
import { serializeParameters } from '../utils/serialize.js';
import { isNodeError, writeFileAtomic } from '../utils/atomic-write.js';

/** Bump when metric definitions change so stale cache entries are ignored. */
export const METRICS_VERSION = 1;

export interface MetricsCache {
  get(key: string): MetricValues | undefined;
  put(key: string, values: MetricValues): void;
}

export class MetricsCacheError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MetricsCacheError';
  }
}

/**
 * SHA-256 of a run's raw results: neighbours, distances, times and
 * attributes. A rewritten run file gets a new fingerprint.
 */
export function runFingerprint(run: RunRecord): string {
  return createHash('sha256')
    .update(JSON.stringify([run.count, run.neighbors, run.distances, run.times, run.attributes]))
    .digest('hex');
}

/**
 * Cache key for a run: dataset, run id, algorithm, instance name, k,
 * batch mode, the sorted parameter mapping, the raw-data fingerprint and
 * the metric-set version.
 */
export function metricsCacheKey(run: RunRecord, version: number = METRICS_VERSION): string {
  return JSON.stringify([
    run.dataset,
    run.id,
    run.algorithm,
    run.name,
    run.count,
    run.batchMode,
    serializeParameters(run.parameters),
    runFingerprint(run),
    version,
  ]);
}

export class InMemoryMetricsCache implements MetricsCache {
  protected readonly entries = new Map<string, MetricValues>();

  get(key: string): MetricValues | undefined {
    return this.entries.get(key);
  }

  put(key: string, values: MetricValues): void {
    this.entries.set(key, { ...values });
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Cache persisted as one JSON object (key → metric values).
 *
 * Loaded fully on `load`, written back with `save` only when changed.
 */
export class JsonFileMetricsCache extends InMemoryMetricsCache {
  private dirty = false;

  private constructor(private readonly filePath: string) {
    super();
  }

  static async load(filePath: string): Promise<Result<JsonFileMetricsCache, MetricsCacheError>> {
    const cache = new JsonFileMetricsCache(filePath);

    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return ok(cache);
      }
      const message = error instanceof Error ? error.message : String(error);
      return err(new MetricsCacheError(`Failed to read metrics cache: ${message}`));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return err(new MetricsCacheError(`Metrics cache is not valid JSON: ${filePath}`));
    }

    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return err(new MetricsCacheError(`Metrics cache must be a JSON object: ${filePath}`));
    }

    for (const [key, value] of Object.entries(parsed)) {
      const values = toMetricValues(value);
      if (values) cache.entries.set(key, values);
    }

    return ok(cache);
  }

  override put(key: string, values: MetricValues): void {
    super.put(key, values);
    this.dirty = true;
  }

  async save(): Promise<Result<void, MetricsCacheError>> {
    if (!this.dirty) return ok(undefined);

    try {
      const data = Object.fromEntries(this.entries);
      await writeFileAtomic(this.filePath, JSON.stringify(data) + '\n');
      this.dirty = false;
      return ok(undefined);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new MetricsCacheError(`Failed to write metrics cache: ${message}`));
    }
  }
}

function toMetricValues(value: unknown): MetricValues | null {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return null;

  const values: Record<string, number> = {};
  for (const [name, metric] of Object.entries(value)) {
    if (typeof metric === 'number') values[name] = metric;
  }
  return values;
}
