import { describe, it, expect, vi } from 'vitest';
import type { Dataset, GroundTruth, RunRecord } from '../types/index.js';
import {
  computeAllMetricsForRuns,
  computeMetric,
  computeMetricsForRun,
  validateRun,
  type MetricsDiagnostic,
} from './metrics-engine.js';
import { InMemoryMetricsCache, metricsCacheKey } from './metrics-cache.js';
import { METRICS, METRIC_NAMES, isMetricName, tradeoffLabel, type MetricRegistry } from './registry.js';

const groundTruth: GroundTruth = {
  neighbors: [
    [0, 1, 2],
    [3, 4, 5],
  ],
  distances: [
    [0.1, 0.2, 0.3],
    [0.1, 0.2, 0.3],
  ],
};

const dataset: Dataset = {
  groundTruth,
  metadata: { name: 'test-set', queryCount: 2 },
};

function makeRun(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    id: 'test-set/2/flat/run-a.json',
    algorithm: 'flat',
    name: 'flat(probes=4)',
    dataset: 'test-set',
    count: 2,
    batchMode: false,
    parameters: { probes: 4 },
    neighbors: [
      [0, 1],
      [3, 9],
    ],
    distances: [
      [0.1, 0.2],
      [0.1, 0.5],
    ],
    times: [0.01, 0.03],
    attributes: {},
    ...overrides,
  };
}

describe('registry', () => {
  it('should list metric names in registry order', () => {
    expect(METRIC_NAMES.slice(0, 5)).toEqual(['k-nn', 'epsilon', 'largeepsilon', 'rel', 'qps']);
  });

  it('should recognise registered names only', () => {
    expect(isMetricName('qps')).toBe(true);
    expect(isMetricName('toString')).toBe(false);
    expect(isMetricName('unknown')).toBe(false);
  });

  it('should build tradeoff labels from orientation', () => {
    expect(tradeoffLabel(METRICS['k-nn'], METRICS.qps)).toBe(
      'Recall-Queries per second (1/s) tradeoff - up and to the right is better',
    );
    expect(tradeoffLabel(METRICS['k-nn'], METRICS.p99)).toBe(
      'Recall-Percentile 99 (millis) tradeoff - down and to the right is better',
    );
  });
});

describe('validateRun', () => {
  it('should accept a well-formed run', () => {
    expect(validateRun(makeRun(), groundTruth).isOk()).toBe(true);
  });

  it('should reject a run with missing query rows', () => {
    const result = validateRun(makeRun({ neighbors: [[0, 1]] }), groundTruth);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        kind: 'malformed_record',
        runId: 'test-set/2/flat/run-a.json',
        reason: 'expected 2 neighbor rows, got 1',
      });
    }
  });

  it('should reject rows whose neighbours and distances differ in length', () => {
    const result = validateRun(
      makeRun({ distances: [[0.1, 0.2], [0.1]] }),
      groundTruth,
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('query 1: 2 neighbors but 1 distances');
    }
  });

  it('should reject k larger than the ground truth depth', () => {
    const result = validateRun(makeRun({ count: 4 }), groundTruth);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('query 0: ground truth has 3 neighbors, fewer than k=4');
    }
  });

  it('should reject a non-positive k', () => {
    const result = validateRun(makeRun({ count: 0 }), groundTruth);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.reason).toBe('count must be a positive integer, got 0');
    }
  });
});

describe('computeMetric', () => {
  it('should compute k-nn recall with tie tolerance', () => {
    expect(computeMetric('k-nn', makeRun(), groundTruth)).toBe(0.75);
  });

  it('should compute qps from mean query time', () => {
    expect(computeMetric('qps', makeRun(), groundTruth)).toBeCloseTo(50, 8);
  });

  it('should report latency percentiles in milliseconds', () => {
    expect(computeMetric('p50', makeRun(), groundTruth)).toBeCloseTo(20, 8);
  });

  it('should compute relative error', () => {
    expect(computeMetric('rel', makeRun(), groundTruth)).toBeCloseTo(1.5, 8);
  });

  it('should be absent for distcomp without the counter', () => {
    expect(computeMetric('distcomp', makeRun(), groundTruth)).toBeUndefined();
  });

  it('should normalise distcomp by queries and repetitions', () => {
    const run = makeRun({ attributes: { distComps: 400, runCount: 2 } });
    expect(computeMetric('distcomp', run, groundTruth)).toBe(100);
  });

  it('should compute queriessize from index size and qps', () => {
    const run = makeRun({ attributes: { indexSize: 1000 } });
    expect(computeMetric('queriessize', run, groundTruth)).toBeCloseTo(20, 8);
  });

  it('should return undefined for unknown metrics', () => {
    expect(computeMetric('unknown', makeRun(), groundTruth)).toBeUndefined();
  });

  it('should use a custom registry', () => {
    const registry: MetricRegistry = {
      queries: {
        description: 'Queries',
        orientation: 'higher',
        compute: ({ run }) => run.times.length,
      },
    };
    expect(computeMetric('queries', makeRun(), groundTruth, { registry })).toBe(2);
    expect(computeMetric('qps', makeRun(), groundTruth, { registry })).toBeUndefined();
  });

  it('should respect the recall epsilon option', () => {
    const run = makeRun({ distances: [[0.1, 0.25], [0.1, 0.2]] });

    expect(computeMetric('k-nn', run, groundTruth)).toBe(0.75);
    expect(computeMetric('k-nn', run, groundTruth, { recallEpsilon: 0.1 })).toBe(1);
  });

  it('should keep recall within [0, 1]', () => {
    for (let shift = 0; shift < 10; shift++) {
      const offset = shift * 0.05;
      const run = makeRun({
        distances: [
          [0.1 + offset, 0.2 + offset],
          [0.05, 0.1 + offset],
        ],
      });
      const recall = computeMetric('k-nn', run, groundTruth);
      expect(recall).toBeGreaterThanOrEqual(0);
      expect(recall).toBeLessThanOrEqual(1);
    }
  });
});

describe('computeMetricsForRun', () => {
  it('should omit metrics whose inputs are missing', () => {
    const result = computeMetricsForRun(makeRun(), groundTruth);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(Object.keys(result.value.metrics)).toEqual([
        'k-nn',
        'epsilon',
        'largeepsilon',
        'rel',
        'qps',
        'p50',
        'p95',
        'p99',
        'p999',
      ]);
      expect(result.value.runId).toBe('test-set/2/flat/run-a.json');
      expect(result.value.parameters).toEqual({ probes: 4 });
    }
  });

  it('should include attribute metrics when present', () => {
    const run = makeRun({ attributes: { buildTime: 12.5, candidates: 30 } });
    const result = computeMetricsForRun(run, groundTruth);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.metrics['build']).toBe(12.5);
      expect(result.value.metrics['candidates']).toBe(30);
      expect(result.value.metrics['indexsize']).toBeUndefined();
    }
  });
});

describe('computeAllMetricsForRuns', () => {
  it('should skip a malformed run and keep its siblings', async () => {
    const diagnostics: MetricsDiagnostic[] = [];
    const broken = makeRun({ id: 'broken.json', algorithm: 'tree', times: [0.01] });

    const records = await computeAllMetricsForRuns(dataset, [broken, makeRun()], {
      onDiagnostic: (d) => diagnostics.push(d),
    });

    expect(records).toHaveLength(1);
    expect(records[0]?.algorithm).toBe('flat');
    expect(diagnostics).toEqual([
      {
        runId: 'broken.json',
        dataset: 'test-set',
        algorithm: 'tree',
        reason: 'expected 2 query times, got 1',
      },
    ]);
  });

  it('should return an empty list for no runs', async () => {
    expect(await computeAllMetricsForRuns(dataset, [])).toEqual([]);
  });

  it('should accept async iterables', async () => {
    async function* runs(): AsyncGenerator<RunRecord> {
      yield makeRun();
      yield makeRun({ id: 'run-b.json', name: 'flat(probes=8)', parameters: { probes: 8 } });
    }

    const records = await computeAllMetricsForRuns(dataset, runs());

    expect(records.map((r) => r.runId)).toEqual(['test-set/2/flat/run-a.json', 'run-b.json']);
  });

  it('should label records with the dataset name', async () => {
    const run = makeRun({ dataset: 'other-name' });
    const records = await computeAllMetricsForRuns(dataset, [run]);

    expect(records[0]?.dataset).toBe('test-set');
  });

  it('should produce identical output on repeated calls with a cache', async () => {
    const cache = new InMemoryMetricsCache();
    const first = await computeAllMetricsForRuns(dataset, [makeRun()], { cache });
    const putSpy = vi.spyOn(cache, 'put');
    const second = await computeAllMetricsForRuns(dataset, [makeRun()], { cache });

    expect(second).toEqual(first);
    expect(putSpy).not.toHaveBeenCalled();
    expect(cache.size).toBe(1);
  });

  it('should reuse cached values unless recompute is forced', async () => {
    const run = makeRun();
    const cache = new InMemoryMetricsCache();
    cache.put(metricsCacheKey(run), { qps: 1 });

    const cached = await computeAllMetricsForRuns(dataset, [run], { cache });
    expect(cached[0]?.metrics).toEqual({ qps: 1 });

    const fresh = await computeAllMetricsForRuns(dataset, [run], { cache, forceRecompute: true });
    expect(fresh[0]?.metrics['k-nn']).toBe(0.75);
    expect(cache.get(metricsCacheKey(run))?.['k-nn']).toBe(0.75);
  });

  it('should keep separate values for trials of the same configuration', async () => {
    const cache = new InMemoryMetricsCache();
    const fast = makeRun({ times: [0.02, 0.02] });
    const slow = makeRun({ id: 'test-set/2/flat/run-b.json', times: [0.5, 0.5] });

    const records = await computeAllMetricsForRuns(dataset, [fast, slow], { cache });

    expect(records[0]?.metrics.qps).toBeCloseTo(50, 6);
    expect(records[1]?.metrics.qps).toBeCloseTo(2, 6);
    expect(cache.size).toBe(2);
  });

  it('should recompute a run whose results were rewritten', async () => {
    const cache = new InMemoryMetricsCache();
    await computeAllMetricsForRuns(dataset, [makeRun({ times: [0.02, 0.02] })], { cache });

    const rewritten = await computeAllMetricsForRuns(dataset, [makeRun({ times: [0.5, 0.5] })], {
      cache,
    });

    expect(rewritten[0]?.metrics.qps).toBeCloseTo(2, 6);
  });

  it('should skip a malformed run even when the cache holds values for it', async () => {
    const diagnostics: MetricsDiagnostic[] = [];
    const broken = makeRun({ times: [0.01] });
    const cache = new InMemoryMetricsCache();
    cache.put(metricsCacheKey(broken), { qps: 1 });

    const records = await computeAllMetricsForRuns(dataset, [broken], {
      cache,
      onDiagnostic: (d) => diagnostics.push(d),
    });

    expect(records).toEqual([]);
    expect(diagnostics).toEqual([
      {
        runId: 'test-set/2/flat/run-a.json',
        dataset: 'test-set',
        algorithm: 'flat',
        reason: 'expected 2 query times, got 1',
      },
    ]);
  });
});
