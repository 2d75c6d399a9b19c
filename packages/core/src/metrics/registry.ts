/**
 * Registry of named metrics derived from a single run.
 *
 * Each entry bundles a description (used for axis labels and CSV columns),
 * the direction in which the metric improves, an optional axis-limit hint,
 * and the compute function. A compute function returns undefined when the
 * run lacks the raw data it needs; the metric is then left out of the
 * MetricRecord.
 */

import type { GroundTruth, RunRecord } from '../types/index.js';
import {
  epsilonThreshold,
  knnThreshold,
  percentile,
  queriesPerSecond,
  recallValues,
  relativeError,
} from './quality-metrics.js';

/** Direction in which a metric improves. */
export type MetricOrientation = 'higher' | 'lower';

/** Everything a compute function may read. */
export interface MetricInput {
  readonly run: RunRecord;
  readonly groundTruth: GroundTruth;
  /** Absolute tie tolerance for `k-nn` recall. */
  readonly recallEpsilon: number;
}

export interface MetricDefinition {
  readonly description: string;
  readonly orientation: MetricOrientation;
  readonly lim?: readonly [number, number];
  readonly compute: (input: MetricInput) => number | undefined;
}

export type MetricRegistry = Readonly<Record<string, MetricDefinition>>;

const RECALL_LIM: readonly [number, number] = [0, 1.03];

function latencyPercentile(p: number): MetricDefinition {
  return {
    description: `Percentile ${p} (millis)`,
    orientation: 'lower',
    compute: ({ run }) => percentile(run.times.map((t) => t * 1000), p),
  };
}

function optionalAttribute(value: number | undefined): number | undefined {
  return value !== undefined && Number.isFinite(value) ? value : undefined;
}

function indexSizePerQps({ run }: MetricInput): number | undefined {
  const size = optionalAttribute(run.attributes.indexSize);
  const qps = queriesPerSecond(run.times);
  if (size === undefined || qps === undefined) return undefined;
  return size / qps;
}

export const METRICS = {
  'k-nn': {
    description: 'Recall',
    orientation: 'higher',
    lim: RECALL_LIM,
    compute: ({ run, groundTruth, recallEpsilon }) =>
      recallValues(groundTruth.distances, run.distances, run.count, knnThreshold, recallEpsilon).mean,
  },
  epsilon: {
    description: 'Epsilon 0.01 Recall',
    orientation: 'higher',
    lim: RECALL_LIM,
    compute: ({ run, groundTruth }) =>
      recallValues(groundTruth.distances, run.distances, run.count, epsilonThreshold, 0.01).mean,
  },
  largeepsilon: {
    description: 'Epsilon 0.1 Recall',
    orientation: 'higher',
    lim: RECALL_LIM,
    compute: ({ run, groundTruth }) =>
      recallValues(groundTruth.distances, run.distances, run.count, epsilonThreshold, 0.1).mean,
  },
  rel: {
    description: 'Relative Error',
    orientation: 'lower',
    compute: ({ run, groundTruth }) =>
      relativeError(groundTruth.distances, run.distances, run.count),
  },
  qps: {
    description: 'Queries per second (1/s)',
    orientation: 'higher',
    compute: ({ run }) => queriesPerSecond(run.times),
  },
  p50: latencyPercentile(50),
  p95: latencyPercentile(95),
  p99: latencyPercentile(99),
  p999: latencyPercentile(99.9),
  distcomp: {
    description: 'Distance computations',
    orientation: 'lower',
    compute: ({ run }) => {
      const total = optionalAttribute(run.attributes.distComps);
      if (total === undefined || run.times.length === 0) return undefined;
      const runCount = run.attributes.runCount ?? 1;
      return total / (runCount * run.times.length);
    },
  },
  build: {
    description: 'Index build time (s)',
    orientation: 'lower',
    compute: ({ run }) => optionalAttribute(run.attributes.buildTime),
  },
  candidates: {
    description: 'Candidates generated',
    orientation: 'lower',
    compute: ({ run }) => optionalAttribute(run.attributes.candidates),
  },
  indexsize: {
    description: 'Index size (kB)',
    orientation: 'lower',
    compute: ({ run }) => optionalAttribute(run.attributes.indexSize),
  },
  queriessize: {
    description: 'Index size (kB)/Queries per second (s)',
    orientation: 'lower',
    compute: indexSizePerQps,
  },
} satisfies MetricRegistry;

export type MetricName = keyof typeof METRICS;

export function isMetricName(name: string): name is MetricName {
  return Object.hasOwn(METRICS, name);
}

/** Registered metric names in registry order. */
export const METRIC_NAMES: readonly MetricName[] = Object.keys(METRICS).filter(isMetricName);

/**
 * Axis title for a pair of metrics, e.g.
 * "Recall-Queries per second (1/s) tradeoff - up and to the right is better".
 */
export function tradeoffLabel(x: MetricDefinition, y: MetricDefinition): string {
  const upDown = y.orientation === 'higher' ? 'up' : 'down';
  const leftRight = x.orientation === 'higher' ? 'right' : 'left';
  return `${x.description}-${y.description} tradeoff - ${upDown} and to the ${leftRight} is better`;
}
