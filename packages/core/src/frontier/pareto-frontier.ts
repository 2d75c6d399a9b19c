/**
 * Pareto frontier reduction for two-metric trade-off plots.
 *
 * Pure functions: no I/O, no shared state.
 */

import type { MetricRecord } from '../types/index.js';
import type { MetricOrientation } from '../metrics/registry.js';

/** One run projected onto the chosen (x, y) metric pair. */
export interface MetricPoint {
  readonly algorithm: string;
  /** Instance label of the run the point came from. */
  readonly label: string;
  readonly x: number;
  readonly y: number;
}

export interface AxisOrientation {
  readonly x: MetricOrientation;
  readonly y: MetricOrientation;
}

/** Frontier and raw points of one algorithm. */
export interface PointSet {
  readonly algorithm: string;
  /** Non-dominated points, ordered with x improving. */
  readonly frontier: readonly MetricPoint[];
  /** Every projected point, in input order. */
  readonly all: readonly MetricPoint[];
}

/** Map a value so that larger always means better. */
function gain(value: number, orientation: MetricOrientation): number {
  return orientation === 'higher' ? value : -value;
}

/**
 * Project metric records onto two metrics. Records missing either metric,
 * or carrying a non-finite value for one, are dropped.
 */
export function projectRecords(
  records: readonly MetricRecord[],
  xMetric: string,
  yMetric: string,
): MetricPoint[] {
  const points: MetricPoint[] = [];
  for (const record of records) {
    const x = record.metrics[xMetric];
    const y = record.metrics[yMetric];
    if (x === undefined || y === undefined) continue;
    if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
    points.push({ algorithm: record.algorithm, label: record.name, x, y });
  }
  return points;
}

/**
 * True when `a` is at least as good as `b` on both axes and strictly
 * better on one.
 */
export function dominates(a: MetricPoint, b: MetricPoint, orientation: AxisOrientation): boolean {
  const ax = gain(a.x, orientation.x);
  const ay = gain(a.y, orientation.y);
  const bx = gain(b.x, orientation.x);
  const by = gain(b.y, orientation.y);
  return ax >= bx && ay >= by && (ax > bx || ay > by);
}

/**
 * Skyline sweep: visit points from best x to worst (ties: best y first)
 * and keep a point only when its y beats every point kept so far.
 *
 * The result is strictly monotonic on both axes: ordered with x improving
 * and y getting worse. Identical points collapse to one.
 */
export function computeFrontier(
  points: readonly MetricPoint[],
  orientation: AxisOrientation,
): MetricPoint[] {
  const sorted = [...points].sort((a, b) => {
    const byX = gain(b.x, orientation.x) - gain(a.x, orientation.x);
    if (byX !== 0) return byX;
    return gain(b.y, orientation.y) - gain(a.y, orientation.y);
  });

  const frontier: MetricPoint[] = [];
  let bestY = Number.NEGATIVE_INFINITY;
  for (const point of sorted) {
    const y = gain(point.y, orientation.y);
    if (y > bestY) {
      frontier.push(point);
      bestY = y;
    }
  }

  return frontier.reverse();
}

/**
 * Build the point set of one algorithm from its metric records.
 */
export function createPointSet(
  algorithm: string,
  records: readonly MetricRecord[],
  xMetric: string,
  yMetric: string,
  orientation: AxisOrientation,
): PointSet {
  const all = projectRecords(records, xMetric, yMetric);
  return { algorithm, frontier: computeFrontier(all, orientation), all };
}

/**
 * Group records by algorithm and reduce each group to a point set.
 * Algorithms whose records all lack one of the metrics get an empty set.
 */
export function createPointSets(
  records: readonly MetricRecord[],
  xMetric: string,
  yMetric: string,
  orientation: AxisOrientation,
): Map<string, PointSet> {
  const byAlgorithm = new Map<string, MetricRecord[]>();
  for (const record of records) {
    const group = byAlgorithm.get(record.algorithm);
    if (group) {
      group.push(record);
    } else {
      byAlgorithm.set(record.algorithm, [record]);
    }
  }

  const pointSets = new Map<string, PointSet>();
  for (const [algorithm, group] of byAlgorithm) {
    pointSets.set(algorithm, createPointSet(algorithm, group, xMetric, yMetric, orientation));
  }
  return pointSets;
}
