import { describe, it, expect } from 'vitest';
import type { MetricRecord } from '../types/index.js';
import {
  computeFrontier,
  createPointSet,
  createPointSets,
  dominates,
  projectRecords,
  type AxisOrientation,
  type MetricPoint,
} from './pareto-frontier.js';

const HIGHER_BOTH: AxisOrientation = { x: 'higher', y: 'higher' };

function point(x: number, y: number, label = `${x}/${y}`): MetricPoint {
  return { algorithm: 'flat', label, x, y };
}

function xy(points: readonly MetricPoint[]): [number, number][] {
  return points.map((p) => [p.x, p.y]);
}

function makeRecord(
  algorithm: string,
  name: string,
  metrics: Record<string, number>,
): MetricRecord {
  return {
    runId: `${algorithm}/${name}.json`,
    dataset: 'ds',
    algorithm,
    name,
    count: 10,
    batchMode: false,
    parameters: {},
    metrics,
  };
}

/** Deterministic pseudo-random cloud (Park-Miller generator). */
function cloud(size: number, seed: number): MetricPoint[] {
  let state = seed;
  const next = (): number => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
  const points: MetricPoint[] = [];
  for (let i = 0; i < size; i++) {
    points.push(point(Math.round(next() * 100) / 100, Math.round(next() * 1000)));
  }
  return points;
}

describe('computeFrontier', () => {
  it('should keep every point of a strict trade-off', () => {
    const frontier = computeFrontier(
      [point(0.5, 100), point(0.6, 90), point(0.9, 10)],
      HIGHER_BOTH,
    );
    expect(xy(frontier)).toEqual([
      [0.5, 100],
      [0.6, 90],
      [0.9, 10],
    ]);
  });

  it('should drop dominated points', () => {
    const frontier = computeFrontier(
      [point(0.5, 50), point(0.6, 90), point(0.9, 10), point(0.7, 5)],
      HIGHER_BOTH,
    );
    expect(xy(frontier)).toEqual([
      [0.6, 90],
      [0.9, 10],
    ]);
  });

  it('should return an empty frontier for no points', () => {
    expect(computeFrontier([], HIGHER_BOTH)).toEqual([]);
  });

  it('should collapse identical points to one', () => {
    const frontier = computeFrontier([point(0.8, 40, 'a'), point(0.8, 40, 'b')], HIGHER_BOTH);
    expect(frontier).toHaveLength(1);
  });

  it('should keep the better y among points with equal x', () => {
    const frontier = computeFrontier([point(0.5, 10), point(0.5, 20)], HIGHER_BOTH);
    expect(xy(frontier)).toEqual([[0.5, 20]]);
  });

  it('should treat lower-is-better axes by their orientation', () => {
    // x = recall (higher is better), y = latency (lower is better)
    const frontier = computeFrontier(
      [point(0.5, 1), point(0.9, 5), point(0.7, 10)],
      { x: 'higher', y: 'lower' },
    );
    expect(xy(frontier)).toEqual([
      [0.5, 1],
      [0.9, 5],
    ]);
  });

  it('should be strictly monotonic and free of dominated points', () => {
    const points = cloud(200, 7);
    const frontier = computeFrontier(points, HIGHER_BOTH);

    expect(frontier.length).toBeGreaterThan(0);
    for (let i = 1; i < frontier.length; i++) {
      const previous = frontier[i - 1];
      const current = frontier[i];
      if (!previous || !current) throw new Error('unexpected gap');
      expect(current.x).toBeGreaterThan(previous.x);
      expect(current.y).toBeLessThan(previous.y);
    }
    for (const kept of frontier) {
      expect(points.some((p) => dominates(p, kept, HIGHER_BOTH))).toBe(false);
    }
  });

  it('should cover every discarded point with a frontier point', () => {
    const points = cloud(100, 42);
    const frontier = computeFrontier(points, HIGHER_BOTH);

    for (const p of points) {
      const covered = frontier.some(
        (f) => dominates(f, p, HIGHER_BOTH) || (f.x === p.x && f.y === p.y),
      );
      expect(covered).toBe(true);
    }
  });
});

describe('dominates', () => {
  it('should require strict improvement on one axis', () => {
    expect(dominates(point(1, 1), point(1, 1), HIGHER_BOTH)).toBe(false);
    expect(dominates(point(1, 2), point(1, 1), HIGHER_BOTH)).toBe(true);
    expect(dominates(point(2, 0), point(1, 1), HIGHER_BOTH)).toBe(false);
  });
});

describe('projectRecords', () => {
  it('should drop records missing either metric', () => {
    const points = projectRecords(
      [
        makeRecord('flat', 'a', { 'k-nn': 0.5, qps: 100 }),
        makeRecord('flat', 'b', { 'k-nn': 0.7 }),
        makeRecord('flat', 'c', { qps: 30 }),
      ],
      'k-nn',
      'qps',
    );
    expect(points).toEqual([{ algorithm: 'flat', label: 'a', x: 0.5, y: 100 }]);
  });

  it('should drop non-finite values', () => {
    const points = projectRecords(
      [makeRecord('flat', 'a', { 'k-nn': 0.5, qps: Number.POSITIVE_INFINITY })],
      'k-nn',
      'qps',
    );
    expect(points).toEqual([]);
  });
});

describe('createPointSets', () => {
  it('should reduce each algorithm separately', () => {
    const records = [
      makeRecord('flat', 'f1', { 'k-nn': 0.9, qps: 10 }),
      makeRecord('tree', 't1', { 'k-nn': 0.5, qps: 50 }),
      makeRecord('flat', 'f2', { 'k-nn': 0.8, qps: 5 }),
      makeRecord('tree', 't2', { 'k-nn': 0.6, qps: 40 }),
    ];

    const sets = createPointSets(records, 'k-nn', 'qps', HIGHER_BOTH);

    expect([...sets.keys()]).toEqual(['flat', 'tree']);
    expect(sets.get('flat')?.frontier.map((p) => p.label)).toEqual(['f1']);
    expect(sets.get('flat')?.all.map((p) => p.label)).toEqual(['f1', 'f2']);
    expect(sets.get('tree')?.frontier.map((p) => p.label)).toEqual(['t1', 't2']);
  });

  it('should give an empty point set when no record carries both metrics', () => {
    const set = createPointSet('flat', [makeRecord('flat', 'a', { qps: 1 })], 'k-nn', 'qps', HIGHER_BOTH);
    expect(set).toEqual({ algorithm: 'flat', frontier: [], all: [] });
  });
});
