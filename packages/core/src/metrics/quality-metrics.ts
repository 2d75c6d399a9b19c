/**
 * Pure quality and latency metric functions for ANN runs.
 *
 * All functions are stateless. Distance arrays are indexed by query id and
 * each row is sorted nearest first. Callers validate that run and ground
 * truth have one row per query before calling in.
 */

/**
 * Maps the true distances of one query to the largest distance a returned
 * neighbour may have and still count as correct.
 */
export type DistanceThreshold = (
  trueDistances: readonly number[],
  count: number,
  epsilon: number,
) => number;

/** Absolute tolerance around the k-th true distance. */
export const knnThreshold: DistanceThreshold = (trueDistances, count, epsilon) =>
  (trueDistances[count - 1] ?? Number.NaN) + epsilon;

/** Relative tolerance around the k-th true distance. */
export const epsilonThreshold: DistanceThreshold = (trueDistances, count, epsilon) =>
  (trueDistances[count - 1] ?? Number.NaN) * (1 + epsilon);

/** Per-query recall values with their mean and population standard deviation. */
export interface RecallValues {
  readonly mean: number;
  readonly std: number;
  readonly perQuery: readonly number[];
}

/**
 * Recall@k with distance-based tie tolerance.
 *
 * A returned neighbour is correct when its distance is at most the
 * threshold derived from the k-th true distance, so neighbours tied with
 * the k-th true neighbour count even when their index differs.
 * Only the first `count` returned neighbours of each query are considered.
 *
 * Returns mean 0 when there are no queries or count <= 0.
 */
export function recallValues(
  trueDistances: readonly (readonly number[])[],
  runDistances: readonly (readonly number[])[],
  count: number,
  threshold: DistanceThreshold,
  epsilon: number,
): RecallValues {
  if (count <= 0 || trueDistances.length === 0) {
    return { mean: 0, std: 0, perQuery: [] };
  }

  const perQuery: number[] = [];
  for (let i = 0; i < trueDistances.length; i++) {
    const truth = trueDistances[i] ?? [];
    const returned = (runDistances[i] ?? []).slice(0, count);
    const limit = threshold(truth, count, epsilon);

    let hits = 0;
    for (const d of returned) {
      // NaN limit (ground truth shorter than k) never matches
      if (d <= limit) hits++;
    }
    perQuery.push(hits / count);
  }

  const mean = perQuery.reduce((sum, r) => sum + r, 0) / perQuery.length;
  const variance = perQuery.reduce((sum, r) => sum + (r - mean) ** 2, 0) / perQuery.length;

  return { mean, std: Math.sqrt(variance), perQuery };
}

/**
 * Relative error: total returned distance over total true distance,
 * summed over the first `count` neighbours of every query.
 *
 * Returns undefined when the true total is below 0.01, where the ratio
 * is not meaningful.
 */
export function relativeError(
  trueDistances: readonly (readonly number[])[],
  runDistances: readonly (readonly number[])[],
  count: number,
): number | undefined {
  let totalTrue = 0;
  let totalRun = 0;

  for (let i = 0; i < trueDistances.length; i++) {
    for (const d of (trueDistances[i] ?? []).slice(0, count)) totalTrue += d;
    for (const d of (runDistances[i] ?? []).slice(0, count)) totalRun += d;
  }

  if (totalTrue < 0.01) return undefined;
  return totalRun / totalTrue;
}

/** Arithmetic mean, or undefined for an empty sequence. */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Percentile with linear interpolation between closest ranks.
 *
 * `p` is in [0, 100]. Returns undefined for an empty sequence.
 */
export function percentile(values: readonly number[], p: number): number | undefined {
  if (values.length === 0) return undefined;

  const sorted = [...values].sort((a, b) => a - b);
  const position = ((sorted.length - 1) * Math.min(Math.max(p, 0), 100)) / 100;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;

  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

/** Throughput as the inverse of the mean per-query time (seconds). */
export function queriesPerSecond(times: readonly number[]): number | undefined {
  const meanTime = mean(times);
  if (meanTime === undefined || meanTime <= 0) return undefined;
  return 1 / meanTime;
}
