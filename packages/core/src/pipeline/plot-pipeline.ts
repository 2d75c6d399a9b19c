/**
 * Plotter flow: runs of one dataset → metrics → per-algorithm Pareto
 * frontiers on the chosen metric pair → SVG chart.
 */

import { ok, err, type Result } from 'neverthrow';
import type { MetricRecord } from '../types/index.js';
import type { DatasetProvider } from '../datasets/dataset-provider.js';
import type { ResultsStore } from '../results/results-store.js';
import type { MetricsCache } from '../metrics/metrics-cache.js';
import { computeAllMetricsForRuns } from '../metrics/metrics-engine.js';
import { METRICS, isMetricName, tradeoffLabel, type MetricDefinition } from '../metrics/registry.js';
import { createPointSets, type PointSet } from '../frontier/pareto-frontier.js';
import type { AxisScale } from '../plot/scales.js';
import { renderTradeoffChart, type ChartSeries } from '../plot/svg-chart.js';
import type { DiagnosticHandler } from './diagnostics.js';

export type PlotError =
  | { readonly kind: 'unknown_metric'; readonly metric: string }
  | { readonly kind: 'dataset_unavailable'; readonly dataset: string; readonly message: string }
  | { readonly kind: 'no_data'; readonly dataset: string };

export interface PlotRequest {
  readonly dataset: string;
  readonly xMetric: string;
  readonly yMetric: string;
  /** Only runs with this neighbour count. */
  readonly count?: number;
  readonly batchMode?: boolean;
  readonly forceRecompute?: boolean;
  readonly cache?: MetricsCache;
  readonly recallEpsilon?: number;
  readonly onDiagnostic?: DiagnosticHandler;
}

export interface PlotData {
  readonly dataset: string;
  readonly x: MetricDefinition;
  readonly y: MetricDefinition;
  readonly records: readonly MetricRecord[];
  readonly pointSets: ReadonlyMap<string, PointSet>;
}

export interface ChartRequest {
  readonly xScale: AxisScale;
  readonly yScale: AxisScale;
  readonly colors: ReadonlyMap<string, string>;
  /** Restrict the chart to these algorithms. */
  readonly algorithms?: readonly string[];
  readonly raw?: boolean;
  readonly dark?: boolean;
  readonly width: number;
  readonly height: number;
}

export function describePlotError(error: PlotError): string {
  switch (error.kind) {
    case 'unknown_metric':
      return `Unknown metric "${error.metric}"`;
    case 'dataset_unavailable':
      return `Dataset ${error.dataset} unavailable: ${error.message}`;
    case 'no_data':
      return `Nothing to plot for dataset ${error.dataset}`;
  }
}

/**
 * Load runs, compute metrics and reduce each algorithm to its frontier.
 *
 * Fails with `no_data` when no algorithm has a single point on the
 * requested metric pair.
 */
export async function loadPlotData(
  store: ResultsStore,
  provider: DatasetProvider,
  request: PlotRequest,
): Promise<Result<PlotData, PlotError>> {
  if (!isMetricName(request.xMetric)) return err({ kind: 'unknown_metric', metric: request.xMetric });
  if (!isMetricName(request.yMetric)) return err({ kind: 'unknown_metric', metric: request.yMetric });
  const x: MetricDefinition = METRICS[request.xMetric];
  const y: MetricDefinition = METRICS[request.yMetric];

  const dataset = await provider.getDataset(request.dataset);
  if (dataset.isErr()) {
    return err({ kind: 'dataset_unavailable', dataset: request.dataset, message: dataset.error.message });
  }

  const runs = store.iterateRuns(request.dataset, {
    count: request.count,
    batchMode: request.batchMode ?? false,
    onDiagnostic: (d) =>
      request.onDiagnostic?.({ kind: 'invalid_file', dataset: request.dataset, path: d.path, reason: d.reason }),
  });

  const records = await computeAllMetricsForRuns(dataset.value, runs, {
    forceRecompute: request.forceRecompute,
    cache: request.cache,
    recallEpsilon: request.recallEpsilon,
    onDiagnostic: (d) =>
      request.onDiagnostic?.({
        kind: 'skipped_run',
        dataset: d.dataset,
        runId: d.runId,
        algorithm: d.algorithm,
        reason: d.reason,
      }),
  });

  const pointSets = createPointSets(records, request.xMetric, request.yMetric, {
    x: x.orientation,
    y: y.orientation,
  });

  if (![...pointSets.values()].some((set) => set.frontier.length > 0)) {
    return err({ kind: 'no_data', dataset: request.dataset });
  }

  return ok({ dataset: request.dataset, x, y, records, pointSets });
}

/**
 * Order algorithms by decreasing mean log of their frontier y values, so
 * the legend roughly follows the curves top to bottom. Algorithms without
 * positive y values go last, by name.
 */
export function legendOrder(pointSets: Iterable<PointSet>): string[] {
  const keyed = [...pointSets].map((set) => {
    const logs = set.frontier.filter((p) => p.y > 0).map((p) => Math.log(p.y));
    const key = logs.length > 0 ? -(logs.reduce((s, v) => s + v, 0) / logs.length) : Number.POSITIVE_INFINITY;
    return { algorithm: set.algorithm, key };
  });

  keyed.sort((a, b) => {
    if (a.key !== b.key) return a.key < b.key ? -1 : 1;
    return a.algorithm.localeCompare(b.algorithm);
  });
  return keyed.map((k) => k.algorithm);
}

/**
 * Axis range: the metric's limit hint when it fits the scale (x limits are
 * clamped to [0, 1]), the data range inside (0, 1) for logit, otherwise
 * the range of the plotted values.
 */
export function axisDomain(
  metric: MetricDefinition,
  scale: AxisScale,
  values: readonly number[],
  clampToUnit: boolean,
): [number, number] {
  const accepted = values.filter((v) => scale.accepts(v));

  if (metric.lim && scale.name !== 'logit') {
    const lo = clampToUnit ? Math.max(metric.lim[0], 0) : metric.lim[0];
    const hi = clampToUnit ? Math.min(metric.lim[1], 1) : metric.lim[1];
    if (scale.accepts(lo) && scale.accepts(hi) && lo < hi) return [lo, hi];
  }

  if (accepted.length === 0) {
    return scale.name === 'logit' ? [0.01, 0.99] : scale.name === 'log' ? [1, 10] : [0, 1];
  }

  const lo = Math.min(...accepted);
  const hi = Math.max(...accepted);
  if (lo < hi) return [lo, hi];

  if (scale.name === 'log') return [lo / 2, hi * 2];
  if (scale.name === 'logit') return [lo / 2, (1 + hi) / 2];
  const pad = lo === 0 ? 1 : Math.abs(lo) * 0.05;
  return [lo - pad, scale.accepts(hi + pad) ? hi + pad : hi];
}

/**
 * Render the chart for the loaded plot data as an SVG document.
 */
export function buildTradeoffChart(data: PlotData, request: ChartRequest): string {
  const allowed = request.algorithms ? new Set(request.algorithms) : null;
  const sets = [...data.pointSets.values()].filter((set) => !allowed || allowed.has(set.algorithm));

  const series: ChartSeries[] = [];
  for (const algorithm of legendOrder(sets)) {
    const set = data.pointSets.get(algorithm);
    if (!set) continue;
    series.push({
      algorithm,
      color: request.colors.get(algorithm) ?? '#888888',
      frontier: set.frontier,
      all: set.all,
    });
  }

  const plotted = series.flatMap((s) => (request.raw ? s.all : s.frontier));

  return renderTradeoffChart(series, {
    title: tradeoffLabel(data.x, data.y),
    x: {
      label: data.x.description,
      scale: request.xScale,
      domain: axisDomain(data.x, request.xScale, plotted.map((p) => p.x), true),
    },
    y: {
      label: data.y.description,
      scale: request.yScale,
      domain: axisDomain(data.y, request.yScale, plotted.map((p) => p.y), false),
    },
    width: request.width,
    height: request.height,
    raw: request.raw ?? false,
    dark: request.dark ?? false,
  });
}
