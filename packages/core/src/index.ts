export type {
  ParameterValue,
  ParameterMap,
  RunAttributes,
  RunRecord,
  GroundTruth,
  DatasetMetadata,
  Dataset,
  MetricValues,
  MetricRecord,
} from './types/index.js';

// Metrics
export type {
  MetricOrientation,
  MetricInput,
  MetricDefinition,
  MetricRegistry,
  MetricName,
} from './metrics/registry.js';
export { METRICS, METRIC_NAMES, isMetricName, tradeoffLabel } from './metrics/registry.js';
export type { DistanceThreshold, RecallValues } from './metrics/quality-metrics.js';
export {
  knnThreshold,
  epsilonThreshold,
  recallValues,
  relativeError,
  mean,
  percentile,
  queriesPerSecond,
} from './metrics/quality-metrics.js';
export type {
  RunRecordError,
  MetricsDiagnostic,
  ComputeMetricOptions,
  ComputeAllMetricsOptions,
} from './metrics/metrics-engine.js';
export {
  DEFAULT_RECALL_EPSILON,
  validateRun,
  computeMetric,
  computeMetricsForRun,
  computeAllMetricsForRuns,
} from './metrics/metrics-engine.js';
export type { MetricsCache } from './metrics/metrics-cache.js';
export {
  METRICS_VERSION,
  MetricsCacheError,
  metricsCacheKey,
  runFingerprint,
  InMemoryMetricsCache,
  JsonFileMetricsCache,
} from './metrics/metrics-cache.js';

// Frontier
export type { MetricPoint, AxisOrientation, PointSet } from './frontier/pareto-frontier.js';
export {
  projectRecords,
  dominates,
  computeFrontier,
  createPointSet,
  createPointSets,
} from './frontier/pareto-frontier.js';
export type { ComparisonGroup } from './frontier/algorithm-groups.js';
export { algorithmBase, groupAlgorithmsByBase, comparisonGroups } from './frontier/algorithm-groups.js';

// Collaborators
export type { ResultsStore, RunQuery, StoreDiagnostic } from './results/results-store.js';
export { FileResultsStore, ResultsStoreError } from './results/results-store.js';
export type { RunFile } from './results/run-schema.js';
export { parseRunFile } from './results/run-schema.js';
export type { DatasetProvider } from './datasets/dataset-provider.js';
export { FileDatasetProvider, DatasetError } from './datasets/dataset-provider.js';

// Config
export type { AnnReportConfig } from './config/config-parser.js';
export { loadConfig, ConfigError, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './config/config-parser.js';

// Export
export type { CellValue, TableRow, MetricsTable } from './export/metrics-table.js';
export { IDENTITY_COLUMNS, flattenMetricRecords } from './export/metrics-table.js';
export { escapeCsvField, writeMetricsCsv } from './export/csv-writer.js';

// Plot
export type { AxisScale } from './plot/scales.js';
export { SCALE_NAMES, parseScale, scaleTicks } from './plot/scales.js';
export type { ChartSeries, AxisSpec, ChartOptions } from './plot/svg-chart.js';
export { assignColors, escapeXml, formatTick, renderTradeoffChart } from './plot/svg-chart.js';

// Pipelines
export type { PipelineDiagnostic, DiagnosticHandler } from './pipeline/diagnostics.js';
export { describeDiagnostic } from './pipeline/diagnostics.js';
export type { ExportOptions } from './pipeline/export-pipeline.js';
export {
  ExportError,
  collectExportRecords,
  writeMetricsTable,
  exportMetrics,
} from './pipeline/export-pipeline.js';
export type { PlotError, PlotRequest, PlotData, ChartRequest } from './pipeline/plot-pipeline.js';
export {
  describePlotError,
  loadPlotData,
  legendOrder,
  axisDomain,
  buildTradeoffChart,
} from './pipeline/plot-pipeline.js';

// Utils
export { serializeParameters } from './utils/serialize.js';
export { writeFileAtomic } from './utils/atomic-write.js';
