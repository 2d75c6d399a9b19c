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
} from './run.js';
