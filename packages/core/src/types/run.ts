/** A single build or query parameter value as stored with a run. */
export type ParameterValue = string | number | boolean | null;

/** Build/query parameter mapping of one algorithm instance. */
export type ParameterMap = Readonly<Record<string, ParameterValue>>;

/**
 * Optional counters and timings recorded alongside a run.
 * Any of them may be missing; metrics that need a missing one are omitted.
 */
export interface RunAttributes {
  /** Index build time in seconds. */
  readonly buildTime?: number;
  /** Index size in kB. */
  readonly indexSize?: number;
  /** Candidates generated per query. */
  readonly candidates?: number;
  /** Total distance computations over all repetitions. */
  readonly distComps?: number;
  /** Number of times the query set was run. Defaults to 1. */
  readonly runCount?: number;
}

/**
 * One trial of one algorithm on one dataset with one parameter configuration.
 *
 * `neighbors`, `distances` and `times` are indexed by query id.
 */
export interface RunRecord {
  /** Stable identifier of the stored run, e.g. its path inside the store. */
  readonly id: string;
  readonly algorithm: string;
  /** Instance label, e.g. `hnsw(M=16,ef=40)`. */
  readonly name: string;
  readonly dataset: string;
  /** Number of neighbours requested per query (k). */
  readonly count: number;
  readonly batchMode: boolean;
  readonly parameters: ParameterMap;
  readonly neighbors: readonly (readonly number[])[];
  readonly distances: readonly (readonly number[])[];
  /** Elapsed time per query in seconds. */
  readonly times: readonly number[];
  readonly attributes: RunAttributes;
}

/** Ground truth for a dataset: exact neighbours per query, nearest first. */
export interface GroundTruth {
  readonly neighbors: readonly (readonly number[])[];
  readonly distances: readonly (readonly number[])[];
}

export interface DatasetMetadata {
  readonly name: string;
  readonly distance?: string;
  readonly queryCount: number;
}

export interface Dataset {
  readonly groundTruth: GroundTruth;
  readonly metadata: DatasetMetadata;
}

/** Metric name → scalar. Absent keys mean the metric could not be computed. */
export type MetricValues = Readonly<Record<string, number>>;

/** Metrics derived from exactly one RunRecord. */
export interface MetricRecord {
  readonly runId: string;
  readonly dataset: string;
  readonly algorithm: string;
  readonly name: string;
  readonly count: number;
  readonly batchMode: boolean;
  readonly parameters: ParameterMap;
  readonly metrics: MetricValues;
}
