/**
 * Recording formats the pipeline can sniff from a filename
 */
export type SourceFormat = 'fit' | 'tcx' | 'unsupported';

/**
 * Metric keys exposed to the charting client
 */
export type MetricKey = 'hr_bpm' | 'speed_kmh' | 'power_w';

/**
 * One normalized, timestamped observation from a single recording
 *
 * Metrics are independently optional. An absent metric is an omitted
 * property, never `0` or `null`.
 */
export interface TelemetryRow {
  /** UTC instant of the observation */
  timestamp: Date;
  /** Heart rate in beats per minute */
  hr_bpm?: number;
  /** Power in watts */
  power_w?: number;
  /** Speed in km/h */
  speed_kmh?: number;
}

/**
 * Sorted row sequence extracted from exactly one uploaded file
 */
export interface Dataset {
  /** Source filename */
  source: string;
  /** Format the rows were extracted with */
  format: SourceFormat;
  /** Rows, non-decreasing by timestamp */
  rows: readonly TelemetryRow[];
}

/**
 * `[timestamp_ms, value]`
 */
export type MetricPoint = [number, number];

/**
 * Chart-ready point list for one metric from one file
 */
export interface MetricSeries {
  /** Source filename */
  name: string;
  data: MetricPoint[];
}

/**
 * Per-metric series collections, each in file submission order
 */
export type BatchResult = Record<MetricKey, MetricSeries[]>;

/**
 * A file handed over by the transport layer
 */
export interface UploadedFile {
  filename: string;
  bytes: Uint8Array;
}

/**
 * What happened to one file on its way through the pipeline
 */
export interface FileOutcome {
  filename: string;
  format: SourceFormat;
  dataset: Dataset;
  /** Collaborator failure message, when the file could not be decoded */
  error?: string;
}

/**
 * Response envelope emitted by the runner
 */
export interface ParseResponse {
  series: BatchResult;
}
