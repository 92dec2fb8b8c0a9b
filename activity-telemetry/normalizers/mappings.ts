/**
 * Field mapping tables for each format
 *
 * These tables document and enforce the mapping from format-specific
 * fields to the TelemetryRow metrics, including unit conversions.
 */

import type { MetricKey } from '../schemas/index.js';
import type { FieldMappingEntry } from './types.js';

/**
 * Metric keys in response order
 */
export const SUPPORTED_METRICS: readonly MetricKey[] = ['hr_bpm', 'speed_kmh', 'power_w'];

/**
 * km/h in one m/s
 */
export const KMH_PER_MPS = 3.6;

/**
 * Convert m/s to km/h
 */
export function metersPerSecondToKmh(value: number): number {
  return value * KMH_PER_MPS;
}

/**
 * Namespace assumed for TCX documents that declare none
 */
export const TCX_V2_NAMESPACE = 'http://www.garmin.com/xmlschemas/TrainingCenterDatabase/v2';

/**
 * FIT `record` field holding the sample time
 */
export const FIT_TIMESTAMP_FIELD = 'timestamp';

/**
 * FIT `record` message field mappings
 */
export const FIT_FIELD_MAPPINGS: FieldMappingEntry[] = [
  { source: 'heart_rate', target: 'hr_bpm', kind: 'number', description: 'Heart rate (bpm)' },
  { source: 'power', target: 'power_w', kind: 'number', description: 'Power (W)' },
  {
    source: 'speed',
    target: 'speed_kmh',
    kind: 'number',
    convert: metersPerSecondToKmh,
    description: 'Speed, recorded in m/s',
  },
];

/**
 * Trackpoint time, as a path relative to the trackpoint
 */
export const TCX_TIME_QUERY = './tcx:Time';

/**
 * TCX `Trackpoint` field mappings, as paths relative to the trackpoint
 */
export const TCX_FIELD_MAPPINGS: FieldMappingEntry[] = [
  { source: './tcx:HeartRateBpm/tcx:Value', target: 'hr_bpm', kind: 'int', description: 'Heart rate (bpm)' },
];
