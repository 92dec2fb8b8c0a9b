/**
 * Format-agnostic extraction types and interfaces
 */

import type { MetricKey, SourceFormat, TelemetryRow } from '../schemas/index.js';

/**
 * Formats that have an extractor
 */
export type DecodableFormat = Exclude<SourceFormat, 'unsupported'>;

/**
 * Common interface for all format extractors
 */
export interface FormatExtractor {
  /** Format identifier */
  format: DecodableFormat;
  /**
   * Decode raw bytes and extract rows
   * @throws when the decoder collaborator cannot read the payload
   */
  extract(bytes: Uint8Array): TelemetryRow[];
}

/**
 * How a source field is read before it lands on a row
 */
export type FieldValueKind = 'number' | 'int';

/**
 * Field mapping entry
 */
export interface FieldMappingEntry {
  /** Field name (FIT) or relative path query (TCX) in the source */
  source: string;
  /** Target TelemetryRow metric */
  target: MetricKey;
  /** How the raw value is read */
  kind: FieldValueKind;
  /** Unit conversion applied to present values only */
  convert?: (value: number) => number;
  /** Optional description */
  description?: string;
}
