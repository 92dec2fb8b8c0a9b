/**
 * Dataset building
 *
 * Packages one file's extracted rows into an ordered Dataset.
 */

import type { Dataset, SourceFormat, TelemetryRow } from '../schemas/index.js';
import { isValidInstant, sortByTimestamp } from '../normalizers/index.js';

/**
 * The "no usable telemetry" terminal state for a file
 */
export function emptyDataset(source: string, format: SourceFormat): Dataset {
  return { source, format, rows: [] };
}

/**
 * Build a Dataset from extracted rows
 *
 * - Drops rows whose timestamp is not a valid instant
 * - Sorts ascending by timestamp, keeping input order for equal timestamps
 *
 * Empty input, or input where every row is dropped, gives an empty dataset.
 */
export function buildDataset(source: string, format: SourceFormat, rows: readonly TelemetryRow[]): Dataset {
  const valid = rows.filter((row) => isValidInstant(row.timestamp));
  if (valid.length === 0) {
    return emptyDataset(source, format);
  }
  return { source, format, rows: sortByTimestamp(valid) };
}

export function isEmptyDataset(dataset: Dataset): boolean {
  return dataset.rows.length === 0;
}
