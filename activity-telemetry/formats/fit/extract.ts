/**
 * FIT record extraction
 *
 * Reads `record` messages into TelemetryRow values using FIT_FIELD_MAPPINGS.
 */

import type { TelemetryRow } from '../../schemas/index.js';
import type { FormatExtractor } from '../../normalizers/index.js';
import {
  FIT_FIELD_MAPPINGS,
  FIT_TIMESTAMP_FIELD,
  assignMetric,
  normalizeToUTC,
  sortByTimestamp,
  toFiniteNumber,
} from '../../normalizers/index.js';
import type { BinaryMessageDecoder, DecodedFitFile, FitMessage } from './types.js';
import { GarminFitDecoder } from './decode.js';

/**
 * Normalize a FIT `record` message to a TelemetryRow
 *
 * @returns null when the message has no usable timestamp
 */
export function normalizeRecord(message: FitMessage): TelemetryRow | null {
  const timestamp = normalizeToUTC(message.get(FIT_TIMESTAMP_FIELD));
  if (!timestamp) {
    return null;
  }

  const row: TelemetryRow = { timestamp };
  for (const entry of FIT_FIELD_MAPPINGS) {
    assignMetric(row, entry, toFiniteNumber(message.get(entry.source)));
  }
  return row;
}

/**
 * Extract rows from decoded FIT messages
 *
 * Rows are sorted by timestamp; records sharing a timestamp are all kept,
 * in file order.
 */
export function extractFitRows(decoded: DecodedFitFile): TelemetryRow[] {
  const rows: TelemetryRow[] = [];

  for (const message of decoded.messages('record')) {
    const row = normalizeRecord(message);
    if (row) {
      rows.push(row);
    }
  }

  return sortByTimestamp(rows);
}

const defaultDecoder = new GarminFitDecoder();

/**
 * Decode FIT bytes and extract rows
 * @throws FitDecodeError when the decoder cannot read the payload
 */
export function parseFitBytes(
  bytes: Uint8Array,
  decoder: BinaryMessageDecoder = defaultDecoder
): TelemetryRow[] {
  return extractFitRows(decoder.decode(bytes));
}

export const fitExtractor: FormatExtractor = {
  format: 'fit',
  extract: (bytes) => parseFitBytes(bytes),
};
