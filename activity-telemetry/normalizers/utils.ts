/**
 * Normalization utility functions
 *
 * Common helpers for turning untrusted decoder output into TelemetryRow values.
 * None of these throw: malformed input becomes `undefined`.
 */

import type { TelemetryRow } from '../schemas/index.js';
import type { FieldMappingEntry } from './types.js';

/**
 * Plain decimal number, optionally signed, with optional exponent.
 * Hex, binary and digit-prefixed garbage ("12abc") do not match.
 */
const DECIMAL_REGEX = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * ISO-8601-like timestamp: date, optional time (T or space separated),
 * optional zone designator
 */
const ISO_TIMESTAMP_REGEX =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse optional text as a float
 *
 * @param text - Raw text (may be null, empty or whitespace)
 * @returns Finite number, or undefined for absent or malformed input
 */
export function parseFloatSafe(text: string | null | undefined): number | undefined {
  if (text === null || text === undefined) {
    return undefined;
  }

  const trimmed = text.trim();
  if (trimmed.length === 0 || !DECIMAL_REGEX.test(trimmed)) {
    return undefined;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse optional text as an integer
 *
 * Decimal representations are accepted and truncated toward zero
 * ("140.7" -> 140).
 *
 * @param text - Raw text (may be null, empty or whitespace)
 * @returns Integer, or undefined for absent or malformed input
 */
export function parseIntSafe(text: string | null | undefined): number | undefined {
  const value = parseFloatSafe(text);
  return value === undefined ? undefined : Math.trunc(value);
}

/**
 * Narrow a decoded field value to a finite number
 */
export function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Check that a Date holds a real instant
 */
export function isValidInstant(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

/**
 * Normalize a timestamp to a UTC instant
 *
 * Handles:
 * - Date objects: returned when valid
 * - ISO8601 with Z or +/-HH:MM (or +/-HHMM) offset: converted to UTC
 * - ISO8601 without zone: read as UTC, never as local time
 * - Date only (YYYY-MM-DD): midnight UTC
 * - Impossible calendar dates or times (Feb 30, 24:00): undefined
 * - Anything else: undefined
 *
 * @param value - Decoded timestamp value
 * @returns Valid Date or undefined
 */
export function normalizeToUTC(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return isValidInstant(value) ? value : undefined;
  }

  if (typeof value !== 'string') {
    return undefined;
  }

  const match = ISO_TIMESTAMP_REGEX.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [, datePart, timePart, fraction, zone] = match;
  const [year, month, day] = datePart.split('-').map(Number);
  const [hour = 0, minute = 0, second = 0] = timePart ? timePart.split(':').map(Number) : [];
  // Digits past milliseconds are dropped
  const millis = fraction ? Number(fraction.slice(1, 4).padEnd(3, '0')) : 0;

  const wallClock = new Date(0);
  wallClock.setUTCFullYear(year, month - 1, day);
  wallClock.setUTCHours(hour, minute, second, millis);

  // Out-of-range parts roll over into the next field; reject them instead
  if (
    wallClock.getUTCFullYear() !== year ||
    wallClock.getUTCMonth() !== month - 1 ||
    wallClock.getUTCDate() !== day ||
    wallClock.getUTCHours() !== hour ||
    wallClock.getUTCMinutes() !== minute ||
    wallClock.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  const offsetMinutes = parseZoneOffset(zone);
  if (offsetMinutes === undefined) {
    return undefined;
  }

  const date = new Date(wallClock.getTime() - offsetMinutes * 60_000);
  return isValidInstant(date) ? date : undefined;
}

/**
 * Zone designator as minutes east of UTC
 */
function parseZoneOffset(zone: string | undefined): number | undefined {
  if (!zone || zone.toUpperCase() === 'Z') {
    return 0;
  }

  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2));
  if (hours > 23 || minutes > 59) {
    return undefined;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  return sign * (hours * 60 + minutes);
}

/**
 * Milliseconds since the Unix epoch
 */
export function toEpochMs(timestamp: Date): number {
  return timestamp.getTime();
}

/**
 * Sort rows ascending by timestamp
 *
 * Stable: rows sharing a timestamp keep their input order. The input array
 * is not modified.
 */
export function sortByTimestamp<T extends TelemetryRow>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => toEpochMs(a.timestamp) - toEpochMs(b.timestamp));
}

/**
 * Write a mapped metric onto a row
 *
 * Absent values leave the row untouched; conversion runs on present values
 * only, so a missing speed never becomes `0`.
 */
export function assignMetric(row: TelemetryRow, entry: FieldMappingEntry, value: number | undefined): void {
  if (value === undefined) {
    return;
  }

  const read = entry.kind === 'int' ? Math.trunc(value) : value;
  row[entry.target] = entry.convert ? entry.convert(read) : read;
}
