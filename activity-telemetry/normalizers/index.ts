/**
 * Normalizers for converting decoder output to TelemetryRow format
 *
 * Shared by every format extractor:
 * - Safe scalar parsing (malformed input becomes absent)
 * - UTC timestamp normalization
 * - Field mapping tables with unit conversion
 */

// Types
export * from './types.js';

// Mapping tables
export * from './mappings.js';

// Utility functions
export * from './utils.js';
