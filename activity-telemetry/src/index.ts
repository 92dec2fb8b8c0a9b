/**
 * Activity Telemetry
 *
 * Main exports for the telemetry normalization pipeline.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Scalar parsing, timestamps and field mappings
export * from '../normalizers/index.js';

// Format sniffing and extractors
export * from '../formats/index.js';

// Pipeline stages
export * from './dataset.js';
export * from './series.js';
export * from './aggregation.js';
