/**
 * Recording format implementations
 *
 * Each format module wraps a decoder collaborator and exports:
 * - A parse function taking raw bytes and returning TelemetryRow[]
 * - A FormatExtractor used by the batch aggregator
 */

export * from './sniff.js';
export * from './fit/index.js';
export * from './tcx/index.js';
