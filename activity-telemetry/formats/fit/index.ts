/**
 * FIT (binary) format support
 *
 * Decodes with the Garmin FIT SDK and extracts `record` messages.
 */

export * from './types.js';
export * from './decode.js';
export * from './extract.js';
