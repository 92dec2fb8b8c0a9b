/**
 * Data model and runtime schemas for activity telemetry
 */

export * from './types.js';
export * from './validation.js';
