/**
 * Zod schemas for runtime validation of the wire contract and runner config
 * These schemas enforce the data contracts at runtime and provide
 * actionable error messages for invalid records.
 */

import { z } from 'zod';

/**
 * Metric keys exposed to the charting client, in response order
 */
export const MetricKeySchema = z.enum(['hr_bpm', 'speed_kmh', 'power_w']);

/**
 * Recording formats recognised by the sniffer
 */
export const SourceFormatSchema = z.enum(['fit', 'tcx', 'unsupported']);

/**
 * `[timestamp_ms, value]` point; both members must be finite and the
 * timestamp integral
 */
export const MetricPointSchema = z.tuple([
  z.number().int({ message: 'Point timestamp must be integer milliseconds' }),
  z.number().finite({ message: 'Point value must be a finite number' }),
]);

/**
 * One file's series for one metric
 */
export const MetricSeriesSchema = z.object({
  /** Source filename */
  name: z.string().min(1, 'Series name is required'),
  /** Points ordered by timestamp */
  data: z.array(MetricPointSchema),
});

/**
 * Per-metric series collections; every key is always present
 */
export const BatchResultSchema = z.object({
  hr_bpm: z.array(MetricSeriesSchema),
  speed_kmh: z.array(MetricSeriesSchema),
  power_w: z.array(MetricSeriesSchema),
});

/**
 * Response envelope schema
 */
export const ParseResponseSchema = z.object({
  series: BatchResultSchema,
});

/**
 * Runner configuration file schema
 */
export const RunnerConfigSchema = z
  .object({
    /** Number of files decoded at once */
    concurrency: z.number().int().positive().optional(),
  })
  .strict();

// Type exports inferred from schemas
export type ValidatedMetricSeries = z.infer<typeof MetricSeriesSchema>;
export type ValidatedBatchResult = z.infer<typeof BatchResultSchema>;
export type ValidatedParseResponse = z.infer<typeof ParseResponseSchema>;
export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

/**
 * Validate a single series
 * @throws ZodError with actionable error messages if validation fails
 */
export function validateMetricSeries(data: unknown): ValidatedMetricSeries {
  return MetricSeriesSchema.parse(data);
}

/**
 * Validate a batch result
 * @throws ZodError with actionable error messages if validation fails
 */
export function validateBatchResult(data: unknown): ValidatedBatchResult {
  return BatchResultSchema.parse(data);
}

/**
 * Validate a batch result safely (returns result object)
 */
export function safeValidateBatchResult(data: unknown): z.SafeParseReturnType<unknown, ValidatedBatchResult> {
  return BatchResultSchema.safeParse(data);
}

/**
 * Validate a complete response envelope
 * @throws ZodError with actionable error messages if validation fails
 */
export function validateParseResponse(data: unknown): ValidatedParseResponse {
  return ParseResponseSchema.parse(data);
}

/**
 * Validate runner config safely (returns result object)
 */
export function safeValidateRunnerConfig(data: unknown): z.SafeParseReturnType<unknown, RunnerConfig> {
  return RunnerConfigSchema.safeParse(data);
}

/**
 * Format Zod errors into actionable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
