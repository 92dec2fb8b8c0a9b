import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  MetricKeySchema,
  SourceFormatSchema,
  MetricPointSchema,
  MetricSeriesSchema,
  BatchResultSchema,
  RunnerConfigSchema,
  validateMetricSeries,
  validateBatchResult,
  safeValidateBatchResult,
  validateParseResponse,
  safeValidateRunnerConfig,
  formatValidationErrors,
} from '../schemas/index.js';

describe('MetricKeySchema', () => {
  it('should accept the three metric keys', () => {
    for (const key of ['hr_bpm', 'speed_kmh', 'power_w']) {
      expect(MetricKeySchema.safeParse(key).success, `Metric ${key} should be valid`).toBe(true);
    }
  });

  it('should reject other metrics', () => {
    expect(MetricKeySchema.safeParse('cadence_rpm').success).toBe(false);
  });
});

describe('SourceFormatSchema', () => {
  it('should accept known formats', () => {
    expect(SourceFormatSchema.options).toEqual(['fit', 'tcx', 'unsupported']);
  });
});

describe('MetricPointSchema', () => {
  it('should accept integer timestamps with numeric values', () => {
    expect(MetricPointSchema.safeParse([1705312800000, 150.5]).success).toBe(true);
  });

  it('should reject fractional timestamps', () => {
    const result = MetricPointSchema.safeParse([1705312800000.5, 150]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['0: Point timestamp must be integer milliseconds']);
    }
  });

  it('should reject null values', () => {
    expect(MetricPointSchema.safeParse([1705312800000, null]).success).toBe(false);
  });

  it('should reject points with the wrong arity', () => {
    expect(MetricPointSchema.safeParse([1705312800000]).success).toBe(false);
    expect(MetricPointSchema.safeParse([1705312800000, 1, 2]).success).toBe(false);
  });
});

describe('MetricSeriesSchema', () => {
  it('should accept a series with data', () => {
    const series = { name: 'ride.fit', data: [[1705312800000, 150]] };
    expect(validateMetricSeries(series)).toEqual(series);
  });

  it('should accept a series without data', () => {
    expect(MetricSeriesSchema.safeParse({ name: 'ride.fit', data: [] }).success).toBe(true);
  });

  it('should require a name', () => {
    const result = MetricSeriesSchema.safeParse({ name: '', data: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['name: Series name is required']);
    }
  });

  it('should throw ZodError for invalid series', () => {
    expect(() => validateMetricSeries({ name: 'ride.fit' })).toThrow(ZodError);
  });
});

describe('BatchResultSchema', () => {
  const validResult = {
    hr_bpm: [{ name: 'a.fit', data: [[1705312800000, 150]] }],
    speed_kmh: [],
    power_w: [],
  };

  it('should accept a complete result', () => {
    expect(validateBatchResult(validResult)).toEqual(validResult);
    expect(safeValidateBatchResult(validResult).success).toBe(true);
  });

  it('should require every metric key', () => {
    const result = BatchResultSchema.safeParse({ hr_bpm: [], speed_kmh: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['power_w: Required']);
    }
  });

  it('should point at the offending series', () => {
    const result = safeValidateBatchResult({
      ...validResult,
      speed_kmh: [{ name: 'a.fit', data: [[1705312800000, 'fast']] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual(['speed_kmh.0.data.0.1: Expected number, received string']);
    }
  });

  it('should validate the response envelope', () => {
    expect(validateParseResponse({ series: validResult })).toEqual({ series: validResult });
    expect(() => validateParseResponse(validResult)).toThrow(ZodError);
  });
});

describe('RunnerConfigSchema', () => {
  it('should accept positive integer concurrency', () => {
    expect(RunnerConfigSchema.parse({ concurrency: 4 })).toEqual({ concurrency: 4 });
    expect(RunnerConfigSchema.parse({})).toEqual({});
  });

  it('should reject non-positive or fractional concurrency', () => {
    expect(safeValidateRunnerConfig({ concurrency: 0 }).success).toBe(false);
    expect(safeValidateRunnerConfig({ concurrency: 1.5 }).success).toBe(false);
  });

  it('should reject unknown keys', () => {
    expect(safeValidateRunnerConfig({ concurrency: 1, output: 'x.json' }).success).toBe(false);
  });
});

describe('formatValidationErrors', () => {
  it('should format errors without a path', () => {
    const result = MetricKeySchema.safeParse(42);
    expect(result.success).toBe(false);
    if (!result.success) {
      const messages = formatValidationErrors(result.error);
      expect(messages).toHaveLength(1);
      expect(messages[0]).toMatch(/^Expected /);
    }
  });
});
