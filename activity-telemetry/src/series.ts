/**
 * Series projection
 *
 * Converts a Dataset into chart-ready `[timestamp_ms, value]` points for one
 * metric. Rows without the metric are skipped, so gaps in the source signal
 * stay gaps.
 */

import type { Dataset, MetricKey, MetricPoint, MetricSeries } from '../schemas/index.js';
import { toEpochMs } from '../normalizers/index.js';

/**
 * Project one metric of a dataset
 *
 * @param dataset - Sorted rows from one file
 * @param metric - Metric to project
 * @param name - Series name (defaults to the dataset's source filename)
 * @returns Series with empty data when no row carries the metric
 */
export function projectSeries(dataset: Dataset, metric: MetricKey, name: string = dataset.source): MetricSeries {
  const data: MetricPoint[] = [];

  for (const row of dataset.rows) {
    const value = row[metric];
    if (value === undefined || !Number.isFinite(value)) {
      continue;
    }
    data.push([toEpochMs(row.timestamp), value]);
  }

  return { name, data };
}
