/**
 * Batch aggregation
 *
 * Runs every uploaded file through sniff -> extract -> dataset and merges the
 * per-file datasets into per-metric series collections.
 *
 * A file that cannot be read, decoded or that yields no rows contributes
 * nothing and never affects the other files in the batch.
 */

import type { BatchResult, FileOutcome, UploadedFile } from '../schemas/index.js';
import { SUPPORTED_METRICS } from '../normalizers/index.js';
import { getExtractor, sniffFormat } from '../formats/index.js';
import { buildDataset, emptyDataset, isEmptyDataset } from './dataset.js';
import { projectSeries } from './series.js';

/**
 * A file whose bytes are read on demand
 */
export interface UploadSource {
  filename: string;
  read(): Promise<Uint8Array>;
}

export type BatchInput = UploadedFile | UploadSource;

/**
 * Options for batch processing
 */
export interface BatchOptions {
  /** Files processed at once (default: 1) */
  concurrency?: number;
}

/**
 * Result object with all three metric keys present and empty
 */
export function createEmptyBatchResult(): BatchResult {
  return { hr_bpm: [], speed_kmh: [], power_w: [] };
}

/**
 * Run one in-memory file through the pipeline
 *
 * Decoder failures are caught and reported on the outcome; the dataset is
 * then empty.
 */
export function processFile(file: UploadedFile): FileOutcome {
  const { filename } = file;
  const format = sniffFormat(filename);
  const extractor = getExtractor(format);

  if (!extractor) {
    return { filename, format, dataset: emptyDataset(filename, format) };
  }

  try {
    const rows = extractor.extract(file.bytes);
    return { filename, format, dataset: buildDataset(filename, format, rows) };
  } catch (error) {
    return {
      filename,
      format,
      dataset: emptyDataset(filename, format),
      error: describeError(error),
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function loadAndProcess(input: BatchInput): Promise<FileOutcome> {
  if ('bytes' in input) {
    return processFile(input);
  }

  let bytes: Uint8Array;
  try {
    bytes = await input.read();
  } catch (error) {
    const format = sniffFormat(input.filename);
    return {
      filename: input.filename,
      format,
      dataset: emptyDataset(input.filename, format),
      error: `Failed to read file: ${describeError(error)}`,
    };
  }

  return processFile({ filename: input.filename, bytes });
}

/**
 * Process files with a bounded worker pool
 *
 * @returns One outcome per file, in submission order regardless of which
 * file finished first
 * @throws Error when concurrency is not a positive integer
 */
export async function processBatch(files: readonly BatchInput[], options: BatchOptions = {}): Promise<FileOutcome[]> {
  const { concurrency = 1 } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const outcomes = new Array<FileOutcome>(files.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < files.length) {
      const index = nextIndex++;
      outcomes[index] = await loadAndProcess(files[index]);
    }
  };

  const workerCount = Math.min(concurrency, files.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return outcomes;
}

/**
 * Merge outcomes into per-metric series collections
 *
 * Series are appended in outcome order; empty series are not appended.
 */
export function mergeOutcomes(outcomes: readonly FileOutcome[]): BatchResult {
  const result = createEmptyBatchResult();

  for (const outcome of outcomes) {
    if (isEmptyDataset(outcome.dataset)) {
      continue;
    }

    for (const metric of SUPPORTED_METRICS) {
      const series = projectSeries(outcome.dataset, metric, outcome.filename);
      if (series.data.length > 0) {
        result[metric].push(series);
      }
    }
  }

  return result;
}

/**
 * Run the whole pipeline over a batch of files
 */
export async function aggregateBatch(files: readonly BatchInput[], options: BatchOptions = {}): Promise<BatchResult> {
  return mergeOutcomes(await processBatch(files, options));
}
