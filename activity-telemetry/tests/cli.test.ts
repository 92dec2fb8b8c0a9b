import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  parseArgs,
  loadConfig,
  toUploadSources,
  collectErrors,
  buildOutput,
  HELP_TEXT,
} from '../src/cli.js';
import { aggregateBatch, createEmptyBatchResult, processBatch } from '../src/aggregation.js';
import { validateParseResponse } from '../schemas/index.js';
import type { FileOutcome } from '../schemas/index.js';
import { buildFitFile } from './helpers/fit-fixture.js';

describe('CLI Argument Parsing', () => {
  it('should collect positional files in order', () => {
    expect(parseArgs(['b.tcx', 'a.fit'])).toEqual({ files: ['b.tcx', 'a.fit'], help: false });
  });

  it('should parse --concurrency as number', () => {
    expect(parseArgs(['--concurrency', '4', 'a.fit']).concurrency).toBe(4);
  });

  it('should reject invalid --concurrency values', () => {
    expect(() => parseArgs(['--concurrency', '0'])).toThrow('--concurrency must be a positive integer, got 0');
    expect(() => parseArgs(['--concurrency', 'many'])).toThrow('--concurrency must be a positive integer, got many');
    expect(() => parseArgs(['--concurrency'])).toThrow('--concurrency must be a positive integer, got nothing');
  });

  it('should parse --config and --output paths', () => {
    const args = parseArgs(['--config', '/path/to/config.json', '--output', '/path/to/series.json', 'a.fit']);

    expect(args.config).toBe('/path/to/config.json');
    expect(args.output).toBe('/path/to/series.json');
    expect(args.files).toEqual(['a.fit']);
  });

  it('should require values for path options', () => {
    expect(() => parseArgs(['--output'])).toThrow('--output requires a value');
    expect(() => parseArgs(['--config', '--help'])).toThrow('--config requires a value');
  });

  it('should flag --help', () => {
    expect(parseArgs(['--help']).help).toBe(true);
    expect(HELP_TEXT).toContain('--concurrency <n>');
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});

describe('Config Loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'activity-telemetry-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a valid config', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ concurrency: 3 }));

    expect(await loadConfig(path)).toEqual({ concurrency: 3 });
  });

  it('should accept an empty config', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '{}');

    expect(await loadConfig(path)).toEqual({});
  });

  it('should report a missing file', async () => {
    const path = join(dir, 'missing.json');
    await expect(loadConfig(path)).rejects.toThrow(`Config file not found: ${path}`);
  });

  it('should report invalid JSON', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, '{ concurrency: ');

    await expect(loadConfig(path)).rejects.toThrow('Failed to parse config file');
  });

  it('should report schema violations with field paths', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ concurrency: -1 }));

    await expect(loadConfig(path)).rejects.toThrow(`Invalid config file ${path}: concurrency:`);
  });

  it('should reject unknown keys', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ metrics: ['cadence'] }));

    await expect(loadConfig(path)).rejects.toThrow(`Invalid config file ${path}`);
  });
});

describe('Upload Sources', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'activity-telemetry-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should name sources by base name and read lazily', async () => {
    const path = join(dir, 'ride.fit');
    const bytes = buildFitFile([{ timestampMs: Date.UTC(2024, 0, 15, 10, 0, 0), heartRate: 150 }]);
    await writeFile(path, bytes);

    const [source] = toUploadSources([path]);

    expect(source.filename).toBe('ride.fit');
    expect(Array.from(await source.read())).toEqual(Array.from(bytes));
  });

  it('should feed files from disk through the pipeline', async () => {
    const path = join(dir, 'ride.fit');
    const timestampMs = Date.UTC(2024, 0, 15, 10, 0, 0);
    await writeFile(path, buildFitFile([{ timestampMs, heartRate: 150, speed: 5 }]));

    const result = await aggregateBatch(toUploadSources([path, join(dir, 'absent.tcx')]), { concurrency: 2 });

    expect(result.hr_bpm).toEqual([{ name: 'ride.fit', data: [[timestampMs, 150]] }]);
    expect(result.speed_kmh).toEqual([{ name: 'ride.fit', data: [[timestampMs, 18]] }]);
  });

  it('should report unreadable paths as file errors', async () => {
    const outcomes = await processBatch(toUploadSources([join(dir, 'absent.tcx')]));
    const errors = collectErrors(outcomes);

    expect(errors).toHaveLength(1);
    expect(errors[0].filename).toBe('absent.tcx');
    expect(errors[0].error).toMatch(/^Failed to read file: ENOENT/);
  });
});

describe('Output Format', () => {
  const failed: FileOutcome = {
    filename: 'broken.fit',
    format: 'fit',
    dataset: { source: 'broken.fit', format: 'fit', rows: [] },
    error: 'FIT decode error: truncated',
  };

  it('should omit errors when every file was read', () => {
    const output = buildOutput(createEmptyBatchResult(), []);

    expect(output).toEqual({ series: { hr_bpm: [], speed_kmh: [], power_w: [] } });
    expect(validateParseResponse(output)).toEqual(output);
  });

  it('should list per-file errors next to the series', () => {
    const output = buildOutput(createEmptyBatchResult(), collectErrors([failed]));

    expect(output.errors).toEqual([{ filename: 'broken.fit', error: 'FIT decode error: truncated' }]);
  });

  it('should keep the wire field names', () => {
    const output = buildOutput(
      { hr_bpm: [{ name: 'a.fit', data: [[1705312800000, 150]] }], speed_kmh: [], power_w: [] },
      []
    );

    expect(JSON.stringify(output)).toBe(
      '{"series":{"hr_bpm":[{"name":"a.fit","data":[[1705312800000,150]]}],"speed_kmh":[],"power_w":[]}}'
    );
  });
});
