/**
 * Command line helpers for the telemetry runner
 *
 * Kept apart from run.ts so they can be tested without starting the CLI.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { BatchResult, FileOutcome, ParseResponse } from '../schemas/index.js';
import type { RunnerConfig } from '../schemas/index.js';
import { formatValidationErrors, safeValidateRunnerConfig } from '../schemas/index.js';
import type { UploadSource } from './aggregation.js';

export interface CliArgs {
  /** Recording paths, in submission order */
  files: string[];
  concurrency?: number;
  config?: string;
  output?: string;
  help: boolean;
}

/**
 * Per-file failure reported next to the series
 */
export interface FileError {
  filename: string;
  error: string;
}

export type RunnerOutput = ParseResponse & { errors?: FileError[] };

/**
 * Parse command line arguments
 * @throws Error for unknown flags or invalid values
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { files: [], help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--concurrency': {
        const value = Number(nextArg);
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`--concurrency must be a positive integer, got ${nextArg ?? 'nothing'}`);
        }
        result.concurrency = value;
        i++;
        break;
      }
      case '--config':
        result.config = requireValue(arg, nextArg);
        i++;
        break;
      case '--output':
        result.output = requireValue(arg, nextArg);
        i++;
        break;
      case '--help':
        result.help = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        result.files.push(arg);
    }
  }

  return result;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

export const HELP_TEXT = `
Activity Telemetry CLI

Usage:
  activity-telemetry [options] <file...>

Reads FIT and TCX recordings and prints heart rate, speed and power series
as JSON. Files with other extensions are skipped.

Options:
  --concurrency <n>    Files processed at once (default: 1)
  --config <path>      JSON config file ({ "concurrency": n })
  --output <path>      Output file path (default: stdout)
  --help               Show this help message

Examples:
  activity-telemetry morning-ride.fit evening-run.tcx
  activity-telemetry --concurrency 4 --output series.json recordings/*.fit
`;

/**
 * Load and validate the runner configuration file
 */
export async function loadConfig(configPath: string): Promise<RunnerConfig> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new Error(`Config file not found: ${configPath}`);
    }
    throw new Error(`Failed to read config file: ${(error as Error).message}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse config file: ${(error as Error).message}`);
  }

  const parsed = safeValidateRunnerConfig(data);
  if (!parsed.success) {
    throw new Error(`Invalid config file ${configPath}: ${formatValidationErrors(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Lazily-read upload sources for file paths; the series name is the base name
 */
export function toUploadSources(paths: string[]): UploadSource[] {
  return paths.map((path) => ({
    filename: basename(path),
    read: () => readFile(path),
  }));
}

/**
 * Collect per-file failures from outcomes
 */
export function collectErrors(outcomes: readonly FileOutcome[]): FileError[] {
  return outcomes.flatMap((outcome) =>
    outcome.error === undefined ? [] : [{ filename: outcome.filename, error: outcome.error }]
  );
}

/**
 * Build the runner output envelope
 */
export function buildOutput(series: BatchResult, errors: FileError[]): RunnerOutput {
  const output: RunnerOutput = { series };
  if (errors.length > 0) {
    output.errors = errors;
  }
  return output;
}
