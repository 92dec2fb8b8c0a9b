#!/usr/bin/env node
/**
 * CLI entrypoint for normalizing activity recordings
 *
 * Usage:
 *   npx tsx activity-telemetry/src/run.ts ride.fit run.tcx
 *   npx tsx activity-telemetry/src/run.ts --concurrency 4 --output series.json *.fit
 */

import { writeFile } from 'fs/promises';
import type { RunnerConfig } from '../schemas/index.js';
import { mergeOutcomes, processBatch } from './aggregation.js';
import { HELP_TEXT, buildOutput, collectErrors, loadConfig, parseArgs, toUploadSources } from './cli.js';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  if (args.files.length === 0) {
    console.error('Error: at least one file is required');
    console.error(HELP_TEXT);
    process.exitCode = 1;
    return;
  }

  const config: RunnerConfig = args.config ? await loadConfig(args.config) : {};
  const concurrency = args.concurrency ?? config.concurrency ?? 1;

  console.error(`Activity Telemetry CLI`);
  console.error(`Files: ${args.files.length}`);
  console.error(`Concurrency: ${concurrency}`);
  console.error('');

  const outcomes = await processBatch(toUploadSources(args.files), { concurrency });
  const errors = collectErrors(outcomes);

  for (const outcome of outcomes) {
    if (outcome.error !== undefined) {
      console.error(`[${outcome.format}:${outcome.filename}] Error: ${outcome.error}`);
    } else if (outcome.format === 'unsupported') {
      console.error(`[${outcome.format}:${outcome.filename}] Skipped`);
    }
  }

  const series = mergeOutcomes(outcomes);
  const output = buildOutput(series, errors);

  console.error(
    `Series: ${series.hr_bpm.length} hr_bpm, ${series.speed_kmh.length} speed_kmh, ${series.power_w.length} power_w`
  );
  if (errors.length > 0) {
    console.error(`Errors: ${errors.length} files failed`);
  }
  console.error('');

  const json = JSON.stringify(output, null, 2);

  if (args.output) {
    await writeFile(args.output, json);
    console.error(`Output written to: ${args.output}`);
  } else {
    console.log(json);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
