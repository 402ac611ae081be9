#!/usr/bin/env node
/**
 * Headless Runner
 * CLI for simulating a farm year from a scenario file
 */

import dotenv from 'dotenv';
dotenv.config({ path: '.env.local' });

import { loadScenarioFile } from '../config/scenario.js';
import { ConfigValidationError } from '../config/validation.js';
import { runFarmYear } from '../analysis/farm-year.js';
import { parseSweepRange, runSweep } from '../analysis/sweep.js';
import { formatDayLine, formatReport, formatScenarioHeader, formatSweep } from '../analysis/report.js';
import { createDatabase } from '../storage/index.js';
import { CliUsageError, USAGE, parseArgs, type RunOptions } from './cli-options.js';

function run(options: RunOptions, configPath: string): void {
  const scenario = loadScenarioFile(configPath, options.overrides ?? undefined);

  console.log('='.repeat(60));
  console.log('Farm Year Simulation');
  console.log('='.repeat(60));
  console.log(formatScenarioHeader(scenario));
  console.log('');

  if (options.sweep) {
    const result = runSweep(scenario, parseSweepRange(options.sweep));
    console.log(formatSweep(result));
    if (result.best) {
      console.log(`\nBest ${result.param}: ${result.best.value} (profit ${result.best.totalProfit})`);
    }
    return;
  }

  const startTime = Date.now();
  const report = runFarmYear(scenario, {
    onDay: options.verbose ? (m) => console.log(formatDayLine(m)) : undefined,
  });
  const elapsed = Date.now() - startTime;

  if (options.verbose) console.log('');
  console.log(formatReport(scenario, report));
  console.log('');
  console.log(`Simulated ${report.summary.daysSimulated} days in ${elapsed}ms`);

  if (options.save) {
    const db = createDatabase(options.dbPath);
    if (db) {
      try {
        const runId = db.recordRun(scenario, report, options.label);
        console.log(`[Database] Saved run ${runId} to ${options.dbPath}`);
      } finally {
        db.close();
      }
    }
  }
}

function main(): number {
  let options: RunOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.error(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help || options.config === null) {
    console.log(USAGE);
    return 0;
  }

  try {
    run(options, options.config);
    return 0;
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error(`[Config] ${error.message}`);
      return 1;
    }
    throw error;
  }
}

try {
  process.exitCode = main();
} catch (error) {
  console.error('Simulation failed:', error);
  process.exitCode = 1;
}
