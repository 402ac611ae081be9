/**
 * Capacity Sweep Script
 * Sweeps every capacity parameter around a scenario's current values and
 * reports where extra units stop paying off
 */

import { loadScenarioFile } from '../src/config/scenario.js';
import { SWEEP_PARAMS, runSweep, type SweepParam } from '../src/analysis/sweep.js';
import type { Scenario } from '../src/config/scenario.js';

const CONFIG_PATH = process.argv[2] || 'config/example-scenario.json';
const SPAN = parseInt(process.env.SWEEP_SPAN || '20', 10);
const STEP = parseInt(process.env.SWEEP_STEP || '5', 10);

// ANSI colors for output
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const BLUE = '\x1b[34m';
const RESET = '\x1b[0m';

function currentValue(scenario: Scenario, param: SweepParam): number {
  return param === 'vessels' ? scenario.aging.vessels : scenario.processors[param];
}

function printHeader(title: string): void {
  console.log(`\n${BOLD}${BLUE}${'='.repeat(60)}${RESET}`);
  console.log(`${BOLD}${BLUE}${title}${RESET}`);
  console.log(`${BOLD}${BLUE}${'='.repeat(60)}${RESET}\n`);
}

function main(): void {
  console.log(`${BOLD}Capacity Sweep${RESET}`);
  console.log(`Scenario: ${CONFIG_PATH}`);

  const scenario = loadScenarioFile(CONFIG_PATH);

  for (const param of SWEEP_PARAMS) {
    const current = currentValue(scenario, param);
    const from = Math.max(0, current - SPAN);
    const to = current + SPAN;
    printHeader(`${param} (current ${current})`);

    const result = runSweep(scenario, { param, from, to, step: STEP });
    for (const point of result.points) {
      const isBest = point === result.best;
      const color = isBest ? GREEN : '';
      console.log(
        `  ${color}${String(point.value).padStart(5)}  ${String(point.totalProfit).padStart(10)}` +
          `  processed=${point.allFruitProcessed}${isBest ? '  <- best' : ''}${RESET}`
      );
    }
  }
}

main();
