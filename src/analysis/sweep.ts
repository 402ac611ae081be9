/**
 * Scenario Sweep
 * Re-runs a scenario across a range of one capacity parameter
 */

import type { Scenario } from '../config/scenario.js';
import { ConfigValidationError } from '../config/validation.js';
import { runFarmYear } from './farm-year.js';

export type SweepParam = 'fermentation' | 'preserving' | 'drying' | 'vessels';

export const SWEEP_PARAMS: readonly SweepParam[] = ['fermentation', 'preserving', 'drying', 'vessels'];

/** Upper bound on runs per sweep */
export const MAX_SWEEP_RUNS = 500;

export interface SweepRange {
  param: SweepParam;
  from: number;
  to: number;
  step: number;
}

export interface SweepPoint {
  value: number;
  totalProfit: number;
  allFruitProcessed: boolean;
  usesPerVessel: number;
  fruitUnprocessed: number;
}

export interface SweepResult {
  param: SweepParam;
  points: SweepPoint[];
  best: SweepPoint | null;
}

function isSweepParam(value: string): value is SweepParam {
  return SWEEP_PARAMS.some((p) => p === value);
}

/**
 * Parse `<param>:<from>:<to>[:<step>]`, e.g. `fermentation:20:60:10`
 */
export function parseSweepRange(raw: string): SweepRange {
  const [param, ...bounds] = raw.split(':');
  if (!isSweepParam(param)) {
    throw new ConfigValidationError(`unknown parameter '${param}', expected ${SWEEP_PARAMS.join(', ')}`, 'sweep');
  }
  if (bounds.length < 2 || bounds.length > 3) {
    throw new ConfigValidationError('expected <param>:<from>:<to>[:<step>]', 'sweep');
  }
  const [from, to, step = 1] = bounds.map((b) => Number(b));
  return validateSweepRange({ param, from, to, step });
}

export function validateSweepRange(range: SweepRange): SweepRange {
  const { from, to, step } = range;
  for (const [name, value] of [['from', from], ['to', to], ['step', step]] as const) {
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigValidationError(`${name} must be a whole number >= 0`, 'sweep');
    }
  }
  if (step === 0) throw new ConfigValidationError('step must be > 0', 'sweep');
  if (to < from) throw new ConfigValidationError('to must be >= from', 'sweep');
  if (Math.floor((to - from) / step) + 1 > MAX_SWEEP_RUNS) {
    throw new ConfigValidationError(`range exceeds ${MAX_SWEEP_RUNS} runs`, 'sweep');
  }
  return range;
}

/**
 * Copy of the scenario with one capacity parameter replaced
 */
export function withParam(scenario: Scenario, param: SweepParam, value: number): Scenario {
  if (param === 'vessels') {
    const fallbackVessels =
      scenario.aging.fallbackVessels === null ? null : Math.min(scenario.aging.fallbackVessels, value);
    return { ...scenario, aging: { ...scenario.aging, vessels: value, fallbackVessels } };
  }
  return { ...scenario, processors: { ...scenario.processors, [param]: value } };
}

/**
 * One independent year per value; the best point has the highest profit,
 * earliest value on ties
 */
export function runSweep(scenario: Scenario, range: SweepRange): SweepResult {
  const { param, from, to, step } = validateSweepRange(range);
  const points: SweepPoint[] = [];

  for (let value = from; value <= to; value += step) {
    const report = runFarmYear(withParam(scenario, param, value));
    points.push({
      value,
      totalProfit: report.totals.profit,
      allFruitProcessed: report.summary.allFruitProcessed,
      usesPerVessel: report.summary.aging.usesPerVessel,
      fruitUnprocessed: report.summary.totals.fruitUnprocessed,
    });
  }

  let best: SweepPoint | null = null;
  for (const point of points) {
    if (!best || point.totalProfit > best.totalProfit) best = point;
  }

  console.log(`[Sweep] ${param} ${from}..${to} step ${step}: ${points.length} run(s)`);
  return { param, points, best };
}
