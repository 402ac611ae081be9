/**
 * Simulation Service
 * Validates request scenarios, runs them and publishes the results
 */

import { parseScenario } from '../../config/scenario.js';
import { ConfigValidationError, isRawObject } from '../../config/validation.js';
import { runFarmYear } from '../../analysis/farm-year.js';
import { formatDayLine } from '../../analysis/report.js';
import {
  SWEEP_PARAMS,
  parseSweepRange,
  runSweep,
  validateSweepRange,
  type SweepResult,
} from '../../analysis/sweep.js';
import { serializeReport, type ReportSnapshot } from '../state-serializer.js';
import { broadcast, config, state } from '../state.js';
import { recordRun } from './DatabaseService.js';

export interface SimulateResult {
  runId: number | null;
  report: ReportSnapshot;
}

/**
 * Run one year for a request body of the form { scenario, label?, save? }
 */
export function simulateRequest(body: unknown): SimulateResult {
  if (!isRawObject(body)) throw new ConfigValidationError('request body must be an object', '$');

  const scenario = parseScenario(body.scenario);
  const label = typeof body.label === 'string' ? body.label : '';
  const report = runFarmYear(scenario, {
    onDay: config.LOG_DAYS ? (m) => console.log(`[Simulation] ${formatDayLine(m)}`) : undefined,
  });

  const runId = body.save === false ? null : recordRun(body.scenario, report, label);
  state.runsCompleted += 1;
  console.log(`[Simulation] Year complete: profit ${report.totals.profit}`);

  broadcast({
    type: 'run_completed',
    data: {
      runId,
      label,
      totalProfit: report.totals.profit,
      allFruitProcessed: report.summary.allFruitProcessed,
    },
  });

  return { runId, report: serializeReport(report) };
}

/**
 * Sweep a scenario for a request body of the form { scenario, sweep } where
 * sweep is "param:from:to[:step]" or { param, from, to, step }
 */
export function sweepRequest(body: unknown): SweepResult {
  if (!isRawObject(body)) throw new ConfigValidationError('request body must be an object', '$');

  const scenario = parseScenario(body.scenario);
  const sweep = body.sweep;
  let result: SweepResult;

  if (typeof sweep === 'string') {
    result = runSweep(scenario, parseSweepRange(sweep));
  } else if (isRawObject(sweep)) {
    const param = SWEEP_PARAMS.find((p) => p === sweep.param);
    if (!param) throw new ConfigValidationError(`must be one of ${SWEEP_PARAMS.join(', ')}`, 'sweep.param');
    const bound = (key: string, fallback?: number): number => {
      const value = sweep[key] ?? fallback;
      if (typeof value !== 'number') throw new ConfigValidationError('must be a number', `sweep.${key}`);
      return value;
    };
    result = runSweep(
      scenario,
      validateSweepRange({ param, from: bound('from'), to: bound('to'), step: bound('step', 1) })
    );
  } else {
    throw new ConfigValidationError('is required', 'sweep');
  }

  broadcast({ type: 'sweep_completed', data: { param: result.param, best: result.best } });
  return result;
}
