/**
 * Sweep Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { parseSweepRange, runSweep, withParam } from '../../src/analysis/sweep.js';
import { parseScenario } from '../../src/config/scenario.js';
import { ConfigValidationError } from '../../src/config/validation.js';

describe('parseSweepRange', () => {
  it('should default the step to one', () => {
    expect(parseSweepRange('vessels:10:20')).toEqual({ param: 'vessels', from: 10, to: 20, step: 1 });
  });

  it('should read an explicit step', () => {
    expect(parseSweepRange('drying:0:6:2')).toEqual({ param: 'drying', from: 0, to: 6, step: 2 });
  });

  it('should reject malformed ranges', () => {
    expect(() => parseSweepRange('kegs:1:2')).toThrow(ConfigValidationError);
    expect(() => parseSweepRange('fermentation:5')).toThrow('sweep: expected <param>:<from>:<to>[:<step>]');
    expect(() => parseSweepRange('fermentation:5:1')).toThrow('sweep: to must be >= from');
    expect(() => parseSweepRange('fermentation:0:5:0')).toThrow('sweep: step must be > 0');
    expect(() => parseSweepRange('fermentation:0:x')).toThrow('sweep: to must be a whole number >= 0');
    expect(() => parseSweepRange('fermentation:0:1000')).toThrow('sweep: range exceeds 500 runs');
  });
});

describe('withParam', () => {
  it('should clamp fallback vessels to the swept vessel count', () => {
    const scenario = parseScenario({
      crop: 'starfruit',
      tiles: 5,
      aging: { vessels: 20, fallbackVessels: 15 },
    });
    const swept = withParam(scenario, 'vessels', 10);

    expect(swept.aging).toEqual({ vessels: 10, fullBatchRequired: false, fallbackVessels: 10 });
    expect(scenario.aging.vessels).toBe(20);
  });

  it('should replace a processor count', () => {
    const scenario = parseScenario({ crop: 'starfruit', tiles: 5 });
    expect(withParam(scenario, 'preserving', 4).processors).toEqual({ fermentation: 0, preserving: 4, drying: 0 });
  });
});

describe('runSweep', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should keep the earliest value among equal best profits', () => {
    const scenario = parseScenario({ crop: 'starfruit', tiles: 5 });
    const result = runSweep(scenario, parseSweepRange('fermentation:0:10:5'));

    expect(result.points.map((p) => p.value)).toEqual([0, 5, 10]);
    expect(result.points.map((p) => p.totalProfit)).toEqual([12000, 72000, 72000]);
    expect(result.points.map((p) => p.allFruitProcessed)).toEqual([false, true, true]);
    expect(result.best?.value).toBe(5);
  });
});
