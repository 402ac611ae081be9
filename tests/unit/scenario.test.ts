/**
 * Scenario Config Tests
 * Verify parsing, name aliases, validation paths and simulation input
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadScenarioFile, parseScenario, toSimulationInput } from '../../src/config/scenario.js';
import { ConfigValidationError } from '../../src/config/validation.js';
import { DEFAULT_ECONOMY } from '../../src/systems/economy.js';

describe('parseScenario', () => {
  it('should fill defaults around a single tiles count', () => {
    const scenario = parseScenario({ crop: 'Star Fruit', tiles: 5 });

    expect(scenario.crop).toBe('starfruit');
    expect(scenario.plots).toEqual([
      { name: 'plot', calendar: { type: 'always' }, tilesByCrop: { starfruit: 5 } },
    ]);
    expect(scenario.processors).toEqual({ fermentation: 0, preserving: 0, drying: 0 });
    expect(scenario.aging).toEqual({ vessels: 0, fullBatchRequired: false, fallbackVessels: null });
    expect(scenario.growth).toEqual({ fertilizer: 'none', paddyBonus: false });
    expect(scenario.simulation).toEqual({
      startSeason: 'spring',
      perennialFertilizerCadence: 'per-calendar-season',
    });
    expect(scenario.priority).toBeNull();
    expect(scenario.bees.seasons).toEqual(['spring', 'summer', 'fall']);
    expect(scenario.economy).toEqual(DEFAULT_ECONOMY);
  });

  it('should apply a top-level tiles count to both crops', () => {
    const scenario = parseScenario({ crop: 'all', tiles: 3 });
    expect(scenario.crop).toBe('both');
    expect(scenario.plots[0].tilesByCrop).toEqual({ starfruit: 3, ancient: 3 });
  });

  it('should accept loosely written names', () => {
    const scenario = parseScenario({
      crop: 'ancient_fruit',
      tiles: 1,
      growth: { fertilizer: 'Deluxe Speed-Gro' },
      simulation: { startSeason: 'Autumn', perennialFertilizerCadence: 'per cycle' },
    });

    expect(scenario.crop).toBe('ancient');
    expect(scenario.growth.fertilizer).toBe('deluxe_speed_gro');
    expect(scenario.simulation.startSeason).toBe('fall');
    expect(scenario.simulation.perennialFertilizerCadence).toBe('per-regrowth-cycle');
  });

  it('should parse seasonal plots with per-crop tiles', () => {
    const scenario = parseScenario({
      crop: 'both',
      plots: [
        {
          name: 'summer-field',
          calendar: { type: 'seasons', seasons: ['summer'] },
          tiles: { starfruit: 10, ancient: 4 },
        },
      ],
    });

    expect(scenario.plots).toEqual([
      {
        name: 'summer-field',
        calendar: { type: 'seasons', seasons: ['summer'] },
        tilesByCrop: { starfruit: 10, ancient: 4 },
      },
    ]);
  });

  it('should default bee seasons to the flower plan seasons', () => {
    const scenario = parseScenario({
      crop: 'starfruit',
      tiles: 1,
      bees: {
        beeHouses: 2,
        flowerPlan: {
          summer: {
            fast: { name: 'poppy', growthDays: 7, basePrice: 140 },
            expensive: { name: 'melon', growthDays: 12, basePrice: 250 },
          },
        },
      },
    });

    expect(scenario.bees.seasons).toEqual(['summer']);
    expect(scenario.bees.flowerPlan.summer?.expensive).toEqual({ name: 'melon', growthDays: 12, basePrice: 250 });
  });

  describe('validation', () => {
    it('should require plots or tiles', () => {
      expect(() => parseScenario({ crop: 'starfruit' })).toThrow('plots: either plots or tiles is required');
    });

    it('should reject a non-object document', () => {
      expect(() => parseScenario([])).toThrow(ConfigValidationError);
    });

    it('should reject crops outside their seasons', () => {
      expect(() =>
        parseScenario({
          crop: 'starfruit',
          plots: [{ calendar: { type: 'seasons', seasons: ['spring'] }, tiles: { starfruit: 4 } }],
        })
      ).toThrow('plots[0].calendar: starfruit does not grow in spring');
    });

    it('should reject tiles for an unselected crop', () => {
      expect(() =>
        parseScenario({ crop: 'starfruit', plots: [{ tiles: { ancient: 2 } }] })
      ).toThrow("plots[0].tiles: defines tiles for ancient, but crop selection is 'starfruit'");
    });

    it('should reject negative and fractional counts', () => {
      expect(() => parseScenario({ crop: 'starfruit', tiles: -1 })).toThrow('tiles: must be >= 0 (got -1)');
      expect(() =>
        parseScenario({ crop: 'starfruit', tiles: 1, processors: { fermentation: 1.5 } })
      ).toThrow('processors.fermentation: must be a whole number (got 1.5)');
    });

    it('should reject more fallback vessels than vessels', () => {
      expect(() =>
        parseScenario({ crop: 'starfruit', tiles: 1, aging: { vessels: 2, fallbackVessels: 5 } })
      ).toThrow('aging.fallbackVessels: cannot exceed aging.vessels');
    });

    it('should reject a coop over capacity', () => {
      expect(() =>
        parseScenario({ crop: 'starfruit', tiles: 1, animals: { coops: [{ chickens: 13 }] } })
      ).toThrow('animals.coops[0]: has 13 animals, capacity is 12');
    });

    it('should reject priority entries that are not in play', () => {
      expect(() => parseScenario({ crop: 'starfruit', tiles: 1, priority: ['apple'] })).toThrow(
        "priority: 'apple' is neither a selected crop nor a planted fruit tree"
      );
    });

    it('should reject a zero price multiplier', () => {
      expect(() =>
        parseScenario({ crop: 'starfruit', tiles: 1, economy: { agedMultiplier: 0 } })
      ).toThrow('economy.agedMultiplier: must be > 0 (got 0)');
    });

    it('should reject a flower plan season missing from bee seasons', () => {
      expect(() =>
        parseScenario({
          crop: 'starfruit',
          tiles: 1,
          bees: {
            beeHouses: 1,
            seasons: ['spring'],
            flowerPlan: { summer: { fast: {}, expensive: {} } },
          },
        })
      ).toThrow("bees.flowerPlan: season 'summer' is not in bees.seasons");
    });

    it('should carry the path on the error', () => {
      try {
        parseScenario({ crop: 'melon', tiles: 1 });
        expect.fail('expected a validation error');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) expect(error.path).toBe('crop');
      }
    });
  });
});

describe('toSimulationInput', () => {
  it('should order tree fruit by fermented price and pass the cadence through', () => {
    const scenario = parseScenario({
      crop: 'starfruit',
      tiles: 2,
      economy: { fruitPrice: { cherry: 80, apple: 100 } },
      fruitTrees: { outdoors: { cherry: 1, apple: 1 } },
      simulation: { perennialFertilizerCadence: 'per-regrowth-cycle' },
    });
    const { input, config } = toSimulationInput(scenario);

    expect([...(input.externalDailyFruit?.keys() ?? [])]).toEqual(['apple', 'cherry']);
    expect(input.crops.map((c) => c.id)).toEqual(['starfruit']);
    expect(input.priority).toBeUndefined();
    expect(config).toEqual({ perennialFertilizerCadence: 'per-regrowth-cycle' });
  });
});

describe('loadScenarioFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'farm-year-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should apply overrides before validating', () => {
    const scenarioPath = join(dir, 'scenario.json');
    const overridesPath = join(dir, 'overrides.json');
    writeFileSync(scenarioPath, JSON.stringify({ crop: 'starfruit', tiles: 5, processors: { fermentation: 1 } }));
    writeFileSync(
      overridesPath,
      JSON.stringify({ version: 1, overrides: [{ path: 'processors.fermentation', newValue: 10 }] })
    );

    const scenario = loadScenarioFile(scenarioPath, overridesPath);
    expect(scenario.processors.fermentation).toBe(10);
  });

  it('should report an unreadable file as a config error', () => {
    const missing = join(dir, 'missing.json');
    expect(() => loadScenarioFile(missing)).toThrow(ConfigValidationError);
  });
});
