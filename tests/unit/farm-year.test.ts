/**
 * Farm Year Tests
 * Verify whole-year totals, fruit tree advice and quick wins
 */

import { describe, it, expect } from 'vitest';
import { adviseFruitTrees, runFarmYear } from '../../src/analysis/farm-year.js';
import { parseScenario } from '../../src/config/scenario.js';
import type { DayMetrics } from '../../src/core/types.js';

function createScenario(fermentation: number, extra: Record<string, unknown> = {}) {
  return parseScenario({ crop: 'starfruit', tiles: 5, processors: { fermentation }, ...extra });
}

describe('runFarmYear', () => {
  it('should sell unprocessed fruit raw and flag the fermentation bottleneck', () => {
    const report = runFarmYear(createScenario(0));

    expect(report.summary.perCrop.starfruit?.fruitHarvested).toBe(40);
    expect(report.totals).toEqual({ revenue: 30000, seedCost: 18000, fertilizerCost: 0, profit: 12000 });
    expect(report.quickWins).toEqual([
      'Fermentation is a bottleneck (fruit or goods left unprocessed). Add fermentation units or reduce tiles.',
    ]);
  });

  it('should ferment every fruit with enough units', () => {
    const report = runFarmYear(createScenario(5));

    expect(report.summary.allFruitProcessed).toBe(true);
    expect(report.summary.perCrop.starfruit?.baseGoodsSold).toBe(40);
    expect(report.totals.revenue).toBe(90000);
    expect(report.totals.profit).toBe(72000);
    expect(report.quickWins).toEqual([]);
  });

  it('should report every simulated day', () => {
    const days: DayMetrics[] = [];
    runFarmYear(createScenario(5), { onDay: (m) => days.push(m) });

    expect(days).toHaveLength(112);
    expect(days[0].day).toBe(1);
    expect(days[111].day).toBe(112);
  });

  it('should add wild honey to profit and suggest flowers', () => {
    const report = runFarmYear(createScenario(5, { bees: { beeHouses: 1 } }));

    expect(report.bees.honeyTotal).toBe(21);
    expect(report.honeyRevenue).toBe(2100);
    expect(report.totals.profit).toBe(74100);
    expect(report.quickWins).toEqual([
      'Bee houses make wild honey. Plant flowers or set a flower plan for higher honey value.',
    ]);
  });

  it('should flag unused aging vessels', () => {
    const report = runFarmYear(createScenario(5, { aging: { vessels: 10 } }));
    expect(report.quickWins).toContain(
      'Aging vessels are underused. Stockpile base goods before the trigger days or lower the vessel count.'
    );
  });
});

describe('adviseFruitTrees', () => {
  it('should rank processing uses by value per fruit', () => {
    const scenario = createScenario(5, {
      economy: { fruitPrice: { apple: 100 } },
      fruitTrees: { outdoors: { apple: 2 } },
    });

    expect(adviseFruitTrees(scenario)).toEqual([
      {
        fruitId: 'apple',
        trees: 2,
        best: 'fermented',
        bestValue: 300,
        next: 'preserves',
        nextValue: 250,
        rawValue: 100,
      },
    ]);
  });

  it('should return nothing without trees', () => {
    expect(adviseFruitTrees(createScenario(0))).toEqual([]);
  });
});
