/**
 * Economy Tests
 * Verify unit prices, crop profit and side-stream revenue
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ECONOMY,
  buildCategoryTotals,
  computeAnimalProfit,
  computeCropProfit,
  computeHoneyRevenue,
  fermentedPriceFor,
  honeyPrice,
  perFruitValues,
  sortByFermentedPrice,
  toCoins,
  unitPrices,
} from '../../src/systems/economy.js';
import { NO_ANIMALS, simulateAnimals } from '../../src/systems/animals.js';
import type { CropYearSummary, EconomyConfig } from '../../src/core/types.js';

const NO_PROFESSIONS = { artisan: false, tiller: false };

function createCropSummary(overrides: Partial<CropYearSummary> = {}): CropYearSummary {
  return {
    cropId: 'starfruit',
    fruitHarvested: 0,
    fruitUnprocessed: 0,
    baseGoodsProduced: 0,
    agedGoodsProduced: 0,
    baseGoodsSold: 0,
    preservesProduced: 0,
    driedGoodsProduced: 0,
    inProcessingEnd: { fermentation: 0, preserving: 0, drying: 0 },
    seedUnitsUsed: 0,
    fertilizerUnitsUsed: 0,
    fullyProcessed: true,
    ...overrides,
  };
}

function createEconomy(overrides: Partial<EconomyConfig> = {}): EconomyConfig {
  return { ...DEFAULT_ECONOMY, ...overrides };
}

describe('toCoins', () => {
  it('should truncate to whole coins', () => {
    expect(toCoins(12.99)).toBe(12);
    expect(toCoins(-0.5)).toBe(-1);
  });

  it('should absorb floating-point noise just below an integer', () => {
    expect(toCoins(3149.9999999999995)).toBe(3150);
  });
});

describe('unitPrices', () => {
  it('should derive every product price from the fruit price', () => {
    expect(unitPrices('starfruit', DEFAULT_ECONOMY, NO_PROFESSIONS)).toEqual({
      raw: 750,
      fermented: 2250,
      preserves: 1550,
      driedBatch: 5650,
    });
    expect(unitPrices('ancient', DEFAULT_ECONOMY, NO_PROFESSIONS)).toEqual({
      raw: 550,
      fermented: 1650,
      preserves: 1150,
      driedBatch: 4150,
    });
  });

  it('should apply artisan to goods and tiller to raw fruit', () => {
    expect(unitPrices('starfruit', DEFAULT_ECONOMY, { artisan: true, tiller: true })).toEqual({
      raw: 825,
      fermented: 3150,
      preserves: 2170,
      driedBatch: 7910,
    });
  });

  it('should price unknown fruit at zero', () => {
    expect(unitPrices('durian', DEFAULT_ECONOMY, NO_PROFESSIONS)).toEqual({
      raw: 0,
      fermented: 0,
      preserves: 0,
      driedBatch: 0,
    });
  });

  it('should prefer an explicit fermented price', () => {
    const economy = createEconomy({ fermentedPrice: { starfruit: 2000 } });
    expect(fermentedPriceFor('starfruit', economy)).toBe(2000);
    expect(fermentedPriceFor('ancient', economy)).toBe(1650);
  });
});

describe('perFruitValues', () => {
  it('should value one fruit under each use', () => {
    const economy = createEconomy({ fruitPrice: { apple: 100 } });
    expect(perFruitValues('apple', economy, NO_PROFESSIONS)).toEqual({
      raw: 100,
      fermented: 300,
      preserves: 250,
      dried: 155,
    });
  });
});

describe('sortByFermentedPrice', () => {
  it('should order by descending fermented price and keep ties in input order', () => {
    const economy = createEconomy({ fruitPrice: { apple: 100, cherry: 80, peach: 140, plum: 80 } });
    expect(sortByFermentedPrice(['cherry', 'apple', 'plum', 'peach'], economy)).toEqual([
      'peach',
      'apple',
      'cherry',
      'plum',
    ]);
  });
});

describe('computeCropProfit', () => {
  it('should add every revenue stream and subtract costs', () => {
    const profit = computeCropProfit(
      createCropSummary({
        fruitUnprocessed: 2,
        baseGoodsSold: 10,
        agedGoodsProduced: 4,
        preservesProduced: 3,
        driedGoodsProduced: 1,
        seedUnitsUsed: 15,
        fertilizerUnitsUsed: 15,
      }),
      DEFAULT_ECONOMY,
      'deluxe_speed_gro',
      NO_PROFESSIONS
    );

    expect(profit).toEqual({
      cropId: 'starfruit',
      fruitRevenue: 1500,
      baseGoodsRevenue: 22500,
      agedGoodsRevenue: 18000,
      preservesRevenue: 4650,
      driedGoodsRevenue: 5650,
      seedCost: 6000,
      fertilizerCost: 2250,
      netProfit: 44050,
    });
  });

  it('should not charge fertilizer when none is used', () => {
    const profit = computeCropProfit(
      createCropSummary({ fertilizerUnitsUsed: 10 }),
      DEFAULT_ECONOMY,
      'none',
      NO_PROFESSIONS
    );
    expect(profit.fertilizerCost).toBe(0);
  });
});

describe('honey', () => {
  it('should price honey from the flower price', () => {
    expect(honeyPrice(0, false)).toBe(100);
    expect(honeyPrice(80, false)).toBe(260);
    expect(honeyPrice(80, true)).toBe(364);
  });

  it('should sum revenue per flower price', () => {
    const revenue = computeHoneyRevenue(
      { honeyByFlowerPrice: new Map([[0, 2], [90, 1], [140, 4]]), honeyTotal: 7 },
      false
    );
    expect(revenue).toBe(2000);
  });
});

describe('computeAnimalProfit', () => {
  it('should sell unconverted milk raw with the rancher bonus', () => {
    const result = simulateAnimals({
      ...NO_ANIMALS,
      barns: [{ name: 'barn', cows: 1, goats: 0, pigs: 0, sheep: 0 }],
    });
    const profit = computeAnimalProfit(result, { artisan: false, rancher: true, botanist: false });

    expect(profit.rawAnimalRevenue).toBe(16800);
    expect(profit.cheeseRevenue).toBe(0);
    expect(profit.totalRevenue).toBe(16800);
  });

  it('should price truffles as iridium for a botanist', () => {
    const result = simulateAnimals({
      ...NO_ANIMALS,
      barns: [{ name: 'barn', cows: 0, goats: 0, pigs: 1, sheep: 0 }],
    });
    const profit = computeAnimalProfit(result, { artisan: false, rancher: false, botanist: true });

    expect(profit.rawTruffleRevenue).toBe(84 * 1250);
  });
});

describe('buildCategoryTotals', () => {
  it('should sum crop categories and carry side streams', () => {
    const starfruit = computeCropProfit(
      createCropSummary({ baseGoodsSold: 2, fruitUnprocessed: 1 }),
      DEFAULT_ECONOMY,
      'none',
      NO_PROFESSIONS
    );
    const ancient = computeCropProfit(
      createCropSummary({ cropId: 'ancient', baseGoodsSold: 1 }),
      DEFAULT_ECONOMY,
      'none',
      NO_PROFESSIONS
    );
    const animals = computeAnimalProfit(simulateAnimals(NO_ANIMALS), {
      artisan: false,
      rancher: false,
      botanist: false,
    });

    const totals = buildCategoryTotals(
      {
        perCrop: { starfruit, ancient },
        totalRevenue: 0,
        totalSeedCost: 0,
        totalFertilizerCost: 0,
        totalProfit: 0,
      },
      animals,
      300
    );

    expect(totals.baseGoods).toBe(2 * 2250 + 1650);
    expect(totals.rawFruit).toBe(750);
    expect(totals.honey).toBe(300);
    expect(totals.cheese).toBe(0);
  });
});
