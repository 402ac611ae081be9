/**
 * Economy System
 * Turns physical year totals into revenue, cost and profit
 *
 * Unit prices are truncated to whole coins after all multipliers, so every
 * revenue figure is an integer.
 */

import type {
  CropId,
  CropYearSummary,
  EconomyConfig,
  Fertilizer,
  Professions,
  YearSummary,
} from '../core/types.js';
import type { AnimalYearResult } from './animals.js';
import type { BeeYearResult } from './bees.js';

// ============================================================================
// Price Constants
// ============================================================================

export const ARTISAN_MULTIPLIER = 1.4;
export const TILLER_MULTIPLIER = 1.1;
export const RANCHER_MULTIPLIER = 1.2;
export const FERMENTED_FRUIT_MULTIPLIER = 3;

export const ANIMAL_PRICES = {
  egg: 50,
  largeEgg: 95,
  duckEgg: 95,
  voidEgg: 65,
  milk: 125,
  largeMilk: 190,
  goatMilk: 225,
  largeGoatMilk: 345,
  wool: 340,
  rabbitFoot: 565,
  mayo: 190,
  goldMayo: 285,
  duckMayo: 375,
  voidMayo: 275,
  cheese: 230,
  goldCheese: 345,
  goatCheese: 400,
  goldGoatCheese: 600,
  cloth: 470,
  truffle: 625,
  iridiumTruffle: 1250,
  truffleOil: 1065,
} as const;

export const DEFAULT_ECONOMY: EconomyConfig = {
  fruitPrice: { starfruit: 750, ancient: 550 },
  fermentedPrice: {},
  seedCost: { starfruit: 400, ancient: 0 },
  fertilizerCost: { speed_gro: 100, deluxe_speed_gro: 150, hyper_speed_gro: 70 },
  agedMultiplier: 2,
  fermentedQualityMultiplier: 1,
  fruitQualityMultiplier: 1,
};

/**
 * Truncate to whole coins, ignoring floating-point noise below a millionth
 */
export function toCoins(value: number): number {
  return Math.floor(value + 1e-6);
}

// ============================================================================
// Unit Prices
// ============================================================================

export interface UnitPrices {
  raw: number;
  fermented: number;
  preserves: number;
  /** One drying cycle's output */
  driedBatch: number;
}

export function fermentedPriceFor(cropId: CropId, economy: EconomyConfig): number {
  const explicit = economy.fermentedPrice[cropId];
  if (explicit !== undefined) return explicit;
  return (economy.fruitPrice[cropId] ?? 0) * FERMENTED_FRUIT_MULTIPLIER;
}

export function unitPrices(
  cropId: CropId,
  economy: EconomyConfig,
  professions: Pick<Professions, 'artisan' | 'tiller'>
): UnitPrices {
  const fruitPrice = economy.fruitPrice[cropId] ?? 0;
  const artisan = professions.artisan ? ARTISAN_MULTIPLIER : 1;

  const raw = fruitPrice * economy.fruitQualityMultiplier * (professions.tiller ? TILLER_MULTIPLIER : 1);
  const fermented = fermentedPriceFor(cropId, economy) * economy.fermentedQualityMultiplier * artisan;
  const preserves = fruitPrice > 0 ? (fruitPrice * 2 + 50) * artisan : 0;
  const driedBatch = fruitPrice > 0 ? toCoins(fruitPrice * 7.5 + 25) * artisan : 0;

  return {
    raw: toCoins(raw),
    fermented: toCoins(fermented),
    preserves: toCoins(preserves),
    driedBatch: toCoins(driedBatch),
  };
}

export type ProcessingUse = 'raw' | 'fermented' | 'preserves' | 'dried';

/**
 * Value of a single fruit under each use, for comparing where fruit should go
 */
export function perFruitValues(
  cropId: CropId,
  economy: EconomyConfig,
  professions: Pick<Professions, 'artisan' | 'tiller'>
): Record<ProcessingUse, number> {
  const fruitPrice = economy.fruitPrice[cropId] ?? 0;
  const prices = unitPrices(cropId, economy, professions);
  const dried = fruitPrice > 0 ? (fruitPrice * 1.5 + 5) * (professions.artisan ? ARTISAN_MULTIPLIER : 1) : 0;
  return {
    raw: prices.raw,
    fermented: prices.fermented,
    preserves: prices.preserves,
    dried: toCoins(dried),
  };
}

/**
 * Fruit ids ordered by descending fermented price; ties keep input order
 */
export function sortByFermentedPrice(ids: Iterable<CropId>, economy: EconomyConfig): CropId[] {
  return [...ids].sort((a, b) => fermentedPriceFor(b, economy) - fermentedPriceFor(a, economy));
}

// ============================================================================
// Crop Profit
// ============================================================================

export interface ProfitBreakdown {
  cropId: CropId;
  fruitRevenue: number;
  baseGoodsRevenue: number;
  agedGoodsRevenue: number;
  preservesRevenue: number;
  driedGoodsRevenue: number;
  seedCost: number;
  fertilizerCost: number;
  netProfit: number;
}

export interface ProfitSummary {
  perCrop: Record<CropId, ProfitBreakdown>;
  totalRevenue: number;
  totalSeedCost: number;
  totalFertilizerCost: number;
  totalProfit: number;
}

/**
 * Unprocessed fruit at year end is sold raw
 */
export function computeCropProfit(
  crop: CropYearSummary,
  economy: EconomyConfig,
  fertilizer: Fertilizer,
  professions: Pick<Professions, 'artisan' | 'tiller'>
): ProfitBreakdown {
  const prices = unitPrices(crop.cropId, economy, professions);

  const fruitRevenue = crop.fruitUnprocessed * prices.raw;
  const baseGoodsRevenue = crop.baseGoodsSold * prices.fermented;
  const agedGoodsRevenue = toCoins(crop.agedGoodsProduced * prices.fermented * economy.agedMultiplier);
  const preservesRevenue = crop.preservesProduced * prices.preserves;
  const driedGoodsRevenue = crop.driedGoodsProduced * prices.driedBatch;
  const seedCost = crop.seedUnitsUsed * (economy.seedCost[crop.cropId] ?? 0);
  const fertilizerCost =
    fertilizer === 'none' ? 0 : crop.fertilizerUnitsUsed * (economy.fertilizerCost[fertilizer] ?? 0);

  return {
    cropId: crop.cropId,
    fruitRevenue,
    baseGoodsRevenue,
    agedGoodsRevenue,
    preservesRevenue,
    driedGoodsRevenue,
    seedCost,
    fertilizerCost,
    netProfit:
      fruitRevenue +
      baseGoodsRevenue +
      agedGoodsRevenue +
      preservesRevenue +
      driedGoodsRevenue -
      seedCost -
      fertilizerCost,
  };
}

export function computeProfit(
  summary: Readonly<YearSummary>,
  economy: EconomyConfig,
  fertilizer: Fertilizer,
  professions: Pick<Professions, 'artisan' | 'tiller'>
): ProfitSummary {
  const perCrop: Record<CropId, ProfitBreakdown> = {};
  let totalSeedCost = 0;
  let totalFertilizerCost = 0;
  let totalProfit = 0;

  for (const [cropId, crop] of Object.entries(summary.perCrop)) {
    const breakdown = computeCropProfit(crop, economy, fertilizer, professions);
    perCrop[cropId] = breakdown;
    totalSeedCost += breakdown.seedCost;
    totalFertilizerCost += breakdown.fertilizerCost;
    totalProfit += breakdown.netProfit;
  }

  return {
    perCrop,
    totalRevenue: totalProfit + totalSeedCost + totalFertilizerCost,
    totalSeedCost,
    totalFertilizerCost,
    totalProfit,
  };
}

// ============================================================================
// Animals & Honey
// ============================================================================

export interface AnimalProfit {
  cheeseRevenue: number;
  mayoRevenue: number;
  clothRevenue: number;
  truffleOilRevenue: number;
  rawTruffleRevenue: number;
  rawAnimalRevenue: number;
  totalRevenue: number;
}

export function computeAnimalProfit(
  result: AnimalYearResult,
  professions: Pick<Professions, 'artisan' | 'rancher' | 'botanist'>
): AnimalProfit {
  const p = ANIMAL_PRICES;
  let cheeseRevenue =
    result.cheese * p.cheese +
    result.goldCheese * p.goldCheese +
    result.goatCheese * p.goatCheese +
    result.goldGoatCheese * p.goldGoatCheese;
  let mayoRevenue =
    result.mayo * p.mayo +
    result.goldMayo * p.goldMayo +
    result.duckMayo * p.duckMayo +
    result.voidMayo * p.voidMayo;
  let clothRevenue = result.cloth * p.cloth;
  let truffleOilRevenue = result.truffleOil * p.truffleOil;
  const rawTruffleRevenue =
    result.rawTruffles * (professions.botanist ? p.iridiumTruffle : p.truffle);

  let rawAnimalRevenue =
    (result.eggs - result.mayo) * p.egg +
    (result.largeEggs - result.goldMayo) * p.largeEgg +
    (result.duckEggs - result.duckMayo) * p.duckEgg +
    (result.voidEggs - result.voidMayo) * p.voidEgg +
    (result.milk - result.cheese) * p.milk +
    (result.largeMilk - result.goldCheese) * p.largeMilk +
    (result.goatMilk - result.goatCheese) * p.goatMilk +
    (result.largeGoatMilk - result.goldGoatCheese) * p.largeGoatMilk +
    (result.wool - result.cloth) * p.wool +
    result.rabbitFeet * p.rabbitFoot;

  if (professions.artisan) {
    cheeseRevenue = toCoins(cheeseRevenue * ARTISAN_MULTIPLIER);
    mayoRevenue = toCoins(mayoRevenue * ARTISAN_MULTIPLIER);
    clothRevenue = toCoins(clothRevenue * ARTISAN_MULTIPLIER);
    truffleOilRevenue = toCoins(truffleOilRevenue * ARTISAN_MULTIPLIER);
  }
  if (professions.rancher) {
    rawAnimalRevenue = toCoins(rawAnimalRevenue * RANCHER_MULTIPLIER);
  }

  return {
    cheeseRevenue,
    mayoRevenue,
    clothRevenue,
    truffleOilRevenue,
    rawTruffleRevenue,
    rawAnimalRevenue,
    totalRevenue:
      cheeseRevenue +
      mayoRevenue +
      clothRevenue +
      truffleOilRevenue +
      rawTruffleRevenue +
      rawAnimalRevenue,
  };
}

export function honeyPrice(flowerPrice: number, artisan: boolean): number {
  const base = 100 + 2 * Math.max(0, flowerPrice);
  return artisan ? toCoins(base * ARTISAN_MULTIPLIER) : base;
}

export function computeHoneyRevenue(result: BeeYearResult, artisan: boolean): number {
  let revenue = 0;
  for (const [flowerPrice, count] of result.honeyByFlowerPrice) {
    revenue += honeyPrice(flowerPrice, artisan) * count;
  }
  return revenue;
}

// ============================================================================
// Category Totals
// ============================================================================

export type RevenueCategory =
  | 'agedGoods'
  | 'baseGoods'
  | 'preserves'
  | 'driedGoods'
  | 'rawFruit'
  | 'cheese'
  | 'mayo'
  | 'cloth'
  | 'truffleOil'
  | 'rawTruffles'
  | 'rawAnimalProducts'
  | 'honey';

export function buildCategoryTotals(
  crops: ProfitSummary,
  animals: AnimalProfit,
  honeyRevenue: number
): Record<RevenueCategory, number> {
  const breakdowns = Object.values(crops.perCrop);
  const total = (pick: (b: ProfitBreakdown) => number): number =>
    breakdowns.reduce((acc, b) => acc + pick(b), 0);

  return {
    agedGoods: total((b) => b.agedGoodsRevenue),
    baseGoods: total((b) => b.baseGoodsRevenue),
    preserves: total((b) => b.preservesRevenue),
    driedGoods: total((b) => b.driedGoodsRevenue),
    rawFruit: total((b) => b.fruitRevenue),
    cheese: animals.cheeseRevenue,
    mayo: animals.mayoRevenue,
    cloth: animals.clothRevenue,
    truffleOil: animals.truffleOilRevenue,
    rawTruffles: animals.rawTruffleRevenue,
    rawAnimalProducts: animals.rawAnimalRevenue,
    honey: honeyRevenue,
  };
}
