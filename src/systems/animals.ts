/**
 * Animal System
 * Yearly animal products and the machines that convert them
 *
 * Animals are assumed fed every day. Machines take one item each per day.
 */

import type { AnimalMachines, AnimalsConfig, Professions, Season } from '../core/types.js';
import { DAYS_PER_YEAR, resolveDay } from '../core/calendar.js';

export const DUCK_EGG_DAYS = 2;
export const GOAT_MILK_DAYS = 2;
export const RABBIT_WOOL_DAYS = 4;
export const SHEEP_WOOL_DAYS = 3;
export const GATHERER_TRUFFLE_BONUS = 0.2;
export const BUILDING_CAPACITY = 12;

export interface AnimalYearResult {
  eggs: number;
  largeEggs: number;
  voidEggs: number;
  duckEggs: number;
  milk: number;
  largeMilk: number;
  goatMilk: number;
  largeGoatMilk: number;
  wool: number;
  rabbitFeet: number;
  mayo: number;
  goldMayo: number;
  voidMayo: number;
  duckMayo: number;
  cheese: number;
  goldCheese: number;
  goatCheese: number;
  goldGoatCheese: number;
  cloth: number;
  truffles: number;
  truffleOil: number;
  rawTruffles: number;
}

export const NO_ANIMALS: AnimalsConfig = {
  coops: [],
  barns: [],
  largeEggRate: 0,
  largeMilkRate: 0,
  largeGoatMilkRate: 0,
  rabbitFootRate: 0,
};

export const NO_ANIMAL_MACHINES: AnimalMachines = {
  oilMakers: 0,
  mayoMachines: 0,
  cheesePresses: 0,
  looms: 0,
};

function clampRate(rate: number): number {
  return Math.max(0, Math.min(rate, 1));
}

/**
 * Split a total into [normal, large] using a floored rate
 */
function splitWithRate(total: number, rate: number): [number, number] {
  const large = Math.floor(total * clampRate(rate));
  return [Math.max(0, total - large), large];
}

function countNonWinterDays(days: number, startSeason: Season): number {
  let count = 0;
  for (let day = 1; day <= Math.min(days, DAYS_PER_YEAR); day++) {
    if (resolveDay(day, startSeason).season !== 'winter') count++;
  }
  return count;
}

/**
 * Take up to capacity items from the inventory in priority order
 */
function allocateByPriority<K extends string>(
  inventory: Record<K, number>,
  capacity: number,
  priority: readonly K[]
): Record<K, number> {
  const taken = { ...inventory };
  let remaining = Math.max(0, capacity);
  for (const key of priority) {
    const use = Math.min(Math.max(0, inventory[key]), remaining);
    taken[key] = use;
    remaining -= use;
  }
  return taken;
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}

export function simulateAnimals(
  config: AnimalsConfig,
  machines: AnimalMachines = NO_ANIMAL_MACHINES,
  professions: Pick<Professions, 'gatherer' | 'shepherd'> = { gatherer: false, shepherd: false },
  days: number = DAYS_PER_YEAR,
  startSeason: Season = 'spring'
): AnimalYearResult {
  const chickens = sum(config.coops, (c) => c.chickens);
  const voidChickens = sum(config.coops, (c) => c.voidChickens);
  const ducks = sum(config.coops, (c) => c.ducks);
  const rabbits = sum(config.coops, (c) => c.rabbits);
  const cows = sum(config.barns, (b) => b.cows);
  const goats = sum(config.barns, (b) => b.goats);
  const pigs = sum(config.barns, (b) => b.pigs);
  const sheep = sum(config.barns, (b) => b.sheep);

  const [eggs, largeEggs] = splitWithRate(chickens * days, config.largeEggRate);
  const voidEggs = voidChickens * days;
  const duckEggs = ducks * Math.floor(days / DUCK_EGG_DAYS);

  const [milk, largeMilk] = splitWithRate(cows * days, config.largeMilkRate);
  const [goatMilk, largeGoatMilk] = splitWithRate(
    goats * Math.floor(days / GOAT_MILK_DAYS),
    config.largeGoatMilkRate
  );

  const rabbitProducts = rabbits * Math.floor(days / RABBIT_WOOL_DAYS);
  const rabbitFeet = Math.floor(rabbitProducts * clampRate(config.rabbitFootRate));
  const sheepInterval = professions.shepherd ? 1 : SHEEP_WOOL_DAYS;
  const wool = rabbitProducts - rabbitFeet + sheep * Math.floor(days / sheepInterval);

  let truffles = pigs * countNonWinterDays(days, startSeason);
  if (professions.gatherer) truffles += Math.floor(truffles * GATHERER_TRUFFLE_BONUS);
  const truffleOil = Math.min(truffles, Math.max(0, machines.oilMakers) * days);

  const eggsUsed = allocateByPriority(
    { duckEggs, voidEggs, largeEggs, eggs },
    Math.max(0, machines.mayoMachines) * days,
    ['duckEggs', 'voidEggs', 'largeEggs', 'eggs']
  );
  const milkUsed = allocateByPriority(
    { largeGoatMilk, goatMilk, largeMilk, milk },
    Math.max(0, machines.cheesePresses) * days,
    ['largeGoatMilk', 'goatMilk', 'largeMilk', 'milk']
  );

  return {
    eggs,
    largeEggs,
    voidEggs,
    duckEggs,
    milk,
    largeMilk,
    goatMilk,
    largeGoatMilk,
    wool,
    rabbitFeet,
    mayo: eggsUsed.eggs,
    goldMayo: eggsUsed.largeEggs,
    voidMayo: eggsUsed.voidEggs,
    duckMayo: eggsUsed.duckEggs,
    cheese: milkUsed.milk,
    goldCheese: milkUsed.largeMilk,
    goatCheese: milkUsed.goatMilk,
    goldGoatCheese: milkUsed.largeGoatMilk,
    cloth: Math.min(wool, Math.max(0, machines.looms) * days),
    truffles,
    truffleOil,
    rawTruffles: truffles - truffleOil,
  };
}
