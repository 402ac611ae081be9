/**
 * Fruit Tree System
 * Daily fruit supplied to the processing pipeline from trees
 */

import type { CropId, FruitTreeScope, FruitTreesConfig, Season } from '../core/types.js';
import { DAYS_PER_YEAR, resolveDay } from '../core/calendar.js';

export const FRUIT_TREE_SEASONS: Readonly<Record<CropId, readonly Season[]>> = {
  apricot: ['spring'],
  cherry: ['spring'],
  orange: ['summer'],
  peach: ['summer'],
  banana: ['summer'],
  mango: ['summer'],
  apple: ['fall'],
  pomegranate: ['fall'],
};

export const FRUIT_TREE_SCOPES: readonly FruitTreeScope[] = ['greenhouse', 'outdoors', 'always'];

export const NO_FRUIT_TREES: FruitTreesConfig = { greenhouse: {}, outdoors: {}, always: {} };

/**
 * Canonical fruit id for a loosely written tree name, or null if unknown
 */
export function normalizeFruitTreeName(raw: string): CropId | null {
  const key = raw.trim().toLowerCase().replace(/[\s_-]/g, '');
  return key in FRUIT_TREE_SEASONS ? key : null;
}

/**
 * Total trees per fruit across all scopes; zero counts are skipped
 */
export function totalTreeCounts(config: FruitTreesConfig): Map<CropId, number> {
  const totals = new Map<CropId, number>();
  for (const scope of FRUIT_TREE_SCOPES) {
    for (const [fruitId, count] of Object.entries(config[scope])) {
      if (count <= 0) continue;
      totals.set(fruitId, (totals.get(fruitId) ?? 0) + count);
    }
  }
  return totals;
}

/**
 * Fruit produced on each day of the year, indexed by day - 1
 */
export function buildDailyFruit(
  config: FruitTreesConfig,
  startSeason: Season = 'spring',
  days: number = DAYS_PER_YEAR
): Map<CropId, number[]> {
  const daily = new Map<CropId, number[]>();
  for (const fruitId of totalTreeCounts(config).keys()) {
    daily.set(fruitId, new Array<number>(days).fill(0));
  }

  for (let day = 1; day <= days; day++) {
    const { season } = resolveDay(day, startSeason);
    for (const scope of FRUIT_TREE_SCOPES) {
      for (const [fruitId, count] of Object.entries(config[scope])) {
        if (count <= 0) continue;
        if (scope === 'outdoors' && !(FRUIT_TREE_SEASONS[fruitId] ?? []).includes(season)) continue;
        const series = daily.get(fruitId);
        if (series) series[day - 1] += count;
      }
    }
  }

  return daily;
}
