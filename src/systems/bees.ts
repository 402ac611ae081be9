/**
 * Bee System
 * Honey output of bee houses over the active seasons
 */

import type { BeeConfig } from '../core/types.js';
import { DAYS_PER_SEASON } from '../core/calendar.js';

export const HONEY_INTERVAL_DAYS = 4;

export interface BeeYearResult {
  /** Honey count keyed by the flower price it was made with (0 = wild) */
  honeyByFlowerPrice: Map<number, number>;
  honeyTotal: number;
}

export const NO_BEES: BeeConfig = {
  beeHouses: 0,
  flowerBasePrice: 0,
  seasons: ['spring', 'summer', 'fall'],
  flowerPlan: {},
};

/**
 * One honey per house every fourth day of each configured season.
 * With a flower plan, the expensive flower counts once it is ready, the fast
 * one before that, and wild honey before either blooms.
 */
export function simulateBees(config: BeeConfig): BeeYearResult {
  const honeyByFlowerPrice = new Map<number, number>();
  const houses = Math.max(0, config.beeHouses);
  if (houses === 0) return { honeyByFlowerPrice, honeyTotal: 0 };

  for (const season of config.seasons) {
    const plan = config.flowerPlan[season];
    for (let day = HONEY_INTERVAL_DAYS; day <= DAYS_PER_SEASON; day += HONEY_INTERVAL_DAYS) {
      let flowerPrice = config.flowerBasePrice;
      if (plan) {
        const fastReady = Math.max(0, plan.fast.growthDays) + 1;
        const expensiveReady = Math.max(0, plan.expensive.growthDays) + 1;
        if (day >= expensiveReady) flowerPrice = plan.expensive.basePrice;
        else if (day >= fastReady) flowerPrice = plan.fast.basePrice;
        else flowerPrice = 0;
      }
      honeyByFlowerPrice.set(flowerPrice, (honeyByFlowerPrice.get(flowerPrice) ?? 0) + houses);
    }
  }

  let honeyTotal = 0;
  for (const count of honeyByFlowerPrice.values()) honeyTotal += count;
  return { honeyByFlowerPrice, honeyTotal };
}
