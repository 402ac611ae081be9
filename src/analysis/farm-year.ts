/**
 * Farm Year Analysis
 * Runs one scenario end to end: core simulation, side streams and economy,
 * plus hints derived from the year's bottlenecks
 */

import type { CropId, DayMetrics, YearSummary } from '../core/types.js';
import { Simulation } from '../core/simulation.js';
import type { Scenario } from '../config/scenario.js';
import { toSimulationInput } from '../config/scenario.js';
import { simulateAnimals, type AnimalYearResult } from '../systems/animals.js';
import { simulateBees, type BeeYearResult } from '../systems/bees.js';
import { totalTreeCounts } from '../systems/fruit-trees.js';
import {
  buildCategoryTotals,
  computeAnimalProfit,
  computeHoneyRevenue,
  computeProfit,
  perFruitValues,
  type AnimalProfit,
  type ProcessingUse,
  type ProfitSummary,
  type RevenueCategory,
} from '../systems/economy.js';

const PROCESSING_USES: readonly ProcessingUse[] = ['raw', 'fermented', 'preserves', 'dried'];

/** Two trigger days per year */
export const MAX_USES_PER_VESSEL = 2;

// ============================================================================
// Types
// ============================================================================

export interface FruitTreeAdvice {
  fruitId: CropId;
  trees: number;
  best: ProcessingUse;
  bestValue: number;
  next: ProcessingUse;
  nextValue: number;
  rawValue: number;
}

export interface FarmYearTotals {
  revenue: number;
  seedCost: number;
  fertilizerCost: number;
  profit: number;
}

export interface FarmYearReport {
  summary: Readonly<YearSummary>;
  crops: ProfitSummary;
  animals: AnimalYearResult;
  animalProfit: AnimalProfit;
  bees: BeeYearResult;
  honeyRevenue: number;
  fruitTrees: FruitTreeAdvice[];
  categories: Record<RevenueCategory, number>;
  totals: FarmYearTotals;
  quickWins: string[];
}

export interface FarmYearOptions {
  /** Called after every simulated day */
  onDay?: (metrics: DayMetrics) => void;
}

// ============================================================================
// Analysis
// ============================================================================

/**
 * Per-fruit best and second-best use of tree fruit at current prices
 */
export function adviseFruitTrees(scenario: Scenario): FruitTreeAdvice[] {
  const counts = [...totalTreeCounts(scenario.fruitTrees)].sort(([a], [b]) => a.localeCompare(b));

  return counts.map(([fruitId, trees]) => {
    const values = perFruitValues(fruitId, scenario.economy, scenario.professions);
    const order = PROCESSING_USES.map((use) => [use, values[use]] as const).sort(
      (a, b) => b[1] - a[1]
    );
    const [best, bestValue] = order[0];
    const [next, nextValue] = order[1];
    return { fruitId, trees, best, bestValue, next, nextValue, rawValue: values.raw };
  });
}

/**
 * Hints for raising profit, one per detected bottleneck
 */
export function findQuickWins(
  scenario: Scenario,
  summary: Readonly<YearSummary>,
  animals: AnimalYearResult,
  animalProfit: AnimalProfit
): string[] {
  const tips: string[] = [];

  if (!summary.allFruitProcessed) {
    tips.push('Fermentation is a bottleneck (fruit or goods left unprocessed). Add fermentation units or reduce tiles.');
  }
  if (scenario.aging.vessels > 0 && summary.aging.usesPerVessel < MAX_USES_PER_VESSEL) {
    tips.push('Aging vessels are underused. Stockpile base goods before the trigger days or lower the vessel count.');
  }
  if (summary.totals.inProcessingEnd.preserving > 0) {
    tips.push('Preserving units are still running at year end. Add units or reduce preserving input.');
  }
  if (summary.totals.inProcessingEnd.drying > 0) {
    tips.push('Drying units are still running at year end. Add units or reduce drying input.');
  }
  if (animalProfit.rawAnimalRevenue > 0) {
    tips.push('Raw animal products sold. Add mayo machines, cheese presses or looms to increase value.');
  }
  if (animals.rawTruffles > 0 && scenario.animalMachines.oilMakers > 0) {
    tips.push('Truffles exceeded oil maker capacity. Add oil makers if you prefer truffle oil.');
  }
  if (
    scenario.bees.beeHouses > 0 &&
    Object.keys(scenario.bees.flowerPlan).length === 0 &&
    scenario.bees.flowerBasePrice <= 0
  ) {
    tips.push('Bee houses make wild honey. Plant flowers or set a flower plan for higher honey value.');
  }

  return tips;
}

/**
 * Simulate a whole year for a validated scenario and price the result
 */
export function runFarmYear(scenario: Scenario, options: FarmYearOptions = {}): FarmYearReport {
  const { input, config } = toSimulationInput(scenario);
  const sim = new Simulation(input, config);
  while (!sim.isComplete()) {
    const metrics = sim.tick();
    options.onDay?.(metrics);
  }
  const summary = sim.getSummary();

  const crops = computeProfit(
    summary,
    scenario.economy,
    scenario.growth.fertilizer,
    scenario.professions
  );
  const animals = simulateAnimals(
    scenario.animals,
    scenario.animalMachines,
    scenario.professions,
    summary.daysSimulated,
    scenario.simulation.startSeason
  );
  const animalProfit = computeAnimalProfit(animals, scenario.professions);
  const bees = simulateBees(scenario.bees);
  const honeyRevenue = computeHoneyRevenue(bees, scenario.professions.artisan);

  return {
    summary,
    crops,
    animals,
    animalProfit,
    bees,
    honeyRevenue,
    fruitTrees: adviseFruitTrees(scenario),
    categories: buildCategoryTotals(crops, animalProfit, honeyRevenue),
    totals: {
      revenue: crops.totalRevenue + animalProfit.totalRevenue + honeyRevenue,
      seedCost: crops.totalSeedCost,
      fertilizerCost: crops.totalFertilizerCost,
      profit: crops.totalProfit + animalProfit.totalRevenue + honeyRevenue,
    },
    quickWins: findQuickWins(scenario, summary, animals, animalProfit),
  };
}
