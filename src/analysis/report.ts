/**
 * Report Formatting
 * Plain-text rendering of farm year results for the console
 */

import type { DayMetrics } from '../core/types.js';
import type { Scenario } from '../config/scenario.js';
import type { FarmYearReport } from './farm-year.js';
import type { SweepResult } from './sweep.js';

function formatQuantities(map: ReadonlyMap<string, number>): string {
  if (map.size === 0) return '-';
  return [...map].map(([id, qty]) => `${id}=${qty}`).join(' ');
}

/**
 * One line per simulated day
 */
export function formatDayLine(metrics: DayMetrics): string {
  const day = String(metrics.day).padStart(3);
  const trigger = metrics.isTriggerDay ? ` aged[${formatQuantities(metrics.aged)}]` : '';
  return (
    `day ${day} ${metrics.season.padEnd(6)} ` +
    `harvest[${formatQuantities(metrics.harvested)}] ` +
    `intake[${formatQuantities(metrics.consumed)}] ` +
    `goods[${formatQuantities(metrics.completed.fermentation)}]${trigger}`
  );
}

export function formatScenarioHeader(scenario: Scenario): string {
  const p = scenario.processors;
  const tiles = scenario.plots
    .map((plot) => {
      const counts = Object.entries(plot.tilesByCrop).map(([id, n]) => `${id}=${n}`).join(',');
      const calendar = plot.calendar.type === 'always' ? 'always' : plot.calendar.seasons.join('+');
      return `${plot.name}(${calendar}: ${counts})`;
    })
    .join(' ');

  return [
    `crop=${scenario.crop} plots=${tiles}`,
    `fermentation=${p.fermentation} preserving=${p.preserving} drying=${p.drying} ` +
      `vessels=${scenario.aging.vessels} fertilizer=${scenario.growth.fertilizer} ` +
      `agriculturist=${scenario.professions.agriculturist}`,
    `start=${scenario.simulation.startSeason} cadence=${scenario.simulation.perennialFertilizerCadence}`,
  ].join('\n');
}

/**
 * Full year report in the order: crops, side streams, pipeline totals, quick wins
 */
export function formatReport(scenario: Scenario, report: FarmYearReport): string {
  const { summary, crops } = report;
  const lines: string[] = [];

  for (const cropId of summary.priority) {
    const r = summary.perCrop[cropId];
    const p = crops.perCrop[cropId];
    if (!r || !p) continue;
    lines.push(
      `${cropId}:`,
      `  fruit harvested: ${r.fruitHarvested}`,
      `  base goods produced: ${r.baseGoodsProduced}`,
      `  aged goods produced: ${r.agedGoodsProduced}`,
      `  base goods sold: ${r.baseGoodsSold}`,
      `  unprocessed fruit (year end): ${r.fruitUnprocessed}`,
      `  in fermentation (year end): ${r.inProcessingEnd.fermentation}`,
      `  preserves produced: ${r.preservesProduced}`,
      `  dried batches produced: ${r.driedGoodsProduced}`,
      `  seed units used: ${r.seedUnitsUsed}`,
      `  fertilizer units used: ${r.fertilizerUnitsUsed}`,
      `  revenue: fruit ${p.fruitRevenue}, base ${p.baseGoodsRevenue}, aged ${p.agedGoodsRevenue}, ` +
        `preserves ${p.preservesRevenue}, dried ${p.driedGoodsRevenue}`,
      `  costs: seed ${p.seedCost}, fertilizer ${p.fertilizerCost}`,
      `  net profit: ${p.netProfit}`,
      ''
    );
  }

  if (scenario.animals.coops.length > 0 || scenario.animals.barns.length > 0) {
    const a = report.animalProfit;
    lines.push(
      'animals:',
      `  cheese ${a.cheeseRevenue}, mayo ${a.mayoRevenue}, cloth ${a.clothRevenue}`,
      `  truffle oil ${a.truffleOilRevenue}, raw truffles ${a.rawTruffleRevenue}`,
      `  raw animal products ${a.rawAnimalRevenue}`,
      ''
    );
  }

  if (scenario.bees.beeHouses > 0) {
    lines.push('bees:', `  honey: ${report.bees.honeyTotal} (revenue ${report.honeyRevenue})`, '');
  }

  if (report.fruitTrees.length > 0) {
    lines.push('fruit trees (per fruit, current prices):');
    for (const t of report.fruitTrees) {
      lines.push(
        `  ${t.fruitId} (${t.trees} trees): best=${t.best} (${t.bestValue}), ` +
          `next=${t.next} (${t.nextValue}), raw=${t.rawValue}`
      );
    }
    lines.push('');
  }

  const totals = summary.totals;
  lines.push(
    `all fruit processed: ${summary.allFruitProcessed}`,
    `aging vessels used: ${summary.aging.effectiveVessels} (fills ${summary.aging.fills.join(', ')})`,
    `uses per vessel (max 2.00): ${summary.aging.usesPerVessel.toFixed(2)}`
  );
  if (scenario.aging.fullBatchRequired) {
    lines.push(`full batch met (need ${scenario.aging.vessels} each trigger day): ${summary.aging.fullBatchMet}`);
  }
  lines.push(
    `total base goods sold: ${totals.baseGoodsSold}`,
    `total aged goods: ${totals.agedGoodsProduced}`,
    `total preserves: ${totals.preservesProduced}`,
    `total dried batches: ${totals.driedGoodsProduced}`,
    `total fruit unprocessed (year end): ${totals.fruitUnprocessed}`,
    `total revenue: ${report.totals.revenue}`,
    `total seed cost: ${report.totals.seedCost}`,
    `total fertilizer cost: ${report.totals.fertilizerCost}`,
    `TOTAL PROFIT: ${report.totals.profit}`
  );

  if (report.quickWins.length > 0) {
    lines.push('', 'quick wins:', ...report.quickWins.map((tip) => `  - ${tip}`));
  }

  return lines.join('\n');
}

export function formatSweep(result: SweepResult): string {
  const lines = [`${result.param.padStart(12)}  profit      processed  uses/vessel`];
  for (const point of result.points) {
    const marker = point === result.best ? ' *' : '';
    lines.push(
      `${String(point.value).padStart(12)}  ${String(point.totalProfit).padEnd(10)}  ` +
        `${String(point.allFruitProcessed).padEnd(9)}  ${point.usesPerVessel.toFixed(2)}${marker}`
    );
  }
  return lines.join('\n');
}
