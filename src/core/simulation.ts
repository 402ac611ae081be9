/**
 * Main Simulation Loop
 * Orchestrates plots, processing and aging in the fixed daily order
 */

import type {
  CropId,
  CropYearSummary,
  DayMetrics,
  ProcessorKind,
  SimulationConfig,
  SimulationInput,
  YearSummary,
} from './types.js';
import { SimulationError } from './errors.js';
import { DAYS_PER_YEAR, resolveDay } from './calendar.js';
import { hashState } from './hash.js';
import { DEFAULT_CONFIG, initializeWorld, type SimulationState } from './world.js';
import { advancePlot } from '../systems/plots.js';
import { PROCESSOR_ORDER } from '../systems/processing.js';

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object') deepFreeze(child);
  }
  return Object.freeze(value);
}

function addTo(map: Map<CropId, number>, cropId: CropId, quantity: number): void {
  if (quantity <= 0) return;
  map.set(cropId, (map.get(cropId) ?? 0) + quantity);
}

/**
 * Simulation class owns one year's state and advances it a day at a time
 */
export class Simulation {
  private state: SimulationState;
  private config: SimulationConfig;
  private tickHistory: string[] = [];

  constructor(input: SimulationInput, config: Partial<SimulationConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.state = initializeWorld(input, this.config);
  }

  getState(): Readonly<SimulationState> {
    return this.state;
  }

  getConfig(): Readonly<SimulationConfig> {
    return this.config;
  }

  getDay(): number {
    return this.state.day;
  }

  isComplete(): boolean {
    return this.state.day >= DAYS_PER_YEAR;
  }

  getTickHistory(): string[] {
    return [...this.tickHistory];
  }

  /**
   * Execute one simulated day
   */
  tick(): DayMetrics {
    if (this.isComplete()) {
      throw new SimulationError(`Year already complete after day ${DAYS_PER_YEAR}`, 'YEAR_COMPLETE');
    }

    const state = this.state;
    state.day += 1;
    const { day, season } = resolveDay(state.day, state.startSeason);

    // =========================================================================
    // 1. Plot growth and harvest
    // =========================================================================
    const harvested = new Map<CropId, number>();
    for (const plot of state.plots) {
      for (const [cropId, quantity] of advancePlot(plot, season)) {
        addTo(harvested, cropId, quantity);
      }
    }
    for (const [cropId, daily] of state.externalDailyFruit) {
      addTo(harvested, cropId, daily[day - 1] ?? 0);
    }
    for (const [cropId, quantity] of harvested) {
      state.ledger.addHarvest(cropId, quantity);
    }

    // =========================================================================
    // 2. Processing intake
    // =========================================================================
    const processed = state.allocator.processDay(state.ledger);
    for (const [cropId, quantity] of processed.completed.fermentation) {
      state.batcher.addGoods(cropId, quantity);
    }

    // =========================================================================
    // 3. Aging batch on trigger days
    // =========================================================================
    const isTriggerDay = state.batcher.isTriggerDay(day);
    const aged = isTriggerDay ? state.batcher.fill() : new Map<CropId, number>();

    const stateHash = hashState(this.snapshot());
    this.tickHistory.push(stateHash);

    return {
      day,
      season,
      harvested,
      consumed: processed.consumed,
      completed: processed.completed,
      aged,
      isTriggerDay,
      stateHash,
    };
  }

  /**
   * Run the remaining days, or at most `days` of them
   */
  run(days: number = DAYS_PER_YEAR - this.state.day): DayMetrics[] {
    const metrics: DayMetrics[] = [];
    for (let i = 0; i < days && !this.isComplete(); i++) {
      metrics.push(this.tick());
    }
    return metrics;
  }

  /**
   * Both conservation identities hold for every crop
   */
  checkConservation(): boolean {
    return (
      this.state.ledger.isBalanced() && this.state.allocator.isConsistentWith(this.state.ledger)
    );
  }

  private snapshot(): unknown {
    const { day, plots, ledger, allocator, batcher } = this.state;
    return {
      day,
      plots: plots.map((p) =>
        p.crops.map((c) => [
          c.cropId,
          c.planted,
          c.daysRemaining,
          c.harvested,
          c.seedUnits,
          c.fertilizerUnits,
        ])
      ),
      ledger: ledger.cropIds().map((id) => [id, ledger.get(id)]),
      occupancy: PROCESSOR_ORDER.map((kind) => allocator.pools[kind].occupied),
      aging: batcher.snapshot(),
    };
  }

  private cropSummary(cropId: CropId, agedByCrop: ReadonlyMap<CropId, number>): CropYearSummary {
    const { ledger, allocator, plots, startingUnaged } = this.state;
    const entry = ledger.get(cropId);
    const inProcessingEnd: Record<ProcessorKind, number> = {
      fermentation: allocator.pools.fermentation.inFlight(cropId),
      preserving: allocator.pools.preserving.inFlight(cropId),
      drying: allocator.pools.drying.inFlight(cropId),
    };

    let seedUnitsUsed = 0;
    let fertilizerUnitsUsed = 0;
    for (const plot of plots) {
      for (const crop of plot.crops) {
        if (crop.cropId !== cropId) continue;
        seedUnitsUsed += crop.seedUnits;
        fertilizerUnitsUsed += crop.fertilizerUnits;
      }
    }

    const baseGoodsProduced = allocator.pools.fermentation.completed(cropId);
    const agedGoodsProduced = agedByCrop.get(cropId) ?? 0;
    const fruitUnprocessed = entry?.unprocessed ?? 0;

    return {
      cropId,
      fruitHarvested: entry?.harvested ?? 0,
      fruitUnprocessed,
      baseGoodsProduced,
      agedGoodsProduced,
      baseGoodsSold: (startingUnaged[cropId] ?? 0) + baseGoodsProduced - agedGoodsProduced,
      preservesProduced: allocator.pools.preserving.completed(cropId),
      driedGoodsProduced: allocator.pools.drying.completed(cropId),
      inProcessingEnd,
      seedUnitsUsed,
      fertilizerUnitsUsed,
      fullyProcessed: fruitUnprocessed === 0 && inProcessingEnd.fermentation === 0,
    };
  }

  /**
   * Summary of the days simulated so far; final once the year is complete
   */
  getSummary(): Readonly<YearSummary> {
    const aging = this.state.batcher.resolve();
    const perCrop: Record<CropId, CropYearSummary> = {};
    const totals: YearSummary['totals'] = {
      fruitHarvested: 0,
      fruitUnprocessed: 0,
      baseGoodsSold: 0,
      agedGoodsProduced: 0,
      preservesProduced: 0,
      driedGoodsProduced: 0,
      inProcessingEnd: { fermentation: 0, preserving: 0, drying: 0 },
    };

    for (const cropId of this.state.priority) {
      const crop = this.cropSummary(cropId, aging.agedByCrop);
      perCrop[cropId] = crop;
      totals.fruitHarvested += crop.fruitHarvested;
      totals.fruitUnprocessed += crop.fruitUnprocessed;
      totals.baseGoodsSold += crop.baseGoodsSold;
      totals.agedGoodsProduced += crop.agedGoodsProduced;
      totals.preservesProduced += crop.preservesProduced;
      totals.driedGoodsProduced += crop.driedGoodsProduced;
      for (const kind of PROCESSOR_ORDER) {
        totals.inProcessingEnd[kind] += crop.inProcessingEnd[kind];
      }
    }

    return deepFreeze<YearSummary>({
      daysSimulated: this.state.day,
      priority: [...this.state.priority],
      perCrop,
      aging: {
        effectiveVessels: aging.effectiveVessels,
        fullBatchMet: aging.fullBatchMet,
        usesPerVessel: aging.usesPerVessel,
        fills: aging.fills,
      },
      allFruitProcessed: Object.values(perCrop).every((c) => c.fullyProcessed),
      totals,
    });
  }
}

/**
 * Run a whole year in one call
 */
export function simulateYear(
  input: SimulationInput,
  config: Partial<SimulationConfig> = {}
): Readonly<YearSummary> {
  const sim = new Simulation(input, config);
  sim.run();
  return sim.getSummary();
}

/**
 * Two independent runs of the same input produce identical day hashes
 */
export function verifyDeterminism(
  input: SimulationInput,
  config: Partial<SimulationConfig> = {}
): boolean {
  const history1 = new Simulation(input, config).run().map((m) => m.stateHash);
  const history2 = new Simulation(input, config).run().map((m) => m.stateHash);

  if (history1.length !== history2.length) return false;
  return history1.every((hash, i) => hash === history2[i]);
}
