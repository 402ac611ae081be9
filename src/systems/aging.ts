/**
 * Aging System
 * Fills aging vessels with unaged fermentation goods on the two trigger days
 *
 * Whether the full vessel count may be used is only known after the last
 * trigger day, so the batcher keeps a full plan and a fallback plan on
 * separate stock ledgers and picks one when the year is resolved. Fills are
 * reported once the applicable plan is settled.
 */

import type { AgingConfig, AgingSummary, CropId } from '../core/types.js';
import { assertCount } from '../core/errors.js';

export const FIRST_TRIGGER_DAY = 1;

interface AgingPlan {
  vessels: number;
  stock: Map<CropId, number>;
  aged: Map<CropId, number>;
  fills: number[];
  /** Goods aged on each trigger day so far */
  batches: Map<CropId, number>[];
}

export interface AgingResolution extends AgingSummary {
  agedByCrop: Map<CropId, number>;
}

function createPlan(vessels: number, startingStock: ReadonlyMap<CropId, number>): AgingPlan {
  return { vessels, stock: new Map(startingStock), aged: new Map(), fills: [], batches: [] };
}

function addToMap(map: Map<CropId, number>, cropId: CropId, quantity: number): void {
  map.set(cropId, (map.get(cropId) ?? 0) + quantity);
}

function fillPlan(plan: AgingPlan, priority: readonly CropId[]): void {
  const agedToday = new Map<CropId, number>();
  let free = plan.vessels;

  for (const cropId of priority) {
    if (free <= 0) break;
    const available = plan.stock.get(cropId) ?? 0;
    const take = Math.min(available, free);
    if (take <= 0) continue;
    plan.stock.set(cropId, available - take);
    addToMap(plan.aged, cropId, take);
    agedToday.set(cropId, take);
    free -= take;
  }

  plan.fills.push(plan.vessels - free);
  plan.batches.push(agedToday);
}

function isPlanFull(plan: AgingPlan): boolean {
  return plan.fills.every((fill) => fill === plan.vessels);
}

export class AgingBatcher {
  readonly triggerDays: readonly number[];
  private full: AgingPlan;
  private fallback: AgingPlan;
  private reportedBatches = 0;

  constructor(
    private readonly config: AgingConfig,
    private readonly priority: readonly CropId[],
    triggerOffset: number,
    startingUnaged: Readonly<Record<CropId, number>> = {}
  ) {
    assertCount(config.vessels, 'Aging vessels');
    if (config.fallbackVessels !== null) assertCount(config.fallbackVessels, 'Fallback vessels');

    const stock = new Map<CropId, number>();
    for (const [cropId, quantity] of Object.entries(startingUnaged)) {
      assertCount(quantity, `Starting unaged goods for ${cropId}`);
      stock.set(cropId, quantity);
    }

    this.triggerDays = [FIRST_TRIGGER_DAY, FIRST_TRIGGER_DAY + triggerOffset];
    this.full = createPlan(config.vessels, stock);
    // The fallback is a subset of the configured vessels
    this.fallback = createPlan(Math.min(config.vessels, config.fallbackVessels ?? 0), stock);
  }

  isTriggerDay(day: number): boolean {
    return this.triggerDays.includes(day);
  }

  /**
   * Register fermentation goods completed today
   */
  addGoods(cropId: CropId, quantity: number): void {
    if (quantity <= 0) return;
    addToMap(this.full.stock, cropId, quantity);
    addToMap(this.fallback.stock, cropId, quantity);
  }

  /**
   * Fill vessels on a trigger day.
   * Returns goods aged under the applicable plan on every trigger day not yet
   * reported, or nothing while a later full batch could still change the plan.
   */
  fill(): Map<CropId, number> {
    fillPlan(this.full, this.priority);
    fillPlan(this.fallback, this.priority);
    if (!this.isSettled()) return new Map();

    const plan = this.usesFullPlan() ? this.full : this.fallback;
    const report = new Map<CropId, number>();
    for (const batch of plan.batches.slice(this.reportedBatches)) {
      for (const [cropId, quantity] of batch) addToMap(report, cropId, quantity);
    }
    this.reportedBatches = plan.batches.length;
    return report;
  }

  /**
   * The plan can no longer change: no full-batch rule, a full batch already
   * missed, or the last trigger day has passed
   */
  private isSettled(): boolean {
    return (
      !this.config.fullBatchRequired ||
      !isPlanFull(this.full) ||
      this.full.fills.length >= this.triggerDays.length
    );
  }

  private usesFullPlan(): boolean {
    return !this.config.fullBatchRequired || isPlanFull(this.full);
  }

  /**
   * Unaged goods currently held under the applicable plan
   */
  unaged(cropId: CropId): number {
    const plan = this.usesFullPlan() ? this.full : this.fallback;
    return plan.stock.get(cropId) ?? 0;
  }

  /**
   * Stock and fills of both plans, for state hashing
   */
  snapshot(): unknown {
    const plan = (p: AgingPlan) => ({
      vessels: p.vessels,
      stock: p.stock,
      aged: p.aged,
      fills: p.fills,
    });
    return { full: plan(this.full), fallback: plan(this.fallback), reported: this.reportedBatches };
  }

  resolve(): AgingResolution {
    const plan = this.usesFullPlan() ? this.full : this.fallback;
    const agedTotal = plan.fills.reduce((sum, n) => sum + n, 0);

    return {
      effectiveVessels: plan.vessels,
      fullBatchMet: isPlanFull(this.full),
      usesPerVessel: plan.vessels > 0 ? agedTotal / plan.vessels : 0,
      fills: [...plan.fills],
      agedByCrop: new Map(plan.aged),
    };
  }
}
