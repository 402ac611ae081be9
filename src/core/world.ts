/**
 * World State Management
 * Crop catalog, default tuning and construction of a simulation context
 */

import type {
  CropId,
  CropSpec,
  ProcessorKind,
  ProcessorSpec,
  Season,
  SimulationConfig,
  SimulationInput,
} from './types.js';
import { SimulationError, assertCount } from './errors.js';
import { DAYS_PER_SEASON } from './calendar.js';
import { createPlotRuntime, type PlotRuntime } from '../systems/plots.js';
import { FruitLedger } from '../systems/ledger.js';
import { ProcessingAllocator } from '../systems/processing.js';
import { AgingBatcher } from '../systems/aging.js';

// ============================================================================
// Defaults
// ============================================================================

/**
 * Fermentation takes one fruit for a week, preserving one fruit for three days,
 * drying five fruit overnight
 */
export const DEFAULT_PROCESSOR_SPECS: Record<ProcessorKind, ProcessorSpec> = {
  fermentation: { durationDays: 7, inputPerCycle: 1 },
  preserving: { durationDays: 3, inputPerCycle: 1 },
  drying: { durationDays: 1, inputPerCycle: 5 },
};

export const DEFAULT_CONFIG: SimulationConfig = {
  agingTriggerOffset: 2 * DAYS_PER_SEASON,
  processorSpecs: DEFAULT_PROCESSOR_SPECS,
  perennialFertilizerCadence: 'per-calendar-season',
};

// ============================================================================
// Crop Catalog
// ============================================================================

export const STARFRUIT: CropSpec = {
  id: 'starfruit',
  name: 'Starfruit',
  phaseDays: [2, 3, 2, 3, 3],
  lifecycle: { kind: 'replant' },
};

export const ANCIENT_FRUIT: CropSpec = {
  id: 'ancient',
  name: 'Ancient Fruit',
  phaseDays: [2, 7, 7, 7, 5],
  lifecycle: { kind: 'perennial', regrowDays: 7 },
};

export const CROP_CATALOG: readonly CropSpec[] = [STARFRUIT, ANCIENT_FRUIT];

/**
 * Replant crops first, then perennials, each in catalog order, then any
 * extra fruit sources in the order given
 */
export function defaultPriority(
  crops: readonly CropSpec[],
  extraIds: Iterable<CropId> = []
): CropId[] {
  const ordered = [
    ...crops.filter((c) => c.lifecycle.kind === 'replant'),
    ...crops.filter((c) => c.lifecycle.kind !== 'replant'),
  ].map((c) => c.id);

  for (const id of extraIds) {
    if (!ordered.includes(id)) ordered.push(id);
  }
  return ordered;
}

// ============================================================================
// Simulation Context
// ============================================================================

/**
 * Everything one simulated year mutates. Each Simulation owns its own.
 */
export interface SimulationState {
  day: number;
  startSeason: Season;
  priority: CropId[];
  startingUnaged: Readonly<Record<CropId, number>>;
  externalDailyFruit: ReadonlyMap<CropId, readonly number[]>;
  plots: PlotRuntime[];
  ledger: FruitLedger;
  allocator: ProcessingAllocator;
  batcher: AgingBatcher;
}

function resolvePriority(input: SimulationInput, knownIds: ReadonlySet<CropId>): CropId[] {
  const fallback = defaultPriority(input.crops, input.externalDailyFruit?.keys() ?? []);
  if (!input.priority) return fallback;

  const priority: CropId[] = [];
  for (const id of input.priority) {
    if (!knownIds.has(id)) {
      throw new SimulationError(`Priority references unknown crop ${id}`, 'UNKNOWN_CROP');
    }
    if (!priority.includes(id)) priority.push(id);
  }
  // Crops missing from an explicit order still get processed, after the listed ones
  for (const id of fallback) {
    if (!priority.includes(id)) priority.push(id);
  }
  return priority;
}

function assertKnown(
  ids: Iterable<CropId>,
  knownIds: ReadonlySet<CropId>,
  label: string
): void {
  for (const id of ids) {
    if (!knownIds.has(id)) {
      throw new SimulationError(`${label} references unknown crop ${id}`, 'UNKNOWN_CROP');
    }
  }
}

/**
 * Build a fresh simulation context at day 0
 */
export function initializeWorld(
  input: SimulationInput,
  config: SimulationConfig = DEFAULT_CONFIG
): SimulationState {
  const externalDailyFruit = input.externalDailyFruit ?? new Map<CropId, readonly number[]>();
  const knownIds = new Set<CropId>([
    ...input.crops.map((c) => c.id),
    ...externalDailyFruit.keys(),
  ]);

  const startingFruit = input.startingInventory?.fruit ?? {};
  const startingUnaged = input.startingInventory?.unagedGoods ?? {};
  assertKnown(Object.keys(startingFruit), knownIds, 'Starting fruit');
  assertKnown(Object.keys(startingUnaged), knownIds, 'Starting unaged goods');

  for (const [id, daily] of externalDailyFruit) {
    daily.forEach((quantity, i) => assertCount(quantity, `External fruit for ${id} on day ${i + 1}`));
  }

  const cropsById = new Map(input.crops.map((c) => [c.id, c] as const));
  const plots = input.plots.map((plot) =>
    createPlotRuntime(plot, {
      cropsById,
      growth: input.growth,
      cadence: config.perennialFertilizerCadence,
    })
  );

  const priority = resolvePriority(input, knownIds);

  return {
    day: 0,
    startSeason: input.startSeason,
    priority,
    startingUnaged,
    externalDailyFruit,
    plots,
    ledger: new FruitLedger(priority, startingFruit),
    allocator: new ProcessingAllocator(input.processors, config.processorSpecs, priority),
    batcher: new AgingBatcher(input.aging, priority, config.agingTriggerOffset, startingUnaged),
  };
}
