/**
 * Plot System
 * Advances each plot's crops one day at a time and reports harvests
 *
 * Days remaining persist across inactive calendar days; only planting and
 * harvest reset them. The planting day counts as the first day of growth.
 */

import type {
  CropId,
  CropLifecycle,
  CropSpec,
  GrowthModifiers,
  PerennialFertilizerCadence,
  Plot,
  PlotCalendar,
  Season,
} from '../core/types.js';
import { SimulationError, assertCount } from '../core/errors.js';
import { isCalendarActive } from '../core/calendar.js';
import { growthDurations } from './growth.js';

// ============================================================================
// Lifecycle Policies
// ============================================================================

export interface LifecycleContext {
  tiles: number;
  firstHarvestDays: number;
  fertilized: boolean;
  calendar: PlotCalendar;
  cadence: PerennialFertilizerCadence;
}

/**
 * State a new growth cycle starts with, and what it costs
 */
export interface CycleStart {
  daysRemaining: number;
  seedUnits: number;
  fertilizerUnits: number;
}

export interface LifecyclePolicy {
  readonly kind: CropLifecycle['kind'];
  plant(ctx: LifecycleContext): CycleStart;
  afterHarvest(ctx: LifecycleContext): CycleStart;
  /** Fertilizer charged on the first active day of a season */
  seasonEntered(ctx: LifecycleContext): number;
}

const replantPolicy: LifecyclePolicy = {
  kind: 'replant',
  plant: (ctx) => ({
    daysRemaining: ctx.firstHarvestDays,
    seedUnits: ctx.tiles,
    fertilizerUnits: ctx.fertilized ? ctx.tiles : 0,
  }),
  afterHarvest: (ctx) => replantPolicy.plant(ctx),
  seasonEntered: () => 0,
};

function perennialPolicy(regrowDays: number): LifecyclePolicy {
  const chargesPerCycle = (ctx: LifecycleContext): boolean =>
    ctx.fertilized && ctx.cadence === 'per-regrowth-cycle';

  return {
    kind: 'perennial',
    plant: (ctx) => ({
      daysRemaining: ctx.firstHarvestDays,
      seedUnits: ctx.tiles,
      fertilizerUnits:
        chargesPerCycle(ctx) || (ctx.fertilized && ctx.calendar.type === 'always') ? ctx.tiles : 0,
    }),
    afterHarvest: (ctx) => ({
      daysRemaining: regrowDays,
      seedUnits: 0,
      fertilizerUnits: chargesPerCycle(ctx) ? ctx.tiles : 0,
    }),
    seasonEntered: (ctx) =>
      ctx.fertilized && ctx.cadence === 'per-calendar-season' && ctx.calendar.type === 'seasons'
        ? ctx.tiles
        : 0,
  };
}

/**
 * Select the strategy object for a crop's lifecycle
 */
export function createLifecyclePolicy(lifecycle: CropLifecycle): LifecyclePolicy {
  switch (lifecycle.kind) {
    case 'replant':
      return replantPolicy;
    case 'perennial':
      return perennialPolicy(lifecycle.regrowDays);
  }
}

// ============================================================================
// Runtime State
// ============================================================================

export interface CropRuntimeState {
  readonly cropId: CropId;
  readonly policy: LifecyclePolicy;
  readonly ctx: LifecycleContext;
  planted: boolean;
  daysRemaining: number;
  seedUnits: number;
  fertilizerUnits: number;
  harvested: number;
  lastActiveSeason: Season | null;
}

export interface PlotRuntime {
  readonly plot: Plot;
  readonly crops: CropRuntimeState[];
}

export interface PlotSetup {
  cropsById: ReadonlyMap<CropId, CropSpec>;
  growth: GrowthModifiers;
  cadence: PerennialFertilizerCadence;
}

/**
 * Build the runtime state for one plot. Crops with zero tiles get no state.
 */
export function createPlotRuntime(plot: Plot, setup: PlotSetup): PlotRuntime {
  const crops: CropRuntimeState[] = [];

  for (const [cropId, tiles] of Object.entries(plot.tilesByCrop)) {
    assertCount(tiles, `Plot ${plot.name} tiles for ${cropId}`);
    const crop = setup.cropsById.get(cropId);
    if (!crop) {
      throw new SimulationError(`Plot ${plot.name} references unknown crop ${cropId}`, 'UNKNOWN_CROP');
    }
    if (tiles === 0) continue;

    crops.push({
      cropId,
      policy: createLifecyclePolicy(crop.lifecycle),
      ctx: {
        tiles,
        firstHarvestDays: growthDurations(crop, setup.growth).firstHarvestDays,
        fertilized: setup.growth.fertilizer !== 'none',
        calendar: plot.calendar,
        cadence: setup.cadence,
      },
      planted: false,
      daysRemaining: 0,
      seedUnits: 0,
      fertilizerUnits: 0,
      harvested: 0,
      lastActiveSeason: null,
    });
  }

  return { plot, crops };
}

function applyCycleStart(state: CropRuntimeState, start: CycleStart): void {
  state.daysRemaining = start.daysRemaining;
  state.seedUnits += start.seedUnits;
  state.fertilizerUnits += start.fertilizerUnits;
}

/**
 * Advance one plot by one day.
 * Returns fruit harvested per crop; empty on inactive days.
 */
export function advancePlot(runtime: PlotRuntime, season: Season): Map<CropId, number> {
  const harvest = new Map<CropId, number>();
  if (!isCalendarActive(runtime.plot.calendar, season)) return harvest;

  for (const state of runtime.crops) {
    if (state.lastActiveSeason !== season) {
      state.fertilizerUnits += state.policy.seasonEntered(state.ctx);
      state.lastActiveSeason = season;
    }

    if (!state.planted) {
      state.planted = true;
      applyCycleStart(state, state.policy.plant(state.ctx));
    }

    state.daysRemaining -= 1;
    if (state.daysRemaining <= 0) {
      const tiles = state.ctx.tiles;
      harvest.set(state.cropId, (harvest.get(state.cropId) ?? 0) + tiles);
      state.harvested += tiles;
      applyCycleStart(state, state.policy.afterHarvest(state.ctx));
    }
  }

  return harvest;
}
