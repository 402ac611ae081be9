/**
 * Growth System
 * Converts base phase lengths into speed-adjusted day counts
 *
 * daysToRemove = ceil(totalDays * speedIncrease), then up to three passes over the
 * phases remove one day from each eligible phase. The first phase never drops below 1.
 */

import type { CropId, CropSpec, Fertilizer, GrowthModifiers } from '../core/types.js';
import { SimulationError } from '../core/errors.js';

const FERTILIZER_SPEED: Record<Fertilizer, number> = {
  none: 0,
  speed_gro: 0.1,
  deluxe_speed_gro: 0.25,
  hyper_speed_gro: 0.33,
};

export const PADDY_SPEED = 0.25;
export const AGRICULTURIST_SPEED = 0.1;
const MAX_REDUCTION_PASSES = 3;

export const NO_GROWTH_MODIFIERS: GrowthModifiers = {
  fertilizer: 'none',
  agriculturist: false,
  paddyBonus: false,
};

/**
 * Phase tables that do not follow the reduction rule
 */
interface PhaseOverride {
  cropId: CropId;
  basePhases: readonly number[];
  fertilizer: Fertilizer;
  agriculturist: boolean;
  paddyBonus: boolean;
  phases: readonly number[];
}

const PHASE_OVERRIDES: readonly PhaseOverride[] = [
  {
    cropId: 'ancient',
    basePhases: [2, 7, 7, 7, 5],
    fertilizer: 'speed_gro',
    agriculturist: true,
    paddyBonus: false,
    phases: [1, 5, 6, 7, 3],
  },
];

export interface GrowthDurations {
  firstHarvestDays: number;
  /** Fixed regrowth cadence; never shortened by speed bonuses */
  regrowDays: number | null;
}

/**
 * Total speed increase from fertilizer, paddy watering and profession
 */
export function speedIncrease(mods: GrowthModifiers): number {
  let speed = FERTILIZER_SPEED[mods.fertilizer];
  if (mods.paddyBonus) speed += PADDY_SPEED;
  if (mods.agriculturist) speed += AGRICULTURIST_SPEED;
  return speed;
}

/**
 * Apply a speed bonus to a phase sequence
 */
export function applySpeedIncrease(phaseDays: readonly number[], speed: number): number[] {
  const phases = [...phaseDays];
  const total = phases.reduce((sum, d) => sum + d, 0);
  if (speed <= 0 || total <= 0) return phases;

  let daysToRemove = Math.ceil(total * speed);
  for (let pass = 0; pass < MAX_REDUCTION_PASSES && daysToRemove > 0; pass++) {
    for (let i = 0; i < phases.length && daysToRemove > 0; i++) {
      if (i > 0 || phases[i] > 1) {
        phases[i] -= 1;
        daysToRemove -= 1;
      }
    }
  }
  return phases;
}

function findOverride(crop: CropSpec, mods: GrowthModifiers): PhaseOverride | undefined {
  return PHASE_OVERRIDES.find(
    (o) =>
      o.cropId === crop.id &&
      o.fertilizer === mods.fertilizer &&
      o.agriculturist === mods.agriculturist &&
      o.paddyBonus === mods.paddyBonus &&
      o.basePhases.length === crop.phaseDays.length &&
      o.basePhases.every((d, i) => d === crop.phaseDays[i])
  );
}

/**
 * Adjusted phase sequence for a crop, honouring known overrides
 */
export function phaseDaysFor(crop: CropSpec, mods: GrowthModifiers): number[] {
  const override = findOverride(crop, mods);
  if (override) return [...override.phases];
  return applySpeedIncrease(crop.phaseDays, speedIncrease(mods));
}

export function daysToFirstHarvest(crop: CropSpec, mods: GrowthModifiers): number {
  return phaseDaysFor(crop, mods).reduce((sum, d) => sum + d, 0);
}

/**
 * Durations the plot simulator needs for one crop
 */
export function growthDurations(crop: CropSpec, mods: GrowthModifiers): GrowthDurations {
  if (crop.phaseDays.length === 0 || crop.phaseDays.some((d) => !Number.isInteger(d) || d < 0)) {
    throw new SimulationError(`Crop ${crop.id} has invalid phase days`, 'INVALID_DURATION');
  }
  const regrowDays = crop.lifecycle.kind === 'perennial' ? crop.lifecycle.regrowDays : null;
  if (regrowDays !== null && (!Number.isInteger(regrowDays) || regrowDays < 1)) {
    throw new SimulationError(`Crop ${crop.id} has invalid regrow days`, 'INVALID_DURATION');
  }
  return {
    firstHarvestDays: Math.max(1, daysToFirstHarvest(crop, mods)),
    regrowDays,
  };
}
