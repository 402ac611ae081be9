/**
 * Core types for the farm year simulation
 * Canonical data structures shared by the calendar, plots, processors and aging
 */

// ============================================================================
// Primitive Types
// ============================================================================

export type CropId = string;
export type PlotName = string;

export type Season = 'spring' | 'summer' | 'fall' | 'winter';

export type Fertilizer = 'none' | 'speed_gro' | 'deluxe_speed_gro' | 'hyper_speed_gro';

// ============================================================================
// Crops
// ============================================================================

/**
 * Lifecycle policy tag. Replant crops restart their full phase sequence after
 * every harvest; perennial crops are planted once and regrow on a fixed cadence.
 */
export type CropLifecycle =
  | { kind: 'replant' }
  | { kind: 'perennial'; regrowDays: number };

export interface CropSpec {
  id: CropId;
  name: string;
  /** Base phase lengths in days, before any speed bonus */
  phaseDays: readonly number[];
  lifecycle: CropLifecycle;
}

/**
 * Modifiers that shorten growth phases
 */
export interface GrowthModifiers {
  fertilizer: Fertilizer;
  agriculturist: boolean;
  paddyBonus: boolean;
}

/**
 * How perennial crops are charged for fertilizer.
 * - per-calendar-season: once at planting on always-active plots, once per active
 *   season on seasonal plots
 * - per-regrowth-cycle: once at planting and again after every harvest
 */
export type PerennialFertilizerCadence = 'per-calendar-season' | 'per-regrowth-cycle';

// ============================================================================
// Plots
// ============================================================================

export type PlotCalendar =
  | { type: 'always' }
  | { type: 'seasons'; seasons: readonly Season[] };

export interface Plot {
  name: PlotName;
  calendar: PlotCalendar;
  tilesByCrop: Readonly<Record<CropId, number>>;
}

// ============================================================================
// Processing
// ============================================================================

export type ProcessorKind = 'fermentation' | 'preserving' | 'drying';

export interface ProcessorSpec {
  /** Days from intake until the good is ready */
  durationDays: number;
  /** Fruit units consumed per cycle */
  inputPerCycle: number;
}

export type ProcessorCounts = Record<ProcessorKind, number>;

export interface AgingConfig {
  vessels: number;
  fullBatchRequired: boolean;
  /** Vessels used when the full batch cannot be met; null means none */
  fallbackVessels: number | null;
}

export interface StartingInventory {
  fruit: Readonly<Record<CropId, number>>;
  unagedGoods: Readonly<Record<CropId, number>>;
}

// ============================================================================
// Simulation Input & Config
// ============================================================================

/**
 * Fully validated input for one simulated year
 */
export interface SimulationInput {
  crops: readonly CropSpec[];
  plots: readonly Plot[];
  growth: GrowthModifiers;
  processors: ProcessorCounts;
  aging: AgingConfig;
  startSeason: Season;
  /** Processing and aging priority; defaults to replant crops first, then catalog order */
  priority?: readonly CropId[];
  startingInventory?: StartingInventory;
  /** Fruit supplied from outside the plots, indexed by day - 1 */
  externalDailyFruit?: ReadonlyMap<CropId, readonly number[]>;
}

/**
 * Simulation tuning constants
 */
export interface SimulationConfig {
  /** Days between the two aging trigger days */
  agingTriggerOffset: number;
  processorSpecs: Record<ProcessorKind, ProcessorSpec>;
  perennialFertilizerCadence: PerennialFertilizerCadence;
}

// ============================================================================
// Results
// ============================================================================

export interface DayMetrics {
  day: number;
  season: Season;
  harvested: Map<CropId, number>;
  consumed: Map<CropId, number>;
  completed: Record<ProcessorKind, Map<CropId, number>>;
  aged: Map<CropId, number>;
  isTriggerDay: boolean;
  /** Hash of the simulation state after the day, for replay checks */
  stateHash: string;
}

export interface CropYearSummary {
  cropId: CropId;
  fruitHarvested: number;
  fruitUnprocessed: number;
  baseGoodsProduced: number;
  agedGoodsProduced: number;
  baseGoodsSold: number;
  preservesProduced: number;
  driedGoodsProduced: number;
  inProcessingEnd: Record<ProcessorKind, number>;
  seedUnitsUsed: number;
  fertilizerUnitsUsed: number;
  fullyProcessed: boolean;
}

export interface AgingSummary {
  effectiveVessels: number;
  fullBatchMet: boolean;
  usesPerVessel: number;
  fills: number[];
}

export interface YearSummary {
  daysSimulated: number;
  priority: CropId[];
  perCrop: Record<CropId, CropYearSummary>;
  aging: AgingSummary;
  allFruitProcessed: boolean;
  totals: {
    fruitHarvested: number;
    fruitUnprocessed: number;
    baseGoodsSold: number;
    agedGoodsProduced: number;
    preservesProduced: number;
    driedGoodsProduced: number;
    inProcessingEnd: Record<ProcessorKind, number>;
  };
}

// ============================================================================
// Side Revenue Streams
// ============================================================================

export type FruitTreeScope = 'greenhouse' | 'outdoors' | 'always';

/**
 * Tree counts per fruit id, per scope. Greenhouse and always trees fruit
 * every day; outdoor trees only in their own season.
 */
export type FruitTreesConfig = Record<FruitTreeScope, Readonly<Record<CropId, number>>>;

export interface FlowerSpec {
  name: string;
  growthDays: number;
  basePrice: number;
}

export interface FlowerPlan {
  fast: FlowerSpec;
  expensive: FlowerSpec;
}

export interface BeeConfig {
  beeHouses: number;
  /** Flower price used when a season has no flower plan */
  flowerBasePrice: number;
  seasons: readonly Season[];
  flowerPlan: Partial<Record<Season, FlowerPlan>>;
}

export interface CoopConfig {
  name: string;
  chickens: number;
  ducks: number;
  rabbits: number;
  voidChickens: number;
}

export interface BarnConfig {
  name: string;
  cows: number;
  goats: number;
  pigs: number;
  sheep: number;
}

export interface AnimalsConfig {
  coops: readonly CoopConfig[];
  barns: readonly BarnConfig[];
  largeEggRate: number;
  largeMilkRate: number;
  largeGoatMilkRate: number;
  rabbitFootRate: number;
}

export interface AnimalMachines {
  oilMakers: number;
  mayoMachines: number;
  cheesePresses: number;
  looms: number;
}

// ============================================================================
// Economy
// ============================================================================

export interface Professions {
  agriculturist: boolean;
  artisan: boolean;
  tiller: boolean;
  shepherd: boolean;
  rancher: boolean;
  gatherer: boolean;
  botanist: boolean;
}

export interface EconomyConfig {
  fruitPrice: Readonly<Record<CropId, number>>;
  /** Falls back to fruit price x 3 when absent */
  fermentedPrice: Readonly<Record<CropId, number>>;
  seedCost: Readonly<Record<CropId, number>>;
  fertilizerCost: Readonly<Partial<Record<Fertilizer, number>>>;
  agedMultiplier: number;
  fermentedQualityMultiplier: number;
  fruitQualityMultiplier: number;
}
