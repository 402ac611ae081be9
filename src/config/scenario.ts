/**
 * Scenario Configuration
 * Parses a scenario JSON document into validated, fully typed settings and
 * builds the simulation input from them
 */

import { readFileSync } from 'fs';
import type {
  AgingConfig,
  AnimalMachines,
  AnimalsConfig,
  BarnConfig,
  BeeConfig,
  CoopConfig,
  CropId,
  CropSpec,
  EconomyConfig,
  Fertilizer,
  FlowerPlan,
  FlowerSpec,
  FruitTreesConfig,
  PerennialFertilizerCadence,
  Plot,
  PlotCalendar,
  ProcessorCounts,
  Professions,
  Season,
  SimulationConfig,
  SimulationInput,
  StartingInventory,
} from '../core/types.js';
import { SEASONS } from '../core/calendar.js';
import { ANCIENT_FRUIT, STARFRUIT } from '../core/world.js';
import { BUILDING_CAPACITY } from '../systems/animals.js';
import { buildDailyFruit, normalizeFruitTreeName, totalTreeCounts } from '../systems/fruit-trees.js';
import { DEFAULT_ECONOMY, sortByFermentedPrice } from '../systems/economy.js';
import {
  ConfigValidationError,
  checkChoice,
  checkCount,
  isRawObject,
  joinPath,
  normalizeName,
  readArray,
  readBoolean,
  readChoice,
  readCount,
  readCountMap,
  readNumber,
  readObject,
  readString,
  type RawObject,
} from './validation.js';
import { applyOverrides, loadOverrides } from './overrides.js';

// ============================================================================
// Types
// ============================================================================

export type CropSelection = 'starfruit' | 'ancient' | 'both';

export interface Scenario {
  crop: CropSelection;
  plots: Plot[];
  processors: ProcessorCounts;
  aging: AgingConfig;
  growth: { fertilizer: Fertilizer; paddyBonus: boolean };
  professions: Professions;
  simulation: { startSeason: Season; perennialFertilizerCadence: PerennialFertilizerCadence };
  priority: CropId[] | null;
  startingInventory: StartingInventory;
  economy: EconomyConfig;
  fruitTrees: FruitTreesConfig;
  bees: BeeConfig;
  animals: AnimalsConfig;
  animalMachines: AnimalMachines;
}

// ============================================================================
// Name Tables
// ============================================================================

const CROP_ALIASES: Readonly<Record<string, CropSelection>> = {
  starfruit: 'starfruit',
  star: 'starfruit',
  ancient: 'ancient',
  ancientfruit: 'ancient',
  both: 'both',
  all: 'both',
};

const FERTILIZER_ALIASES: Readonly<Record<string, Fertilizer>> = {
  none: 'none',
  no: 'none',
  speedgro: 'speed_gro',
  deluxespeedgro: 'deluxe_speed_gro',
  deluxesg: 'deluxe_speed_gro',
  hyperspeedgro: 'hyper_speed_gro',
  hypersg: 'hyper_speed_gro',
};

const SEASON_ALIASES: Readonly<Record<string, Season>> = {
  spring: 'spring',
  summer: 'summer',
  fall: 'fall',
  autumn: 'fall',
  winter: 'winter',
};

const CADENCE_ALIASES: Readonly<Record<string, PerennialFertilizerCadence>> = {
  percalendarseason: 'per-calendar-season',
  perseason: 'per-calendar-season',
  perregrowthcycle: 'per-regrowth-cycle',
  percycle: 'per-regrowth-cycle',
};

const CALENDAR_TYPES: Readonly<Record<string, PlotCalendar['type']>> = {
  always: 'always',
  seasons: 'seasons',
};

/**
 * Seasons a crop grows in outside an always-active plot
 */
const CROP_SEASONS: Readonly<Record<CropId, readonly Season[]>> = {
  starfruit: ['summer'],
  ancient: ['spring', 'summer', 'fall'],
};

const DEFAULT_BEE_SEASONS: readonly Season[] = ['spring', 'summer', 'fall'];

const CATALOG_BY_SELECTION: Readonly<Record<CropSelection, readonly CropSpec[]>> = {
  starfruit: [STARFRUIT],
  ancient: [ANCIENT_FRUIT],
  both: [STARFRUIT, ANCIENT_FRUIT],
};

function cropIdsFor(name: string): readonly CropId[] | null {
  const crop = CROP_ALIASES[normalizeName(name)];
  if (crop === undefined) return null;
  return crop === 'both' ? ['starfruit', 'ancient'] : [crop];
}

/**
 * Crop names, 'both', or fruit tree names
 */
function productIdsFor(name: string): readonly CropId[] | null {
  const tree = normalizeFruitTreeName(name);
  return tree ? [tree] : cropIdsFor(name);
}

function fruitTreeIdsFor(name: string): readonly CropId[] | null {
  const tree = normalizeFruitTreeName(name);
  return tree ? [tree] : null;
}

function fertilizerIdsFor(name: string): readonly Fertilizer[] | null {
  const fertilizer = FERTILIZER_ALIASES[normalizeName(name)];
  return fertilizer === undefined ? null : [fertilizer];
}

function checkSeasons(value: unknown, path: string): Season[] {
  const items = Array.isArray(value) ? value : [value];
  return items.map((item, i) => checkChoice(item, joinPath(path, i), SEASON_ALIASES));
}

// ============================================================================
// Section Parsers
// ============================================================================

function parsePlot(raw: unknown, index: number, crop: CropSelection): Plot {
  const path = joinPath('plots', index);
  if (!isRawObject(raw)) throw new ConfigValidationError('must be an object', path);

  const name = readString(raw, 'name', path, `plot-${index + 1}`);
  const calendarRaw = readObject(raw, 'calendar', path);
  const calendarPath = joinPath(path, 'calendar');
  const type = readChoice(calendarRaw, 'type', calendarPath, 'always', CALENDAR_TYPES);

  let calendar: PlotCalendar = { type: 'always' };
  if (type === 'seasons') {
    const seasons = checkSeasons(calendarRaw.seasons ?? [], joinPath(calendarPath, 'seasons'));
    if (seasons.length === 0) {
      throw new ConfigValidationError('seasons calendar needs at least one season', calendarPath);
    }
    calendar = { type: 'seasons', seasons };
  }

  const selected = CATALOG_BY_SELECTION[crop].map((c) => c.id);
  const tilesPath = joinPath(path, 'tiles');
  let tilesByCrop: Record<CropId, number>;

  if (typeof raw.tiles === 'number') {
    const tiles = checkCount(raw.tiles, tilesPath);
    tilesByCrop = Object.fromEntries(selected.map((id) => [id, tiles]));
  } else if (isRawObject(raw.tiles)) {
    tilesByCrop = {};
    for (const [key, value] of Object.entries(raw.tiles)) {
      const ids = cropIdsFor(key);
      if (!ids || ids.length !== 1) {
        throw new ConfigValidationError(`'${key}' is not a single crop`, tilesPath);
      }
      const tiles = checkCount(value, joinPath(tilesPath, key));
      if (tiles > 0 && !selected.includes(ids[0])) {
        throw new ConfigValidationError(`defines tiles for ${ids[0]}, but crop selection is '${crop}'`, tilesPath);
      }
      tilesByCrop[ids[0]] = tiles;
    }
  } else {
    throw new ConfigValidationError('must be a number or a per-crop object', tilesPath);
  }

  if (calendar.type === 'seasons') {
    for (const [cropId, tiles] of Object.entries(tilesByCrop)) {
      const allowed = CROP_SEASONS[cropId] ?? SEASONS;
      const invalid = calendar.seasons.filter((s) => !allowed.includes(s));
      if (tiles > 0 && invalid.length > 0) {
        throw new ConfigValidationError(`${cropId} does not grow in ${invalid.join(', ')}`, calendarPath);
      }
    }
  }

  return { name, calendar, tilesByCrop };
}

function parsePlots(raw: RawObject, crop: CropSelection): Plot[] {
  const plots = readArray(raw, 'plots', '').map((p, i) => parsePlot(p, i, crop));
  if (plots.length > 0) return plots;

  if (raw.tiles === undefined) {
    throw new ConfigValidationError('either plots or tiles is required', 'plots');
  }
  const tiles = checkCount(raw.tiles, 'tiles');
  return [
    {
      name: 'plot',
      calendar: { type: 'always' },
      tilesByCrop: Object.fromEntries(CATALOG_BY_SELECTION[crop].map((c) => [c.id, tiles])),
    },
  ];
}

function parseAging(raw: RawObject): AgingConfig {
  const section = readObject(raw, 'aging', '');
  const vessels = readCount(section, 'vessels', 'aging');
  const fallbackRaw = section.fallbackVessels;
  const fallbackVessels =
    fallbackRaw === undefined || fallbackRaw === null
      ? null
      : checkCount(fallbackRaw, 'aging.fallbackVessels');
  if (fallbackVessels !== null && fallbackVessels > vessels) {
    throw new ConfigValidationError('cannot exceed aging.vessels', 'aging.fallbackVessels');
  }
  return {
    vessels,
    fullBatchRequired: readBoolean(section, 'fullBatchRequired', 'aging', false),
    fallbackVessels,
  };
}

function parseProfessions(raw: RawObject): Professions {
  const section = readObject(raw, 'professions', '');
  const flag = (key: keyof Professions): boolean => readBoolean(section, key, 'professions', false);
  return {
    agriculturist: flag('agriculturist'),
    artisan: flag('artisan'),
    tiller: flag('tiller'),
    shepherd: flag('shepherd'),
    rancher: flag('rancher'),
    gatherer: flag('gatherer'),
    botanist: flag('botanist'),
  };
}

function parseEconomy(raw: RawObject): EconomyConfig {
  const section = readObject(raw, 'economy', '');
  const multiplier = (key: string, fallback: number): number =>
    readNumber(section, key, 'economy', fallback, { min: 0, exclusiveMin: true });

  return {
    fruitPrice: { ...DEFAULT_ECONOMY.fruitPrice, ...readCountMap(section, 'fruitPrice', 'economy', productIdsFor) },
    fermentedPrice: {
      ...DEFAULT_ECONOMY.fermentedPrice,
      ...readCountMap(section, 'fermentedPrice', 'economy', productIdsFor),
    },
    seedCost: { ...DEFAULT_ECONOMY.seedCost, ...readCountMap(section, 'seedCost', 'economy', productIdsFor) },
    fertilizerCost: {
      ...DEFAULT_ECONOMY.fertilizerCost,
      ...readCountMap(section, 'fertilizerCost', 'economy', fertilizerIdsFor),
    },
    agedMultiplier: multiplier('agedMultiplier', DEFAULT_ECONOMY.agedMultiplier),
    fermentedQualityMultiplier: multiplier(
      'fermentedQualityMultiplier',
      DEFAULT_ECONOMY.fermentedQualityMultiplier
    ),
    fruitQualityMultiplier: multiplier('fruitQualityMultiplier', DEFAULT_ECONOMY.fruitQualityMultiplier),
  };
}

function parseFlowerSpec(raw: RawObject, key: 'fast' | 'expensive', path: string): FlowerSpec {
  const section = readObject(raw, key, path);
  const specPath = joinPath(path, key);
  return {
    name: readString(section, 'name', specPath, key),
    growthDays: readCount(section, 'growthDays', specPath),
    basePrice: readCount(section, 'basePrice', specPath),
  };
}

function parseBees(raw: RawObject): BeeConfig {
  const section = readObject(raw, 'bees', '');
  const planRaw = readObject(section, 'flowerPlan', 'bees');

  const flowerPlan: Partial<Record<Season, FlowerPlan>> = {};
  for (const [key, value] of Object.entries(planRaw)) {
    const path = joinPath('bees.flowerPlan', key);
    const season = checkChoice(key, path, SEASON_ALIASES);
    if (!isRawObject(value)) throw new ConfigValidationError('must be an object', path);
    flowerPlan[season] = {
      fast: parseFlowerSpec(value, 'fast', path),
      expensive: parseFlowerSpec(value, 'expensive', path),
    };
  }

  const planSeasons = SEASONS.filter((s) => flowerPlan[s] !== undefined);
  const seasons =
    section.seasons === undefined
      ? planSeasons.length > 0
        ? planSeasons
        : DEFAULT_BEE_SEASONS
      : checkSeasons(section.seasons, 'bees.seasons');

  const beeHouses = readCount(section, 'beeHouses', 'bees');
  if (beeHouses > 0 && seasons.length === 0) {
    throw new ConfigValidationError('needs at least one season when bee houses are set', 'bees.seasons');
  }
  for (const season of planSeasons) {
    if (!seasons.includes(season)) {
      throw new ConfigValidationError(`season '${season}' is not in bees.seasons`, 'bees.flowerPlan');
    }
  }

  return {
    beeHouses,
    flowerBasePrice: readCount(section, 'flowerBasePrice', 'bees'),
    seasons,
    flowerPlan,
  };
}

function parseCoop(raw: unknown, index: number): CoopConfig {
  const path = joinPath('animals.coops', index);
  if (!isRawObject(raw)) throw new ConfigValidationError('must be an object', path);
  const coop: CoopConfig = {
    name: readString(raw, 'name', path, `coop-${index + 1}`),
    chickens: readCount(raw, 'chickens', path),
    ducks: readCount(raw, 'ducks', path),
    rabbits: readCount(raw, 'rabbits', path),
    voidChickens: readCount(raw, 'voidChickens', path),
  };
  const total = coop.chickens + coop.ducks + coop.rabbits + coop.voidChickens;
  if (total > BUILDING_CAPACITY) {
    throw new ConfigValidationError(`has ${total} animals, capacity is ${BUILDING_CAPACITY}`, path);
  }
  return coop;
}

function parseBarn(raw: unknown, index: number): BarnConfig {
  const path = joinPath('animals.barns', index);
  if (!isRawObject(raw)) throw new ConfigValidationError('must be an object', path);
  const barn: BarnConfig = {
    name: readString(raw, 'name', path, `barn-${index + 1}`),
    cows: readCount(raw, 'cows', path),
    goats: readCount(raw, 'goats', path),
    pigs: readCount(raw, 'pigs', path),
    sheep: readCount(raw, 'sheep', path),
  };
  const total = barn.cows + barn.goats + barn.pigs + barn.sheep;
  if (total > BUILDING_CAPACITY) {
    throw new ConfigValidationError(`has ${total} animals, capacity is ${BUILDING_CAPACITY}`, path);
  }
  return barn;
}

function parseAnimals(raw: RawObject): { animals: AnimalsConfig; machines: AnimalMachines } {
  const section = readObject(raw, 'animals', '');
  const rate = (key: string): number => readNumber(section, key, 'animals', 0, { min: 0, max: 1 });
  const machines = readObject(section, 'machines', 'animals');

  return {
    animals: {
      coops: readArray(section, 'coops', 'animals').map(parseCoop),
      barns: readArray(section, 'barns', 'animals').map(parseBarn),
      largeEggRate: rate('largeEggRate'),
      largeMilkRate: rate('largeMilkRate'),
      largeGoatMilkRate: rate('largeGoatMilkRate'),
      rabbitFootRate: rate('rabbitFootRate'),
    },
    machines: {
      oilMakers: readCount(machines, 'oilMakers', 'animals.machines'),
      mayoMachines: readCount(machines, 'mayoMachines', 'animals.machines'),
      cheesePresses: readCount(machines, 'cheesePresses', 'animals.machines'),
      looms: readCount(machines, 'looms', 'animals.machines'),
    },
  };
}

/**
 * Every product id the simulation will know about: selected crops plus
 * fruit from trees that exist
 */
function knownProductIds(crop: CropSelection, fruitTrees: FruitTreesConfig): Set<CropId> {
  return new Set([...CATALOG_BY_SELECTION[crop].map((c) => c.id), ...totalTreeCounts(fruitTrees).keys()]);
}

function checkKnownProducts(ids: Iterable<CropId>, known: ReadonlySet<CropId>, path: string): void {
  for (const id of ids) {
    if (!known.has(id)) {
      throw new ConfigValidationError(`'${id}' is neither a selected crop nor a planted fruit tree`, path);
    }
  }
}

// ============================================================================
// Entry Points
// ============================================================================

/**
 * Validate a decoded scenario document
 */
export function parseScenario(raw: unknown): Scenario {
  if (!isRawObject(raw)) throw new ConfigValidationError('scenario must be an object', '$');

  const crop = readChoice(raw, 'crop', '', 'both', CROP_ALIASES);
  const processorsRaw = readObject(raw, 'processors', '');
  const growthRaw = readObject(raw, 'growth', '');
  const simulationRaw = readObject(raw, 'simulation', '');
  const inventoryRaw = readObject(raw, 'startingInventory', '');
  const treesRaw = readObject(raw, 'fruitTrees', '');

  const fruitTrees: FruitTreesConfig = {
    greenhouse: readCountMap(treesRaw, 'greenhouse', 'fruitTrees', fruitTreeIdsFor),
    outdoors: readCountMap(treesRaw, 'outdoors', 'fruitTrees', fruitTreeIdsFor),
    always: readCountMap(treesRaw, 'always', 'fruitTrees', fruitTreeIdsFor),
  };
  const known = knownProductIds(crop, fruitTrees);

  const startingInventory: StartingInventory = {
    fruit: readCountMap(inventoryRaw, 'fruit', 'startingInventory', productIdsFor),
    unagedGoods: readCountMap(inventoryRaw, 'unagedGoods', 'startingInventory', productIdsFor),
  };
  checkKnownProducts(Object.keys(startingInventory.fruit), known, 'startingInventory.fruit');
  checkKnownProducts(Object.keys(startingInventory.unagedGoods), known, 'startingInventory.unagedGoods');

  let priority: CropId[] | null = null;
  if (raw.priority !== undefined && raw.priority !== null) {
    priority = readArray(raw, 'priority', '').map((item, i) => {
      const path = joinPath('priority', i);
      const ids = typeof item === 'string' ? productIdsFor(item) : null;
      if (!ids || ids.length !== 1) throw new ConfigValidationError('must name one crop or fruit', path);
      return ids[0];
    });
    checkKnownProducts(priority, known, 'priority');
  }

  const { animals, machines } = parseAnimals(raw);

  return {
    crop,
    plots: parsePlots(raw, crop),
    processors: {
      fermentation: readCount(processorsRaw, 'fermentation', 'processors'),
      preserving: readCount(processorsRaw, 'preserving', 'processors'),
      drying: readCount(processorsRaw, 'drying', 'processors'),
    },
    aging: parseAging(raw),
    growth: {
      fertilizer: readChoice(growthRaw, 'fertilizer', 'growth', 'none', FERTILIZER_ALIASES),
      paddyBonus: readBoolean(growthRaw, 'paddyBonus', 'growth', false),
    },
    professions: parseProfessions(raw),
    simulation: {
      startSeason: readChoice(simulationRaw, 'startSeason', 'simulation', 'spring', SEASON_ALIASES),
      perennialFertilizerCadence: readChoice(
        simulationRaw,
        'perennialFertilizerCadence',
        'simulation',
        'per-calendar-season',
        CADENCE_ALIASES
      ),
    },
    priority,
    startingInventory,
    economy: parseEconomy(raw),
    fruitTrees,
    bees: parseBees(raw),
    animals,
    animalMachines: machines,
  };
}

/**
 * Read a scenario file, apply an optional overrides file, then validate
 */
export function loadScenarioFile(path: string, overridesPath?: string): Scenario {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(`cannot read scenario file: ${reason}`, path);
  }

  if (overridesPath && isRawObject(raw)) {
    const applied = applyOverrides(raw, loadOverrides(overridesPath));
    console.log(`[Config] Applied ${applied} override(s) from ${overridesPath}`);
  }

  return parseScenario(raw);
}

/**
 * Core simulation input for a validated scenario. Fruit-tree fruit is
 * offered to processors by descending fermented price.
 */
export function toSimulationInput(scenario: Scenario): {
  input: SimulationInput;
  config: Partial<SimulationConfig>;
} {
  const daily = buildDailyFruit(scenario.fruitTrees, scenario.simulation.startSeason);
  const externalDailyFruit = new Map<CropId, readonly number[]>();
  for (const fruitId of sortByFermentedPrice(daily.keys(), scenario.economy)) {
    const series = daily.get(fruitId);
    if (series) externalDailyFruit.set(fruitId, series);
  }

  return {
    input: {
      crops: CATALOG_BY_SELECTION[scenario.crop],
      plots: scenario.plots,
      growth: {
        fertilizer: scenario.growth.fertilizer,
        agriculturist: scenario.professions.agriculturist,
        paddyBonus: scenario.growth.paddyBonus,
      },
      processors: scenario.processors,
      aging: scenario.aging,
      startSeason: scenario.simulation.startSeason,
      priority: scenario.priority ?? undefined,
      startingInventory: scenario.startingInventory,
      externalDailyFruit,
    },
    config: { perennialFertilizerCadence: scenario.simulation.perennialFertilizerCadence },
  };
}
