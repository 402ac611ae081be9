/**
 * Calendar Resolver
 * Maps absolute day indexes to seasons and plot activity
 */

import type { PlotCalendar, Season } from './types.js';
import { SimulationError } from './errors.js';

export const SEASONS: readonly Season[] = ['spring', 'summer', 'fall', 'winter'];
export const DAYS_PER_SEASON = 28;
export const DAYS_PER_YEAR = SEASONS.length * DAYS_PER_SEASON;

export interface ResolvedDay {
  day: number;
  season: Season;
  /** 1..28 within the season */
  seasonDay: number;
}

/**
 * Fail fast on a day index outside 1..112
 */
export function assertDayInYear(day: number): void {
  if (!Number.isInteger(day) || day < 1 || day > DAYS_PER_YEAR) {
    throw new SimulationError(
      `Day index must be an integer in 1..${DAYS_PER_YEAR} (got ${day})`,
      'DAY_OUT_OF_RANGE'
    );
  }
}

/**
 * Resolve an absolute day of the simulated year.
 * The year always begins on day 1 of startSeason.
 */
export function resolveDay(day: number, startSeason: Season = 'spring'): ResolvedDay {
  assertDayInYear(day);
  const offset = SEASONS.indexOf(startSeason);
  const seasonIndex = Math.floor((day - 1) / DAYS_PER_SEASON);
  return {
    day,
    season: SEASONS[(offset + seasonIndex) % SEASONS.length],
    seasonDay: ((day - 1) % DAYS_PER_SEASON) + 1,
  };
}

/**
 * Whether a plot with this calendar grows on a day in the given season
 */
export function isCalendarActive(calendar: PlotCalendar, season: Season): boolean {
  switch (calendar.type) {
    case 'always':
      return true;
    case 'seasons':
      return calendar.seasons.includes(season);
  }
}

/**
 * Convert a season + day-of-season pair to a day of year (spring 1 = 1)
 */
export function dayOfYearFromSeasonDay(season: Season, seasonDay: number): number {
  if (!Number.isInteger(seasonDay) || seasonDay < 1 || seasonDay > DAYS_PER_SEASON) {
    throw new SimulationError(
      `Season day must be an integer in 1..${DAYS_PER_SEASON} (got ${seasonDay})`,
      'DAY_OUT_OF_RANGE'
    );
  }
  return SEASONS.indexOf(season) * DAYS_PER_SEASON + seasonDay;
}
