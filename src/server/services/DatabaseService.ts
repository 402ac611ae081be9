/**
 * Database Service
 * Handles database initialization and run recording
 */

import { createDatabase } from '../../storage/index.js';
import type { FarmYearReport } from '../../analysis/farm-year.js';
import { state, config } from '../state.js';

/**
 * Initialize the database if enabled
 */
export function initializeDatabase(): void {
  if (!config.DB_ENABLED) return;

  if (!state.database) {
    state.database = createDatabase(config.DB_PATH);
    if (state.database) {
      console.log(`[DatabaseService] Initialized at ${config.DB_PATH}`);
    }
  }
}

/**
 * Record a finished year; returns null when storage is off
 */
export function recordRun(scenario: unknown, report: FarmYearReport, label?: string): number | null {
  if (!state.database) return null;

  const runId = state.database.recordRun(scenario, report, label);
  console.log(`[DatabaseService] Recorded run ${runId}`);
  return runId;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (!state.database) return;

  state.database.close();
  state.database = null;
  console.log('[DatabaseService] Closed');
}
