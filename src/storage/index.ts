/**
 * Storage Module
 * SQLite database storage for farm year runs
 */

export { SimulationDatabase, createDatabase } from './database.js';
export type { CropResultRecord, RunInfo, RunDetails } from './database.js';
