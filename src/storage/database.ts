/**
 * SQLite Database Storage for Farm Year Runs
 * Persists scenarios and their yearly results for later comparison
 */

import Database from 'better-sqlite3';
import type { CropId } from '../core/types.js';
import type { FarmYearReport } from '../analysis/farm-year.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Per-crop row stored alongside a run
 */
export interface CropResultRecord {
  cropId: CropId;
  fruitHarvested: number;
  fruitUnprocessed: number;
  baseGoodsSold: number;
  agedGoodsProduced: number;
  preservesProduced: number;
  driedGoodsProduced: number;
  seedUnitsUsed: number;
  fertilizerUnitsUsed: number;
  netProfit: number;
}

/**
 * Run information
 */
export interface RunInfo {
  id: number;
  label: string;
  createdAt: Date;
  scenario: unknown;
  totalRevenue: number;
  totalProfit: number;
  allFruitProcessed: boolean;
  usesPerVessel: number;
  quickWins: string[];
}

export interface RunDetails extends RunInfo {
  crops: CropResultRecord[];
}

interface RunRow {
  id: number;
  label: string;
  created_at: string;
  scenario: string;
  total_revenue: number;
  total_profit: number;
  all_fruit_processed: number;
  uses_per_vessel: number;
  quick_wins: string;
}

interface CropResultRow {
  crop_id: string;
  fruit_harvested: number;
  fruit_unprocessed: number;
  base_goods_sold: number;
  aged_goods_produced: number;
  preserves_produced: number;
  dried_goods_produced: number;
  seed_units_used: number;
  fertilizer_units_used: number;
  net_profit: number;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
-- Simulated years
CREATE TABLE IF NOT EXISTS runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  label TEXT NOT NULL DEFAULT '',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  scenario TEXT NOT NULL,
  total_revenue INTEGER NOT NULL,
  total_profit INTEGER NOT NULL,
  all_fruit_processed INTEGER NOT NULL,
  uses_per_vessel REAL NOT NULL,
  quick_wins TEXT NOT NULL DEFAULT '[]'
);

-- Per-crop results of a run
CREATE TABLE IF NOT EXISTS crop_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id INTEGER NOT NULL,
  crop_id TEXT NOT NULL,
  fruit_harvested INTEGER NOT NULL,
  fruit_unprocessed INTEGER NOT NULL,
  base_goods_sold INTEGER NOT NULL,
  aged_goods_produced INTEGER NOT NULL,
  preserves_produced INTEGER NOT NULL,
  dried_goods_produced INTEGER NOT NULL,
  seed_units_used INTEGER NOT NULL,
  fertilizer_units_used INTEGER NOT NULL,
  net_profit INTEGER NOT NULL,
  FOREIGN KEY (run_id) REFERENCES runs(id),
  UNIQUE(run_id, crop_id)
);

CREATE INDEX IF NOT EXISTS idx_crop_results_run ON crop_results(run_id);
`;

function parseQuickWins(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === 'string') : [];
}

function toRunInfo(row: RunRow): RunInfo {
  return {
    id: row.id,
    label: row.label,
    createdAt: new Date(`${row.created_at.replace(' ', 'T')}Z`),
    scenario: JSON.parse(row.scenario),
    totalRevenue: row.total_revenue,
    totalProfit: row.total_profit,
    allFruitProcessed: row.all_fruit_processed === 1,
    usesPerVessel: row.uses_per_vessel,
    quickWins: parseQuickWins(row.quick_wins),
  };
}

function toCropResult(row: CropResultRow): CropResultRecord {
  return {
    cropId: row.crop_id,
    fruitHarvested: row.fruit_harvested,
    fruitUnprocessed: row.fruit_unprocessed,
    baseGoodsSold: row.base_goods_sold,
    agedGoodsProduced: row.aged_goods_produced,
    preservesProduced: row.preserves_produced,
    driedGoodsProduced: row.dried_goods_produced,
    seedUnitsUsed: row.seed_units_used,
    fertilizerUnitsUsed: row.fertilizer_units_used,
    netProfit: row.net_profit,
  };
}

// ============================================================================
// SimulationDatabase Class
// ============================================================================

/**
 * SQLite database for run storage
 * All methods are synchronous for simplicity with better-sqlite3
 */
export class SimulationDatabase {
  private db: Database.Database;

  // Prepared statements for performance
  private stmtInsertRun: Database.Statement<[string, string, number, number, number, number, string]>;
  private stmtInsertCrop: Database.Statement<
    [number, string, number, number, number, number, number, number, number, number, number]
  >;
  private stmtGetRun: Database.Statement<[number], RunRow>;
  private stmtGetCrops: Database.Statement<[number], CropResultRow>;

  /**
   * Create a new SimulationDatabase
   * @param dbPath Path to SQLite database file (use ':memory:' for in-memory)
   */
  constructor(dbPath: string = 'farm-year.db') {
    this.db = new Database(dbPath);

    // Enable WAL mode for better concurrent performance
    this.db.pragma('journal_mode = WAL');

    this.db.exec(SCHEMA);

    this.stmtInsertRun = this.db.prepare<[string, string, number, number, number, number, string]>(`
      INSERT INTO runs (label, scenario, total_revenue, total_profit, all_fruit_processed, uses_per_vessel, quick_wins)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtInsertCrop = this.db.prepare<
      [number, string, number, number, number, number, number, number, number, number, number]
    >(`
      INSERT INTO crop_results
      (run_id, crop_id, fruit_harvested, fruit_unprocessed, base_goods_sold, aged_goods_produced,
       preserves_produced, dried_goods_produced, seed_units_used, fertilizer_units_used, net_profit)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.stmtGetRun = this.db.prepare<[number], RunRow>(`
      SELECT id, label, created_at, scenario, total_revenue, total_profit, all_fruit_processed,
             uses_per_vessel, quick_wins
      FROM runs WHERE id = ?
    `);
    this.stmtGetCrops = this.db.prepare<[number], CropResultRow>(`
      SELECT crop_id, fruit_harvested, fruit_unprocessed, base_goods_sold, aged_goods_produced,
             preserves_produced, dried_goods_produced, seed_units_used, fertilizer_units_used, net_profit
      FROM crop_results WHERE run_id = ? ORDER BY id
    `);
  }

  // ============================================================================
  // Run Management
  // ============================================================================

  /**
   * Store a finished year and its per-crop rows in one transaction
   * @returns Run ID
   */
  recordRun(scenario: unknown, report: FarmYearReport, label: string = ''): number {
    const insert = this.db.transaction((): number => {
      const result = this.stmtInsertRun.run(
        label,
        JSON.stringify(scenario),
        report.totals.revenue,
        report.totals.profit,
        report.summary.allFruitProcessed ? 1 : 0,
        report.summary.aging.usesPerVessel,
        JSON.stringify(report.quickWins)
      );
      const runId = Number(result.lastInsertRowid);

      for (const cropId of report.summary.priority) {
        const crop = report.summary.perCrop[cropId];
        const profit = report.crops.perCrop[cropId];
        if (!crop || !profit) continue;
        this.stmtInsertCrop.run(
          runId,
          cropId,
          crop.fruitHarvested,
          crop.fruitUnprocessed,
          crop.baseGoodsSold,
          crop.agedGoodsProduced,
          crop.preservesProduced,
          crop.driedGoodsProduced,
          crop.seedUnitsUsed,
          crop.fertilizerUnitsUsed,
          profit.netProfit
        );
      }
      return runId;
    });

    return insert();
  }

  /**
   * Get a run with its per-crop rows
   */
  getRun(runId: number): RunDetails | null {
    const row = this.stmtGetRun.get(runId);
    if (!row) return null;

    return {
      ...toRunInfo(row),
      crops: this.stmtGetCrops.all(runId).map(toCropResult),
    };
  }

  /**
   * Most recent runs first
   */
  listRuns(limit: number = 50): RunInfo[] {
    const stmt = this.db.prepare<[number], RunRow>(`
      SELECT id, label, created_at, scenario, total_revenue, total_profit, all_fruit_processed,
             uses_per_vessel, quick_wins
      FROM runs ORDER BY id DESC LIMIT ?
    `);
    return stmt.all(limit).map(toRunInfo);
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  /**
   * Get database statistics
   */
  getStats(): {
    totalRuns: number;
    totalCropResults: number;
    bestProfit: number | null;
    dbSizeBytes: number;
  } {
    const runs = this.db
      .prepare<[], { count: number; best: number | null }>(
        'SELECT COUNT(*) as count, MAX(total_profit) as best FROM runs'
      )
      .get();
    const crops = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) as count FROM crop_results')
      .get();
    const pageCount = this.db.pragma('page_count', { simple: true });
    const pageSize = this.db.pragma('page_size', { simple: true });

    return {
      totalRuns: runs?.count ?? 0,
      totalCropResults: crops?.count ?? 0,
      bestProfit: runs?.best ?? null,
      dbSizeBytes:
        (typeof pageCount === 'number' ? pageCount : 0) *
        (typeof pageSize === 'number' ? pageSize : 4096),
    };
  }
}

/**
 * Create a simulation database instance
 * Returns null if database creation fails (allows simulation to run without DB)
 */
export function createDatabase(dbPath: string = 'farm-year.db'): SimulationDatabase | null {
  try {
    return new SimulationDatabase(dbPath);
  } catch (error) {
    console.warn('[Database] Failed to create database:', error);
    return null;
  }
}
