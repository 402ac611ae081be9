/**
 * State Serializer
 * Converts farm year reports to JSON-serializable payloads for API clients
 */

import type { FarmYearReport } from '../analysis/farm-year.js';

export type ReportSnapshot = Omit<FarmYearReport, 'bees'> & {
  bees: {
    honeyTotal: number;
    /** Keyed by flower price as a string */
    honeyByFlowerPrice: Record<string, number>;
  };
};

function mapToRecord<K extends string | number>(map: ReadonlyMap<K, number>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const [key, value] of map) {
    record[String(key)] = value;
  }
  return record;
}

export function serializeReport(report: FarmYearReport): ReportSnapshot {
  return {
    ...report,
    bees: {
      honeyTotal: report.bees.honeyTotal,
      honeyByFlowerPrice: mapToRecord(report.bees.honeyByFlowerPrice),
    },
  };
}
