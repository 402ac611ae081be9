/**
 * Fruit Ledger
 * Per-crop inventory of unprocessed fruit and cumulative flows
 */

import type { CropId, ProcessorKind } from '../core/types.js';
import { assertCount } from '../core/errors.js';

export interface CropLedgerEntry {
  startingFruit: number;
  harvested: number;
  unprocessed: number;
  consumed: Record<ProcessorKind, number>;
}

function emptyEntry(startingFruit: number): CropLedgerEntry {
  return {
    startingFruit,
    harvested: 0,
    unprocessed: startingFruit,
    consumed: { fermentation: 0, preserving: 0, drying: 0 },
  };
}

export class FruitLedger {
  private entries = new Map<CropId, CropLedgerEntry>();

  constructor(cropIds: readonly CropId[], startingFruit: Readonly<Record<CropId, number>> = {}) {
    for (const cropId of cropIds) {
      const stock = startingFruit[cropId] ?? 0;
      assertCount(stock, `Starting fruit for ${cropId}`);
      this.entries.set(cropId, emptyEntry(stock));
    }
  }

  private entry(cropId: CropId): CropLedgerEntry {
    let entry = this.entries.get(cropId);
    if (!entry) {
      entry = emptyEntry(0);
      this.entries.set(cropId, entry);
    }
    return entry;
  }

  cropIds(): CropId[] {
    return Array.from(this.entries.keys());
  }

  addHarvest(cropId: CropId, quantity: number): void {
    assertCount(quantity, `Harvest of ${cropId}`);
    const entry = this.entry(cropId);
    entry.harvested += quantity;
    entry.unprocessed += quantity;
  }

  unprocessed(cropId: CropId): number {
    return this.entries.get(cropId)?.unprocessed ?? 0;
  }

  /**
   * Take fruit for one processor cycle. Returns false when stock is short.
   */
  consume(cropId: CropId, kind: ProcessorKind, quantity: number): boolean {
    const entry = this.entries.get(cropId);
    if (!entry || entry.unprocessed < quantity) return false;
    entry.unprocessed -= quantity;
    entry.consumed[kind] += quantity;
    return true;
  }

  get(cropId: CropId): Readonly<CropLedgerEntry> | undefined {
    return this.entries.get(cropId);
  }

  totalConsumed(cropId: CropId): number {
    const entry = this.entries.get(cropId);
    if (!entry) return 0;
    return entry.consumed.fermentation + entry.consumed.preserving + entry.consumed.drying;
  }

  /**
   * starting + harvested = consumed + unprocessed, for every crop
   */
  isBalanced(): boolean {
    for (const [cropId, entry] of this.entries) {
      if (entry.startingFruit + entry.harvested !== this.totalConsumed(cropId) + entry.unprocessed) {
        return false;
      }
    }
    return true;
  }
}
