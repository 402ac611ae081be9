/**
 * Processing System
 * Finite-capacity timed processors fed from the fruit ledger in priority order
 */

import type {
  CropId,
  ProcessorCounts,
  ProcessorKind,
  ProcessorSpec,
} from '../core/types.js';
import { SimulationError, assertCount } from '../core/errors.js';
import type { FruitLedger } from './ledger.js';

export const PROCESSOR_ORDER: readonly ProcessorKind[] = ['fermentation', 'preserving', 'drying'];

interface BusyUnit {
  cropId: CropId;
  daysRemaining: number;
}

/**
 * A pool of identical units; each holds one cycle for a fixed number of days
 */
export class TimedProcessorPool {
  private busy: BusyUnit[] = [];
  private completedByCrop = new Map<CropId, number>();

  constructor(
    public readonly kind: ProcessorKind,
    public readonly units: number,
    public readonly spec: ProcessorSpec
  ) {
    assertCount(units, `${kind} units`);
    if (!Number.isInteger(spec.durationDays) || spec.durationDays < 1) {
      throw new SimulationError(`${kind} duration must be at least 1 day`, 'INVALID_DURATION');
    }
    if (!Number.isInteger(spec.inputPerCycle) || spec.inputPerCycle < 1) {
      throw new SimulationError(`${kind} input per cycle must be at least 1`, 'INVALID_DURATION');
    }
  }

  get occupied(): number {
    return this.busy.length;
  }

  get free(): number {
    return this.units - this.busy.length;
  }

  /**
   * Advance every busy unit by one day and release finished ones
   */
  advance(): Map<CropId, number> {
    const finished = new Map<CropId, number>();
    const stillBusy: BusyUnit[] = [];

    for (const unit of this.busy) {
      unit.daysRemaining -= 1;
      if (unit.daysRemaining <= 0) {
        finished.set(unit.cropId, (finished.get(unit.cropId) ?? 0) + 1);
        this.completedByCrop.set(unit.cropId, (this.completedByCrop.get(unit.cropId) ?? 0) + 1);
      } else {
        stillBusy.push(unit);
      }
    }

    this.busy = stillBusy;
    return finished;
  }

  /**
   * Occupy one free unit. Returns false when the pool is full.
   */
  start(cropId: CropId): boolean {
    if (this.free <= 0) return false;
    this.busy.push({ cropId, daysRemaining: this.spec.durationDays });
    return true;
  }

  inFlight(cropId: CropId): number {
    return this.busy.filter((u) => u.cropId === cropId).length;
  }

  completed(cropId: CropId): number {
    return this.completedByCrop.get(cropId) ?? 0;
  }
}

export interface ProcessingDayResult {
  consumed: Map<CropId, number>;
  completed: Record<ProcessorKind, Map<CropId, number>>;
}

/**
 * Owns one pool per processor kind and a fixed crop priority
 */
export class ProcessingAllocator {
  readonly pools: Record<ProcessorKind, TimedProcessorPool>;

  constructor(
    counts: ProcessorCounts,
    specs: Record<ProcessorKind, ProcessorSpec>,
    public readonly priority: readonly CropId[]
  ) {
    this.pools = {
      fermentation: new TimedProcessorPool('fermentation', counts.fermentation, specs.fermentation),
      preserving: new TimedProcessorPool('preserving', counts.preserving, specs.preserving),
      drying: new TimedProcessorPool('drying', counts.drying, specs.drying),
    };
  }

  /**
   * One day of processing. Per kind: release finished units, then fill free
   * units crop by crop in priority order.
   */
  processDay(ledger: FruitLedger): ProcessingDayResult {
    const result: ProcessingDayResult = {
      consumed: new Map(),
      completed: { fermentation: new Map(), preserving: new Map(), drying: new Map() },
    };

    for (const kind of PROCESSOR_ORDER) {
      const pool = this.pools[kind];
      result.completed[kind] = pool.advance();

      for (const cropId of this.priority) {
        while (pool.free > 0 && ledger.unprocessed(cropId) >= pool.spec.inputPerCycle) {
          ledger.consume(cropId, kind, pool.spec.inputPerCycle);
          pool.start(cropId);
          result.consumed.set(cropId, (result.consumed.get(cropId) ?? 0) + pool.spec.inputPerCycle);
        }
      }
    }

    return result;
  }

  /**
   * consumed = (completed + in flight) * inputPerCycle, per kind and crop
   */
  isConsistentWith(ledger: FruitLedger): boolean {
    for (const cropId of ledger.cropIds()) {
      const entry = ledger.get(cropId);
      if (!entry) continue;
      for (const kind of PROCESSOR_ORDER) {
        const pool = this.pools[kind];
        const expected = (pool.completed(cropId) + pool.inFlight(cropId)) * pool.spec.inputPerCycle;
        if (entry.consumed[kind] !== expected) return false;
      }
    }
    return true;
  }
}
