/**
 * Aging Tests
 * Verify trigger-day fills and the full-batch policy
 */

import { describe, it, expect } from 'vitest';
import { AgingBatcher } from '../../src/systems/aging.js';
import type { AgingConfig } from '../../src/core/types.js';

const TRIGGER_OFFSET = 56;

function createBatcher(
  config: Partial<AgingConfig>,
  priority: string[] = ['wine'],
  startingUnaged: Record<string, number> = {}
): AgingBatcher {
  return new AgingBatcher(
    { vessels: 10, fullBatchRequired: false, fallbackVessels: null, ...config },
    priority,
    TRIGGER_OFFSET,
    startingUnaged
  );
}

describe('AgingBatcher', () => {
  it('should trigger on day 1 and day 57 only', () => {
    const batcher = createBatcher({});
    expect(batcher.triggerDays).toEqual([1, 57]);
    expect(batcher.isTriggerDay(1)).toBe(true);
    expect(batcher.isTriggerDay(57)).toBe(true);
    expect(batcher.isTriggerDay(29)).toBe(false);
  });

  it('should fall back on both trigger days when the first batch is short', () => {
    const batcher = createBatcher({ vessels: 10, fullBatchRequired: true, fallbackVessels: 4 });

    batcher.addGoods('wine', 6);
    expect(batcher.fill().get('wine')).toBe(4);

    // Enough for ten on its own, but the first batch already failed
    batcher.addGoods('wine', 20);
    expect(batcher.fill().get('wine')).toBe(4);

    const result = batcher.resolve();
    expect(result.effectiveVessels).toBe(4);
    expect(result.fullBatchMet).toBe(false);
    expect(result.fills).toEqual([4, 4]);
    expect(result.usesPerVessel).toBe(2);
    expect(result.agedByCrop.get('wine')).toBe(8);
  });

  it('should keep the full vessel count when every batch fills', () => {
    const batcher = createBatcher({ vessels: 5, fullBatchRequired: true, fallbackVessels: 2 });

    batcher.addGoods('wine', 5);
    batcher.fill();
    batcher.addGoods('wine', 7);
    batcher.fill();

    const result = batcher.resolve();
    expect(result.effectiveVessels).toBe(5);
    expect(result.fullBatchMet).toBe(true);
    expect(result.fills).toEqual([5, 5]);
    expect(result.usesPerVessel).toBe(2);
    expect(batcher.unaged('wine')).toBe(2);
  });

  it('should age partial batches when full batches are not required', () => {
    const batcher = createBatcher({ vessels: 10 });

    batcher.addGoods('wine', 6);
    batcher.fill();
    batcher.addGoods('wine', 20);
    batcher.fill();

    const result = batcher.resolve();
    expect(result.effectiveVessels).toBe(10);
    expect(result.fullBatchMet).toBe(false);
    expect(result.fills).toEqual([6, 10]);
    expect(result.usesPerVessel).toBeCloseTo(1.6);
  });

  it('should age nothing when the fallback has no vessels', () => {
    const batcher = createBatcher({ vessels: 3, fullBatchRequired: true });

    batcher.addGoods('wine', 1);
    expect(batcher.fill().size).toBe(0);
    batcher.fill();

    const result = batcher.resolve();
    expect(result.effectiveVessels).toBe(0);
    expect(result.usesPerVessel).toBe(0);
    expect(result.fills).toEqual([0, 0]);
    expect(batcher.unaged('wine')).toBe(1);
  });

  it('should cap the fallback at the configured vessel count', () => {
    const batcher = createBatcher({ vessels: 2, fullBatchRequired: true, fallbackVessels: 10 });

    batcher.addGoods('wine', 1);
    expect(batcher.fill().get('wine')).toBe(1);
    batcher.fill();

    const result = batcher.resolve();
    expect(result.effectiveVessels).toBe(2);
    expect(result.fills).toEqual([1, 0]);
  });

  it('should hold back a full first batch until the last trigger day', () => {
    const batcher = createBatcher({ vessels: 5, fullBatchRequired: true, fallbackVessels: 2 });

    batcher.addGoods('wine', 5);
    expect(batcher.fill().size).toBe(0);
    batcher.addGoods('wine', 7);
    expect(batcher.fill().get('wine')).toBe(10);
  });

  it('should report both fallback batches when the last batch misses', () => {
    const batcher = createBatcher({ vessels: 4, fullBatchRequired: true, fallbackVessels: 2 }, ['wine'], {
      wine: 4,
    });

    expect(batcher.fill().size).toBe(0);
    expect(batcher.fill().get('wine')).toBe(4);
    expect(batcher.resolve().agedByCrop.get('wine')).toBe(4);
  });

  it('should fill vessels in priority order', () => {
    const batcher = createBatcher({ vessels: 3 }, ['b', 'a'], { a: 2, b: 5 });

    const aged = batcher.fill();
    expect(aged.get('b')).toBe(3);
    expect(aged.has('a')).toBe(false);
    expect(batcher.unaged('a')).toBe(2);
  });

  it('should never report more than two uses per vessel', () => {
    const batcher = createBatcher({ vessels: 2 });
    batcher.addGoods('wine', 50);
    batcher.fill();
    batcher.fill();

    expect(batcher.resolve().usesPerVessel).toBeLessThanOrEqual(2);
  });
});
