/**
 * Config Overrides Tests
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  addOverride,
  applyOverrides,
  getOverridesAsObject,
  loadOverrides,
  removeOverride,
  saveOverrides,
  setNestedValue,
  type OverridesFile,
} from '../../src/config/overrides.js';
import { ConfigValidationError } from '../../src/config/validation.js';

function createOverrides(): OverridesFile {
  return { version: 1, lastModified: '', overrides: [] };
}

describe('setNestedValue', () => {
  it('should create intermediate objects', () => {
    const config: Record<string, unknown> = {};
    setNestedValue(config, 'aging.vessels', 25);
    expect(config).toEqual({ aging: { vessels: 25 } });
  });

  it('should index into arrays with numeric segments', () => {
    const config: Record<string, unknown> = { plots: [{ tiles: 1 }, { tiles: 2 }] };
    setNestedValue(config, 'plots.1.tiles', 9);
    expect(config).toEqual({ plots: [{ tiles: 1 }, { tiles: 9 }] });
  });

  it('should reject a non-numeric segment inside an array', () => {
    const config: Record<string, unknown> = { plots: [] };
    expect(() => setNestedValue(config, 'plots.first', 1)).toThrow(ConfigValidationError);
  });
});

describe('override editing', () => {
  it('should replace an existing override for the same path', () => {
    const now = new Date('2024-03-01T00:00:00.000Z');
    let data = addOverride(
      createOverrides(),
      { path: 'processors.fermentation', oldValue: 20, newValue: 40, source: 'manual' },
      now
    );
    data = addOverride(
      data,
      { path: 'processors.fermentation', oldValue: 40, newValue: 50, source: 'sweep-fermentation-50' },
      now
    );

    expect(data.overrides).toHaveLength(1);
    expect(data.overrides[0]).toEqual({
      path: 'processors.fermentation',
      oldValue: 40,
      newValue: 50,
      source: 'sweep-fermentation-50',
      appliedAt: '2024-03-01T00:00:00.000Z',
    });
  });

  it('should remove by path and flatten to an object', () => {
    let data = addOverride(createOverrides(), { path: 'a', oldValue: 1, newValue: 2, source: 'manual' });
    data = addOverride(data, { path: 'b', oldValue: 3, newValue: 4, source: 'manual' });
    data = removeOverride(data, 'a');

    expect(getOverridesAsObject(data)).toEqual({ b: 4 });
  });

  it('should apply every override and count them', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    let data = addOverride(createOverrides(), {
      path: 'processors.fermentation',
      oldValue: 1,
      newValue: 8,
      source: 'manual',
    });
    data = addOverride(data, { path: 'aging.fullBatchRequired', oldValue: false, newValue: true, source: 'manual' });
    const config: Record<string, unknown> = { processors: { fermentation: 1, drying: 2 } };

    expect(applyOverrides(config, data)).toBe(2);
    expect(config).toEqual({ processors: { fermentation: 8, drying: 2 }, aging: { fullBatchRequired: true } });
    vi.restoreAllMocks();
  });
});

describe('override files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'farm-overrides-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should return no overrides for a missing file', () => {
    expect(loadOverrides(join(dir, 'none.json')).overrides).toEqual([]);
  });

  it('should skip malformed entries', () => {
    const file = join(dir, 'overrides.json');
    writeFileSync(
      file,
      JSON.stringify({ version: 2, overrides: [{ path: 'aging.vessels', newValue: 10 }, { newValue: 3 }, 'junk'] })
    );

    const data = loadOverrides(file);
    expect(data.version).toBe(2);
    expect(data.overrides).toHaveLength(1);
    expect(data.overrides[0].path).toBe('aging.vessels');
    expect(data.overrides[0].source).toBe('manual');
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('should write a file that loads back', () => {
    const file = join(dir, 'saved.json');
    const data = addOverride(createOverrides(), {
      path: 'processors.drying',
      oldValue: 0,
      newValue: 3,
      source: 'manual',
      rationale: 'dry the surplus',
    });

    expect(saveOverrides(file, data)).toBe(true);
    const written: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(written).toMatchObject({ version: 1 });
    expect(loadOverrides(file).overrides[0]).toMatchObject({
      path: 'processors.drying',
      newValue: 3,
      rationale: 'dry the surplus',
    });
  });
});
