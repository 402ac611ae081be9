/**
 * Config Overrides Manager
 * Persists dot-path edits to a JSON file that gets merged over a scenario
 * document before validation
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { ConfigValidationError, isRawObject, type RawObject } from './validation.js';

// ============================================================================
// Types
// ============================================================================

export interface ConfigOverride {
  path: string;
  oldValue: unknown;
  newValue: unknown;
  appliedAt: string;
  source: string; // e.g., "sweep-fermentation-40"
  rationale?: string;
}

export interface OverridesFile {
  version: number;
  lastModified: string;
  overrides: ConfigOverride[];
}

function emptyOverrides(): OverridesFile {
  return {
    version: 1,
    lastModified: new Date().toISOString(),
    overrides: [],
  };
}

function parseOverride(raw: unknown): ConfigOverride | null {
  if (!isRawObject(raw) || typeof raw.path !== 'string' || raw.path === '') return null;
  return {
    path: raw.path,
    oldValue: raw.oldValue ?? null,
    newValue: raw.newValue ?? null,
    appliedAt: typeof raw.appliedAt === 'string' ? raw.appliedAt : '',
    source: typeof raw.source === 'string' ? raw.source : 'manual',
    rationale: typeof raw.rationale === 'string' ? raw.rationale : undefined,
  };
}

// ============================================================================
// Load/Save Functions
// ============================================================================

/**
 * Load overrides from file; a missing or unreadable file yields no overrides
 */
export function loadOverrides(filePath: string): OverridesFile {
  try {
    if (existsSync(filePath)) {
      const content: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
      if (isRawObject(content) && Array.isArray(content.overrides)) {
        const overrides: ConfigOverride[] = [];
        for (const entry of content.overrides) {
          const override = parseOverride(entry);
          if (override) overrides.push(override);
          else console.warn('[ConfigOverrides] Skipping malformed override:', entry);
        }
        return {
          version: typeof content.version === 'number' ? content.version : 1,
          lastModified: typeof content.lastModified === 'string' ? content.lastModified : '',
          overrides,
        };
      }
      console.warn('[ConfigOverrides] No overrides array in', filePath);
    }
  } catch (error) {
    console.warn('[ConfigOverrides] Failed to load overrides:', error);
  }

  return emptyOverrides();
}

/**
 * Save overrides to file
 */
export function saveOverrides(filePath: string, data: OverridesFile): boolean {
  try {
    data.lastModified = new Date().toISOString();
    writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
    console.log('[ConfigOverrides] Saved to', filePath);
    return true;
  } catch (error) {
    console.error('[ConfigOverrides] Failed to save:', error);
    return false;
  }
}

/**
 * Add a new override, replacing any existing one for the same path
 */
export function addOverride(
  data: OverridesFile,
  override: Omit<ConfigOverride, 'appliedAt'>,
  now: Date = new Date()
): OverridesFile {
  return {
    ...data,
    overrides: [
      ...data.overrides.filter((o) => o.path !== override.path),
      { ...override, appliedAt: now.toISOString() },
    ],
  };
}

/**
 * Remove an override by path
 */
export function removeOverride(data: OverridesFile, path: string): OverridesFile {
  return { ...data, overrides: data.overrides.filter((o) => o.path !== path) };
}

/**
 * Get current overrides as a flat object
 * e.g., { "processors.fermentation": 40, "aging.vessels": 25 }
 */
export function getOverridesAsObject(data: OverridesFile): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const override of data.overrides) {
    result[override.path] = override.newValue;
  }
  return result;
}

/**
 * Apply overrides to a decoded scenario document (mutates it). Returns the
 * number of overrides applied.
 */
export function applyOverrides(config: RawObject, data: OverridesFile): number {
  for (const override of data.overrides) {
    setNestedValue(config, override.path, override.newValue);
    console.log(`[ConfigOverrides] Applied: ${override.path} = ${JSON.stringify(override.newValue)}`);
  }
  return data.overrides.length;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Set a dot-path value, creating intermediate objects. Numeric segments
 * index into arrays.
 */
export function setNestedValue(obj: RawObject, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: RawObject | unknown[] = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const child = getChild(current, parts[i]);
    if (isRawObject(child) || Array.isArray(child)) {
      current = child;
    } else {
      const created: RawObject = {};
      setChild(current, parts[i], created);
      current = created;
    }
  }

  setChild(current, parts[parts.length - 1], value);
}

function getChild(container: RawObject | unknown[], key: string): unknown {
  if (Array.isArray(container)) return container[Number(key)];
  return container[key];
}

function setChild(container: RawObject | unknown[], key: string, value: unknown): void {
  if (Array.isArray(container)) {
    const index = Number(key);
    if (!Number.isInteger(index) || index < 0) {
      throw new ConfigValidationError(`segment '${key}' is not an array index`, 'overrides');
    }
    container[index] = value;
  } else {
    container[key] = value;
  }
}
