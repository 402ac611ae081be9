/**
 * Config Validation
 * Typed readers over decoded JSON that reject malformed values with the
 * offending config path
 */

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${path}: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

export type RawObject = Record<string, unknown>;

export function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function joinPath(parent: string, key: string | number): string {
  if (typeof key === 'number') return `${parent}[${key}]`;
  return parent ? `${parent}.${key}` : key;
}

/**
 * Lowercase and strip spaces, dashes and underscores
 */
export function normalizeName(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s_-]/g, '');
}

/**
 * Nested object at key; a missing key reads as an empty object
 */
export function readObject(raw: RawObject, key: string, parent: string): RawObject {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRawObject(value)) {
    throw new ConfigValidationError('must be an object', joinPath(parent, key));
  }
  return value;
}

export function readArray(raw: RawObject, key: string, parent: string): unknown[] {
  const value = raw[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigValidationError('must be an array', joinPath(parent, key));
  }
  return value;
}

export function readBoolean(raw: RawObject, key: string, parent: string, fallback: boolean): boolean {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError('must be true or false', joinPath(parent, key));
  }
  return value;
}

export function readString(raw: RawObject, key: string, parent: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigValidationError('must be a string', joinPath(parent, key));
  }
  return value;
}

interface NumberBounds {
  min?: number;
  max?: number;
  /** Reject values equal to min */
  exclusiveMin?: boolean;
}

export function checkNumber(value: unknown, path: string, bounds: NumberBounds = {}): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigValidationError('must be a number', path);
  }
  if (bounds.min !== undefined) {
    if (bounds.exclusiveMin ? value <= bounds.min : value < bounds.min) {
      throw new ConfigValidationError(
        `must be ${bounds.exclusiveMin ? '>' : '>='} ${bounds.min} (got ${value})`,
        path
      );
    }
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ConfigValidationError(`must be <= ${bounds.max} (got ${value})`, path);
  }
  return value;
}

/**
 * Non-negative integer check used for every count in a scenario
 */
export function checkCount(value: unknown, path: string): number {
  const n = checkNumber(value, path, { min: 0 });
  if (!Number.isInteger(n)) {
    throw new ConfigValidationError(`must be a whole number (got ${n})`, path);
  }
  return n;
}

export function readNumber(
  raw: RawObject,
  key: string,
  parent: string,
  fallback: number,
  bounds: NumberBounds = {}
): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  return checkNumber(value, joinPath(parent, key), bounds);
}

export function readCount(raw: RawObject, key: string, parent: string, fallback = 0): number {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  return checkCount(value, joinPath(parent, key));
}

/**
 * Map of normalized keys to non-negative integers. The key normalizer returns
 * the canonical ids a key stands for, or null when the key is unknown.
 */
export function readCountMap(
  raw: RawObject,
  key: string,
  parent: string,
  normalizeKey: (rawKey: string) => readonly string[] | null
): Record<string, number> {
  const path = joinPath(parent, key);
  const entries = readObject(raw, key, parent);
  const result: Record<string, number> = {};

  for (const [rawKey, value] of Object.entries(entries)) {
    const ids = normalizeKey(rawKey);
    if (!ids) {
      throw new ConfigValidationError(`unknown name '${rawKey}'`, path);
    }
    const count = checkCount(value, joinPath(path, rawKey));
    for (const id of ids) result[id] = count;
  }
  return result;
}

/**
 * Pick one of a fixed set of values after name normalization
 */
export function readChoice<T extends string>(
  raw: RawObject,
  key: string,
  parent: string,
  fallback: T,
  aliases: Readonly<Record<string, T>>
): T {
  const value = raw[key];
  if (value === undefined || value === null) return fallback;
  return checkChoice(value, joinPath(parent, key), aliases);
}

export function checkChoice<T extends string>(
  value: unknown,
  path: string,
  aliases: Readonly<Record<string, T>>
): T {
  if (typeof value !== 'string') {
    throw new ConfigValidationError('must be a string', path);
  }
  const choice = aliases[normalizeName(value)];
  if (choice === undefined) {
    throw new ConfigValidationError(`unknown value '${value}'`, path);
  }
  return choice;
}
