/**
 * Error types raised by the simulation core
 */

export type SimulationErrorCode =
  | 'DAY_OUT_OF_RANGE'
  | 'UNKNOWN_CROP'
  | 'NEGATIVE_COUNT'
  | 'YEAR_COMPLETE'
  | 'INVALID_DURATION';

/**
 * Raised when the core is called with input that breaks its contract.
 * Validated configuration never produces one.
 */
export class SimulationError extends Error {
  constructor(
    message: string,
    public readonly code: SimulationErrorCode
  ) {
    super(message);
    this.name = 'SimulationError';
  }
}

/**
 * Throw NEGATIVE_COUNT unless value is a non-negative integer
 */
export function assertCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new SimulationError(`${label} must be a non-negative integer (got ${value})`, 'NEGATIVE_COUNT');
  }
}
