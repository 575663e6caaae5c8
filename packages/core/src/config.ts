// ============================================================================
// @freqtable/core — Table Configuration
// ============================================================================

import { InvalidArgumentError } from './errors.js';

/** Slot count used when no initial capacity is given. */
export const DEFAULT_CAPACITY = 10;

/** Radix of the Horner's-rule string hash. */
export const HASH_RADIX = 27;

/**
 * Subtracted from each character code before hashing, so that `'a'` maps to 1.
 */
export const CHAR_DISPLACEMENT = 96;

/**
 * Occupancy ratio (live + tombstoned slots over capacity) above which the
 * table grows.
 */
export const DEFAULT_MAX_LOAD_FACTOR = 0.5;

/** Returned by `hashOf` for the empty key. */
export const INVALID_HASH = -1;

/**
 * Options accepted by the `FrequencyTable` constructor.
 */
export interface TableOptions {
  /** Must lie strictly between 0 and 1. Defaults to 0.5. */
  maxLoadFactor?: number;
}

export interface ResolvedTableOptions {
  maxLoadFactor: number;
}

/**
 * Validate an initial capacity.
 * @throws InvalidArgumentError when the capacity is not a positive integer
 */
export function validateCapacity(capacity: number): number {
  if (!Number.isInteger(capacity)) {
    throw new InvalidArgumentError(`Initial capacity must be an integer, got ${capacity}`, {
      field: 'capacity',
      value: capacity,
    });
  }
  if (capacity < 1) {
    throw new InvalidArgumentError('Initial capacity cannot be less than one', {
      field: 'capacity',
      value: capacity,
    });
  }
  return capacity;
}

/**
 * Fill in defaults and validate table options.
 * @throws InvalidArgumentError when `maxLoadFactor` is outside (0, 1)
 */
export function resolveTableOptions(options: TableOptions = {}): ResolvedTableOptions {
  const maxLoadFactor = options.maxLoadFactor ?? DEFAULT_MAX_LOAD_FACTOR;

  // At 1 or above a full table has no Empty slot left to stop a probe.
  if (!(maxLoadFactor > 0 && maxLoadFactor < 1)) {
    throw new InvalidArgumentError(
      `maxLoadFactor must be greater than 0 and less than 1, got ${maxLoadFactor}`,
      { field: 'maxLoadFactor', value: maxLoadFactor },
    );
  }

  return { maxLoadFactor };
}
