// ============================================================================
// @freqtable/core — Error Types
// ============================================================================

/**
 * Base error class for all freqtable errors.
 */
export class FreqTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FreqTableError';
  }
}

// ---------------------------------------------------------------------------
// Argument Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a table is constructed with an unusable capacity or option.
 *
 * Malformed keys never raise this: empty keys are tolerated by every
 * table operation.
 */
export class InvalidArgumentError extends FreqTableError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(message: string, options?: { field?: string; value?: unknown }) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.field = options?.field;
    this.value = options?.value;
  }
}
