// ============================================================================
// @freqtable/core — Public API
// ============================================================================

// Table
export { FrequencyTable } from './table.js';
export type { TableStats } from './table.js';

// Slots
export { EMPTY, TOMBSTONE, formatSlot } from './slot.js';
export type { Slot, EmptySlot, TombstoneSlot, OccupiedSlot } from './slot.js';

// Hashing
export { hornerHash, charTerm, isPrime, nextPrime, growCapacity } from './hashing.js';

// Configuration
export {
  DEFAULT_CAPACITY,
  DEFAULT_MAX_LOAD_FACTOR,
  HASH_RADIX,
  CHAR_DISPLACEMENT,
  INVALID_HASH,
  resolveTableOptions,
  validateCapacity,
} from './config.js';
export type { TableOptions, ResolvedTableOptions } from './config.js';

// Errors
export { FreqTableError, InvalidArgumentError } from './errors.js';

// Logging
export {
  debug,
  info,
  warn,
  error,
  onLog,
  setLogLevel,
  getLogLevel,
  isDebugEnabled,
  timer,
  Timer,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
