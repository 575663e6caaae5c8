// ============================================================================
// @freqtable/core — String Hashing & Table Sizing
// ============================================================================
//
// The hash folds a key's UTF-16 code units with Horner's rule, reducing
// modulo the table capacity at every step so intermediate values stay below
// `capacity * HASH_RADIX + 0xffff`. Each code unit is mapped to its distance
// from CHAR_DISPLACEMENT, so lowercase letters map to 1..26 and every term
// is non-negative.
// ============================================================================

import { CHAR_DISPLACEMENT, HASH_RADIX } from './config.js';

/**
 * Map one UTF-16 code unit to its hash term: `'a'` → 1, `'z'` → 26,
 * `'A'` → 31, `' '` → 64.
 */
export function charTerm(code: number): number {
  return Math.abs(code - CHAR_DISPLACEMENT);
}

/**
 * Horner's-rule hash of `key` for a table of `capacity` slots.
 *
 * @returns an index in `[0, capacity)`; 0 for the empty key
 *
 * @example
 * ```ts
 * hornerHash('ab', 10); // ((1 % 10) * 27 + 2) % 10 → 9
 * ```
 */
export function hornerHash(key: string, capacity: number): number {
  if (key.length === 0) return 0;

  let hash = charTerm(key.charCodeAt(0)) % capacity;
  for (let i = 1; i < key.length; i++) {
    hash = (charTerm(key.charCodeAt(i)) + HASH_RADIX * hash) % capacity;
  }
  return hash;
}

/**
 * Trial-division primality test, dividing up to `n / 2`.
 */
export function isPrime(n: number): boolean {
  if (n < 2) return false;
  for (let i = 2; i <= Math.floor(n / 2); i++) {
    if (n % i === 0) return false;
  }
  return true;
}

/**
 * Smallest prime greater than or equal to `n`.
 */
export function nextPrime(n: number): number {
  let candidate = Math.max(2, n);
  while (!isPrime(candidate)) {
    candidate++;
  }
  return candidate;
}

/**
 * Capacity a table of `capacity` slots grows to: the first prime at or
 * above `2 * capacity + 1`.
 */
export function growCapacity(capacity: number): number {
  return nextPrime(capacity * 2 + 1);
}
