// ============================================================================
// @freqtable/core — Frequency Table
// ============================================================================
//
// Open-addressing hash table from distinct strings to occurrence counts.
//
//   - Linear probing resolves collisions, wrapping at the end of the array.
//   - Deleting the last occurrence of a key leaves a tombstone, which
//     searches skip over and inserts may reuse.
//   - Load factor counts live AND tombstoned slots. Crossing the maximum
//     rebuilds the table at the first prime >= 2 * capacity + 1.
//   - `collisionCount` is the number of pairs of live keys that share a
//     hash bucket.
// ============================================================================

import {
  DEFAULT_CAPACITY,
  INVALID_HASH,
  type TableOptions,
  resolveTableOptions,
  validateCapacity,
} from './config.js';
import { growCapacity, hornerHash } from './hashing.js';
import { logResize, timer } from './logger.js';
import { EMPTY, type OccupiedSlot, type Slot, TOMBSTONE, formatSlot, occupied } from './slot.js';

/**
 * Counters describing the current shape of a table.
 */
export interface TableStats {
  /** Live keys. */
  size: number;
  capacity: number;
  /** Live plus tombstoned slots. */
  occupied: number;
  tombstones: number;
  collisions: number;
  loadFactor: number;
  /** Resizes since construction. */
  resizes: number;
}

/**
 * Hash table storing strings and their frequencies.
 *
 * @example
 * ```ts
 * const table = new FrequencyTable();
 * table.insert('cat');
 * table.insert('dog');
 * table.insert('cat');
 * table.size();             // → 2
 * table.frequencyOf('cat'); // → 2
 * table.remove('dog');      // → 'dog'
 * ```
 */
export class FrequencyTable {
  private slotArray: Slot[];
  private liveCount = 0;
  private occupiedCount = 0;
  private collisions = 0;
  private resizeCount = 0;
  private rebuilding = false;
  private readonly maxLoadFactor: number;

  /**
   * @param capacity - Initial slot count, at least 1. Defaults to 10.
   * @throws InvalidArgumentError for a capacity below 1 or a bad option
   */
  constructor(capacity: number = DEFAULT_CAPACITY, options: TableOptions = {}) {
    validateCapacity(capacity);
    this.maxLoadFactor = resolveTableOptions(options).maxLoadFactor;
    this.slotArray = new Array<Slot>(capacity).fill(EMPTY);
  }

  // ---- Mutation ----

  /**
   * Count one occurrence of `key`. Empty keys are ignored.
   */
  insert(key: string): void {
    if (key.length === 0) return;

    const found = this.search(key);
    if (found) {
      found.slot.frequency++;
      return;
    }

    // Counted before placement so the key is not compared with itself.
    const newCollisions = this.countCollisions(key);

    let index = this.hash(key);
    while (this.slotArray[index].kind === 'occupied') {
      index = (index + 1) % this.slotArray.length;
    }

    if (this.slotArray[index].kind === 'empty') {
      this.occupiedCount++;
    }
    this.slotArray[index] = occupied(key);
    this.liveCount++;
    this.collisions += newCollisions;

    if (!this.rebuilding && this.loadFactor() > this.maxLoadFactor) {
      this.resize();
    }
  }

  /**
   * Remove one occurrence of `key`.
   *
   * @returns the key, or null when it is empty or not in the table
   */
  remove(key: string): string | null {
    if (key.length === 0) return null;

    const found = this.search(key);
    if (!found) return null;

    const { index, slot } = found;
    if (slot.frequency > 1) {
      slot.frequency--;
      return slot.key;
    }

    const lostCollisions = this.countCollisions(key);
    this.slotArray[index] = TOMBSTONE;
    // occupiedCount stays: the tombstone still lengthens probe sequences.
    this.liveCount--;
    this.collisions -= lostCollisions;
    return slot.key;
  }

  // ---- Queries ----

  size(): number {
    return this.liveCount;
  }

  contains(key: string): boolean {
    if (key.length === 0) return false;
    return this.search(key) !== null;
  }

  /**
   * @returns how many times `key` is counted, 0 when absent
   */
  frequencyOf(key: string): number {
    if (key.length === 0) return 0;
    return this.search(key)?.slot.frequency ?? 0;
  }

  collisionCount(): number {
    return this.collisions;
  }

  /**
   * Bucket `key` hashes to at the current capacity, or `INVALID_HASH` for
   * the empty key.
   */
  hashOf(key: string): number {
    if (key.length === 0) return INVALID_HASH;
    return this.hash(key);
  }

  capacity(): number {
    return this.slotArray.length;
  }

  loadFactor(): number {
    return this.occupiedCount / this.slotArray.length;
  }

  getStats(): TableStats {
    return {
      size: this.liveCount,
      capacity: this.slotArray.length,
      occupied: this.occupiedCount,
      tombstones: this.occupiedCount - this.liveCount,
      collisions: this.collisions,
      loadFactor: this.loadFactor(),
      resizes: this.resizeCount,
    };
  }

  /**
   * Live `[key, frequency]` pairs in slot order.
   */
  *entries(): Generator<[string, number]> {
    for (const slot of this.slotArray) {
      if (slot.kind === 'occupied') yield [slot.key, slot.frequency];
    }
  }

  /**
   * Live entries by descending frequency, ties by ascending key.
   */
  mostFrequent(limit = Number.POSITIVE_INFINITY): [string, number][] {
    return [...this.entries()]
      .sort(([keyA, freqA], [keyB, freqB]) => {
        if (freqA !== freqB) return freqB - freqA;
        if (keyA === keyB) return 0;
        return keyA < keyB ? -1 : 1;
      })
      .slice(0, Math.max(0, limit));
  }

  /**
   * Copy of the backing array.
   */
  slots(): readonly Readonly<Slot>[] {
    return this.slotArray.map((slot) => (slot.kind === 'occupied' ? { ...slot } : slot));
  }

  /**
   * One token per slot: `**` empty, `#DEL#` tombstone, `[key, freq]` live.
   *
   * @example
   * ```ts
   * new FrequencyTable(3).display(); // → 'Table: ** ** **'
   * ```
   */
  display(): string {
    return `Table: ${this.slotArray.map(formatSlot).join(' ')}`;
  }

  toString(): string {
    return this.display();
  }

  // ---- Internals ----

  private hash(key: string): number {
    return hornerHash(key, this.slotArray.length);
  }

  /**
   * Live slot holding `key` and its index, or null. Tombstones do not end
   * the scan; the first Empty slot does.
   */
  private search(key: string): { index: number; slot: OccupiedSlot } | null {
    let index = this.hash(key);
    while (this.slotArray[index].kind !== 'empty') {
      const slot = this.slotArray[index];
      if (slot.kind === 'occupied' && slot.key === key) return { index, slot };
      index = (index + 1) % this.slotArray.length;
    }
    return null;
  }

  /**
   * Live keys other than `key` that share its bucket, found along its probe
   * run.
   */
  private countCollisions(key: string): number {
    const home = this.hash(key);
    let count = 0;
    let index = home;
    while (this.slotArray[index].kind !== 'empty') {
      const slot = this.slotArray[index];
      if (slot.kind === 'occupied' && slot.key !== key && this.hash(slot.key) === home) {
        count++;
      }
      index = (index + 1) % this.slotArray.length;
    }
    return count;
  }

  /**
   * Grow to the next prime past double the capacity and reinsert every live
   * key once per occurrence, recomputing occupancy and collisions. Grows
   * again if the rebuilt table is still over the maximum load factor.
   */
  private resize(): void {
    do {
      const t = timer('resize');
      const old = this.slotArray;
      const newCapacity = growCapacity(old.length);

      logResize(this.liveCount, old.length, newCapacity);

      this.slotArray = new Array<Slot>(newCapacity).fill(EMPTY);
      this.liveCount = 0;
      this.occupiedCount = 0;
      this.collisions = 0;
      this.resizeCount++;

      this.rebuilding = true;
      try {
        for (const slot of old) {
          if (slot.kind !== 'occupied') continue;
          for (let n = slot.frequency; n > 0; n--) {
            this.insert(slot.key);
          }
        }
      } finally {
        this.rebuilding = false;
      }

      t.end({ capacity: newCapacity, size: this.liveCount });
    } while (this.loadFactor() > this.maxLoadFactor);
  }
}
