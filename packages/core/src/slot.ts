// ============================================================================
// @freqtable/core — Table Slots
// ============================================================================

export interface EmptySlot {
  readonly kind: 'empty';
}

/**
 * A deleted entry. Counts as occupied for probing and load factor.
 */
export interface TombstoneSlot {
  readonly kind: 'tombstone';
}

/**
 * A live entry: a distinct key and how often it has been inserted.
 */
export interface OccupiedSlot {
  readonly kind: 'occupied';
  readonly key: string;
  frequency: number;
}

export type Slot = EmptySlot | TombstoneSlot | OccupiedSlot;

export const EMPTY: EmptySlot = Object.freeze({ kind: 'empty' });
export const TOMBSTONE: TombstoneSlot = Object.freeze({ kind: 'tombstone' });

export function occupied(key: string, frequency = 1): OccupiedSlot {
  return { kind: 'occupied', key, frequency };
}

/**
 * Render a slot the way `FrequencyTable.display()` prints it.
 */
export function formatSlot(slot: Slot): string {
  switch (slot.kind) {
    case 'empty':
      return '**';
    case 'tombstone':
      return '#DEL#';
    case 'occupied':
      return `[${slot.key}, ${slot.frequency}]`;
  }
}
