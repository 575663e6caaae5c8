// ============================================================================
// Frequency Table — Tests
// ============================================================================

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { INVALID_HASH } from '../config.js';
import { FreqTableError, InvalidArgumentError } from '../errors.js';
import { type LogEntry, getLogLevel, onLog, setLogLevel } from '../logger.js';
import { FrequencyTable } from '../table.js';

function tableWith(keys: string[], capacity?: number): FrequencyTable {
  const table = new FrequencyTable(capacity);
  for (const key of keys) table.insert(key);
  return table;
}

describe('FrequencyTable — construction', () => {
  it('defaults to 10 empty slots', () => {
    const table = new FrequencyTable();
    expect(table.capacity()).toBe(10);
    expect(table.size()).toBe(0);
    expect(table.collisionCount()).toBe(0);
    expect(table.display()).toBe('Table: ** ** ** ** ** ** ** ** ** **');
  });

  it('accepts an explicit capacity', () => {
    expect(new FrequencyTable(3).display()).toBe('Table: ** ** **');
    expect(new FrequencyTable(1).capacity()).toBe(1);
  });

  it('rejects a capacity below one', () => {
    expect(() => new FrequencyTable(0)).toThrow(InvalidArgumentError);
    expect(() => new FrequencyTable(-5)).toThrow('Initial capacity cannot be less than one');
  });

  it('rejects a fractional capacity', () => {
    expect(() => new FrequencyTable(2.5)).toThrow(InvalidArgumentError);
  });

  it('reports the offending field and value', () => {
    try {
      new FrequencyTable(0);
      expect.unreachable('constructor should throw');
    } catch (e) {
      expect(e).toBeInstanceOf(FreqTableError);
      expect(e).toBeInstanceOf(InvalidArgumentError);
      if (e instanceof InvalidArgumentError) {
        expect(e.name).toBe('InvalidArgumentError');
        expect(e.field).toBe('capacity');
        expect(e.value).toBe(0);
      }
    }
  });

  it('rejects a max load factor outside (0, 1)', () => {
    expect(() => new FrequencyTable(10, { maxLoadFactor: 0 })).toThrow(InvalidArgumentError);
    expect(() => new FrequencyTable(10, { maxLoadFactor: 1 })).toThrow(InvalidArgumentError);
    expect(() => new FrequencyTable(10, { maxLoadFactor: Number.NaN })).toThrow(
      InvalidArgumentError,
    );
  });
});

describe('FrequencyTable — insert & lookup', () => {
  it('counts repeated keys', () => {
    const table = tableWith(['cat', 'dog', 'cat']);
    expect(table.size()).toBe(2);
    expect(table.frequencyOf('cat')).toBe(2);
    expect(table.frequencyOf('dog')).toBe(1);
    expect(table.display()).toBe('Table: ** ** ** ** [cat, 2] ** ** ** [dog, 1] **');
  });

  it('uses one slot however often a key is inserted', () => {
    const table = new FrequencyTable(10);
    for (let i = 0; i < 25; i++) table.insert('echo');
    expect(table.frequencyOf('echo')).toBe(25);
    expect(table.getStats().occupied).toBe(1);
    expect(table.capacity()).toBe(10);
  });

  it('ignores the empty key', () => {
    const table = new FrequencyTable();
    table.insert('');
    expect(table.size()).toBe(0);
    expect(table.contains('')).toBe(false);
    expect(table.frequencyOf('')).toBe(0);
    expect(table.remove('')).toBeNull();
    expect(table.hashOf('')).toBe(INVALID_HASH);
  });

  it('reports absent keys', () => {
    const table = tableWith(['cat']);
    expect(table.contains('cow')).toBe(false);
    expect(table.frequencyOf('cow')).toBe(0);
    expect(table.remove('cow')).toBeNull();
  });

  it('probes past a collision to the next free slot', () => {
    const table = tableWith(['a', 'k']);
    expect(table.hashOf('a')).toBe(1);
    expect(table.hashOf('k')).toBe(1);
    expect(table.display()).toBe('Table: ** [a, 1] [k, 1] ** ** ** ** ** ** **');
    expect(table.contains('k')).toBe(true);
  });

  it('treats upper and lower case as distinct keys', () => {
    const table = tableWith(['a', 'A']);
    expect(table.hashOf('A')).toBe(table.hashOf('a'));
    expect(table.size()).toBe(2);
    expect(table.collisionCount()).toBe(1);
    expect(table.display()).toBe('Table: ** [a, 1] [A, 1] ** ** ** ** ** ** **');
  });
});

describe('FrequencyTable — remove', () => {
  it('decrements a repeated key in place', () => {
    const table = tableWith(['cat', 'cat', 'cat']);
    expect(table.remove('cat')).toBe('cat');
    expect(table.frequencyOf('cat')).toBe(2);
    expect(table.size()).toBe(1);
    expect(table.display()).toBe('Table: ** ** ** ** [cat, 2] ** ** ** ** **');
  });

  it('leaves a tombstone when the last occurrence goes', () => {
    const table = tableWith(['x']);
    expect(table.remove('x')).toBe('x');
    expect(table.contains('x')).toBe(false);
    expect(table.frequencyOf('x')).toBe(0);
    expect(table.size()).toBe(0);
    expect(table.display()).toBe('Table: ** ** ** ** #DEL# ** ** ** ** **');
    expect(table.getStats()).toMatchObject({ occupied: 1, tombstones: 1 });
  });

  it('reuses the tombstone without growing occupancy', () => {
    const table = tableWith(['x']);
    table.remove('x');
    table.insert('x');
    expect(table.display()).toBe('Table: ** ** ** ** [x, 1] ** ** ** ** **');
    expect(table.getStats()).toMatchObject({ size: 1, occupied: 1, tombstones: 0 });
  });

  it('keeps searching past a tombstone', () => {
    const table = tableWith(['a', 'k']);
    table.remove('a');
    expect(table.display()).toBe('Table: ** #DEL# [k, 1] ** ** ** ** ** ** **');
    expect(table.contains('k')).toBe(true);
    expect(table.frequencyOf('k')).toBe(1);
  });

  it('places a colliding key on the tombstone ahead of a live one', () => {
    const table = tableWith(['a', 'k']);
    table.remove('a');
    table.insert('u');
    expect(table.display()).toBe('Table: ** [u, 1] [k, 1] ** ** ** ** ** ** **');
    expect(table.getStats()).toMatchObject({ size: 2, occupied: 2, collisions: 1 });
  });
});

describe('FrequencyTable — collision accounting', () => {
  it('counts one collision for a pair sharing a bucket', () => {
    const table = new FrequencyTable();
    table.insert('a');
    expect(table.collisionCount()).toBe(0);
    table.insert('k');
    expect(table.collisionCount()).toBe(1);
  });

  it('drops the pair when one key is removed', () => {
    const table = tableWith(['a', 'k']);
    table.remove('a');
    expect(table.collisionCount()).toBe(0);
  });

  it('does not change on repeat inserts or partial removes', () => {
    const table = tableWith(['a', 'k', 'k']);
    expect(table.collisionCount()).toBe(1);
    table.remove('k');
    expect(table.collisionCount()).toBe(1);
  });

  it('counts every pair among three keys in one bucket', () => {
    const table = tableWith(['a', 'k', 'u']);
    expect(table.collisionCount()).toBe(3);
    table.remove('k');
    expect(table.collisionCount()).toBe(1);
  });

  it('ignores neighbours from other buckets in the same probe run', () => {
    const table = tableWith(['a', 'k', 'u', 'b', 'c']);
    expect(table.display()).toBe('Table: ** [a, 1] [k, 1] [u, 1] [b, 1] [c, 1] ** ** ** **');
    expect(table.collisionCount()).toBe(3);
  });
});

describe('FrequencyTable — resize', () => {
  it('grows from 10 to 23 on the sixth distinct key', () => {
    const table = tableWith(['a', 'b', 'c', 'd', 'e']);
    expect(table.capacity()).toBe(10);
    expect(table.loadFactor()).toBe(0.5);

    table.insert('f');
    expect(table.capacity()).toBe(23);
    expect(table.size()).toBe(6);
    expect(table.getStats().resizes).toBe(1);
    expect(table.display()).toBe(
      `Table: ** [a, 1] [b, 1] [c, 1] [d, 1] [e, 1] [f, 1]${' **'.repeat(16)}`,
    );
  });

  it('rebuilds frequencies by reinsertion', () => {
    const table = tableWith(['a', 'a', 'a', 'b', 'c', 'd', 'e', 'f']);
    expect(table.capacity()).toBe(23);
    expect(table.frequencyOf('a')).toBe(3);
    expect(table.frequencyOf('f')).toBe(1);
  });

  it('recomputes collisions against the new capacity', () => {
    const table = tableWith(['a', 'k', 'u', 'b', 'c']);
    expect(table.collisionCount()).toBe(3);

    table.insert('d');
    expect(table.capacity()).toBe(23);
    expect(table.collisionCount()).toBe(0);
    expect(table.hashOf('k')).toBe(11);
    expect(table.hashOf('u')).toBe(21);
  });

  it('counts tombstones towards the load factor and drops them on rebuild', () => {
    const table = tableWith(['a', 'b', 'c', 'd', 'e']);
    table.remove('a');
    table.remove('b');
    table.remove('c');
    expect(table.getStats()).toMatchObject({ size: 2, occupied: 5, tombstones: 3, capacity: 10 });

    table.insert('z');
    expect(table.getStats()).toMatchObject({ size: 3, occupied: 3, tombstones: 0, capacity: 23 });
  });

  it('grows a single-slot table on its first key', () => {
    const table = tableWith(['a'], 1);
    expect(table.capacity()).toBe(3);
    expect(table.display()).toBe('Table: ** [a, 1] **');
  });

  it('keeps growing until a low maximum load factor holds', () => {
    const table = new FrequencyTable(1, { maxLoadFactor: 0.1 });
    table.insert('a');
    expect(table.capacity()).toBe(17);
    expect(table.getStats().resizes).toBe(3);
    expect(table.loadFactor()).toBeLessThanOrEqual(0.1);
  });

  describe('logging', () => {
    const previousLevel = getLogLevel();

    beforeEach(() => {
      vi.spyOn(console, 'debug').mockImplementation(() => {});
      setLogLevel('debug');
    });

    afterEach(() => {
      setLogLevel(previousLevel);
      vi.restoreAllMocks();
    });

    it('reports each rehash', () => {
      const entries: LogEntry[] = [];
      const unsubscribe = onLog((entry) => entries.push(entry));

      tableWith(['a', 'b', 'c', 'd', 'e', 'f']);
      unsubscribe();

      const rehash = entries.filter((e) => e.message.startsWith('Rehashing'));
      expect(rehash).toHaveLength(1);
      expect(rehash[0].message).toBe('Rehashing 6 items, new size is 23');
      expect(rehash[0].data).toEqual({ items: 6, from: 10, to: 23 });
      expect(console.debug).toHaveBeenCalledWith(
        '[freqtable] Rehashing 6 items, new size is 23 {"items":6,"from":10,"to":23}',
      );
    });
  });
});

describe('FrequencyTable — iteration', () => {
  it('yields live entries in slot order', () => {
    const table = tableWith(['dog', 'cat', 'cat']);
    table.insert('x');
    table.remove('x');
    expect([...table.entries()]).toEqual([
      ['cat', 2],
      ['dog', 1],
    ]);
  });

  it('orders by descending frequency then key', () => {
    const table = tableWith(['b', 'a', 'c', 'c', 'b', 'c']);
    expect(table.mostFrequent()).toEqual([
      ['c', 3],
      ['b', 2],
      ['a', 1],
    ]);
    expect(table.mostFrequent(2)).toEqual([
      ['c', 3],
      ['b', 2],
    ]);
    expect(table.mostFrequent(0)).toEqual([]);
  });

  it('returns a snapshot of the slots', () => {
    const table = tableWith(['x']);
    const snapshot = table.slots();
    table.insert('x');
    expect(snapshot[4]).toEqual({ kind: 'occupied', key: 'x', frequency: 1 });
    expect(table.slots()[4]).toEqual({ kind: 'occupied', key: 'x', frequency: 2 });
    expect(snapshot[0]).toEqual({ kind: 'empty' });
  });

  it('renders through toString', () => {
    expect(String(tableWith(['cat']))).toBe('Table: ** ** ** ** [cat, 1] ** ** ** ** **');
  });
});
