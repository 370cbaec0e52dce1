/**
 * Tests for the public collection classes
 */

import { describe, it, expect } from 'vitest';
import { HashTrieMap, PersistentVector, OutOfRangeError, hashKey } from './index';

describe('HashTrieMap', () => {
  it('should insert, look up and delete', () => {
    const m1 = HashTrieMap.empty<string, number>().insert('a', 1).insert('b', 2);
    const m2 = m1.delete('a');

    expect(m1.lookup('a')).toBe(1);
    expect(m1.member('b')).toBe(true);
    expect(m1.size).toBe(2);
    expect(m2.lookup('a')).toBeUndefined();
    expect(m2.size).toBe(1);
  });

  it('should build from a list with a custom hash', () => {
    const map = HashTrieMap.fromList<number, string>(
      [
        [1, 'one'],
        [33, 'thirty-three'],
      ],
      (k) => k & 31
    );

    expect(map.lookup(1)).toBe('one');
    expect(map.lookup(33)).toBe('thirty-three');
    expect(map.trie.root.kind).toBe('bitmap');
  });

  it('should expose the alter family', () => {
    const map = HashTrieMap.fromList<string, number>([['hits', 1]]);

    expect(map.insertWith('hits', 1, (v, old) => v + old).lookup('hits')).toBe(2);
    expect(map.update('hits', () => undefined).member('hits')).toBe(false);
    expect(map.adjust('hits', (v) => v * 5).lookup('hits')).toBe(5);
    expect(map.alter('misses', () => ({ value: 0 })).lookup('misses')).toBe(0);
  });

  it('should return the same instance when nothing changes', () => {
    const map = HashTrieMap.fromList<string, number>([['a', 1]]);
    expect(map.insert('a', 1)).toBe(map);
    expect(map.delete('zzz')).toBe(map);
  });

  it('should iterate every entry once', () => {
    const entries: [string, number][] = Array.from({ length: 100 }, (_, i) => [`k${i}`, i]);
    const map = HashTrieMap.fromList(entries);

    const seen = [...map].sort((a, b) => a[1] - b[1]);
    expect(seen).toEqual(entries);
    expect(map.keys().length).toBe(100);
    expect(map.elems().reduce((a, b) => a + b, 0)).toBe(4950);
    expect(map.toList().length).toBe(100);
  });

  it('should keep keys whose value is undefined', () => {
    const map = HashTrieMap.empty<string, number | undefined>()
      .insert('a', 1)
      .insert('a', undefined)
      .insert('b', undefined);

    expect(map.member('a')).toBe(true);
    expect(map.member('b')).toBe(true);
    expect(map.size).toBe(2);
    expect(map.lookup('a')).toBeUndefined();
    expect(map.insert('b', undefined)).toBe(map);
    expect(map.delete('b').member('b')).toBe(false);
  });

  it('should hash object keys by identity', () => {
    const k1 = { id: 1 };
    const k2 = { id: 1 };
    const map = HashTrieMap.empty<object, string>().insert(k1, 'first');

    expect(map.lookup(k1)).toBe('first');
    expect(map.lookup(k2)).toBeUndefined();
    expect(hashKey(k1)).toBe(hashKey(k1));
  });
});

describe('PersistentVector', () => {
  it('should append and index', () => {
    let vec = PersistentVector.empty<string>();
    for (let i = 0; i < 40; i++) vec = vec.append(`v${i}`);

    expect(vec.count).toBe(40);
    expect(vec.index(0)).toBe('v0');
    expect(vec.index(39)).toBe('v39');
    expect(() => vec.index(40)).toThrow(OutOfRangeError);
  });

  it('should set without touching the original', () => {
    const v1 = PersistentVector.fromList([1, 2, 3]);
    const v2 = v1.set(1, 20);

    expect([...v1]).toEqual([1, 2, 3]);
    expect([...v2]).toEqual([1, 20, 3]);
    expect(v1.set(1, 2)).toBe(v1);
  });

  it('should report bounds failures as results', () => {
    const vec = PersistentVector.fromList(['a']);

    const miss = vec.tryIndex(1);
    expect(miss.ok).toBe(false);
    if (!miss.ok) expect(miss.error.message).toBe('Index 1 out of range [0, 1)');

    const write = vec.trySet(0, 'b');
    expect(write.ok).toBe(true);
    if (write.ok) expect(write.value.elems()).toEqual(['b']);

    expect(vec.trySet(3, 'c').ok).toBe(false);
  });

  it('should traverse elements in order', () => {
    const values = Array.from({ length: 100 }, (_, i) => i * 2);
    expect(PersistentVector.fromList(values).elems()).toEqual(values);
  });
});
