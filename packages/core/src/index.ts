/**
 * Persistent collections with structural sharing
 *
 * - HashTrieMap<K, V>     → HAMT-backed persistent map
 * - PersistentVector<T>   → bit-partitioned trie vector with an append tail
 *
 * Every update returns a new version; untouched subtrees are shared with all
 * earlier versions, which stay valid.
 */

import {
  hamtEmpty,
  hamtFromList,
  hamtLookup,
  hamtMember,
  hamtAlter,
  hamtInsert,
  hamtInsertWith,
  hamtUpdate,
  hamtAdjust,
  hamtDelete,
  hamtIter,
  hamtToList,
  hamtKeys,
  hamtElems,
  type HMap,
  type UpdateFn,
  type Maybe,
  type HashFn,
  type KeyEquals,
  type IndexResult,
  type Vec,
  vecEmpty,
  vecFromList,
  vecIndex,
  vecTryIndex,
  vecAppend,
  vecSet,
  vecTrySet,
  vecIter,
  vecElems,
} from './internal';

// =====================================================
// HashTrieMap
// =====================================================

export class HashTrieMap<K, V> implements Iterable<[K, V]> {
  private constructor(private readonly map: HMap<K, V>) {}

  /**
   * An empty map keyed through `hashFn`. Equal keys must hash equally;
   * unequal keys may collide.
   */
  static empty<K, V>(hashFn?: HashFn<K>, equals?: KeyEquals<K>): HashTrieMap<K, V> {
    return new HashTrieMap(hamtEmpty<K, V>(hashFn, equals));
  }

  static fromList<K, V>(
    entries: Iterable<readonly [K, V]>,
    hashFn?: HashFn<K>,
    equals?: KeyEquals<K>
  ): HashTrieMap<K, V> {
    return new HashTrieMap(hamtFromList(entries, hashFn, equals));
  }

  private wrap(map: HMap<K, V>): HashTrieMap<K, V> {
    return map === this.map ? this : new HashTrieMap(map);
  }

  get size(): number {
    return this.map.size;
  }

  /** Underlying trie; read-only access for inspection and verification. */
  get trie(): HMap<K, V> {
    return this.map;
  }

  /** Stored value or undefined; `member` tells a stored `undefined` from absence. */
  lookup(key: K): V | undefined {
    return hamtLookup(this.map, key);
  }

  member(key: K): boolean {
    return hamtMember(this.map, key);
  }

  alter(key: K, updateFn: UpdateFn<V>): HashTrieMap<K, V> {
    return this.wrap(hamtAlter(this.map, key, updateFn));
  }

  insert(key: K, value: V): HashTrieMap<K, V> {
    return this.wrap(hamtInsert(this.map, key, value));
  }

  insertWith(key: K, value: V, combine: (value: V, old: V) => V): HashTrieMap<K, V> {
    return this.wrap(hamtInsertWith(this.map, key, value, combine));
  }

  update(key: K, fn: (value: V) => Maybe<V>): HashTrieMap<K, V> {
    return this.wrap(hamtUpdate(this.map, key, fn));
  }

  adjust(key: K, fn: (value: V) => V): HashTrieMap<K, V> {
    return this.wrap(hamtAdjust(this.map, key, fn));
  }

  delete(key: K): HashTrieMap<K, V> {
    return this.wrap(hamtDelete(this.map, key));
  }

  keys(): K[] {
    return hamtKeys(this.map);
  }

  elems(): V[] {
    return hamtElems(this.map);
  }

  toList(): [K, V][] {
    return hamtToList(this.map);
  }

  [Symbol.iterator](): Iterator<[K, V]> {
    return hamtIter(this.map);
  }
}

// =====================================================
// PersistentVector
// =====================================================

export class PersistentVector<T> implements Iterable<T> {
  private constructor(private readonly vec: Vec<T>) {}

  static empty<T>(): PersistentVector<T> {
    return new PersistentVector(vecEmpty<T>());
  }

  static fromList<T>(values: Iterable<T>): PersistentVector<T> {
    return new PersistentVector(vecFromList(values));
  }

  private wrap(vec: Vec<T>): PersistentVector<T> {
    return vec === this.vec ? this : new PersistentVector(vec);
  }

  get count(): number {
    return this.vec.count;
  }

  /** Underlying trie; read-only access for inspection and verification. */
  get trie(): Vec<T> {
    return this.vec;
  }

  /** @throws OutOfRangeError outside `[0, count)` */
  index(i: number): T {
    return vecIndex(this.vec, i);
  }

  tryIndex(i: number): IndexResult<T> {
    return vecTryIndex(this.vec, i);
  }

  append(value: T): PersistentVector<T> {
    return new PersistentVector(vecAppend(this.vec, value));
  }

  /** @throws OutOfRangeError outside `[0, count)` */
  set(i: number, value: T): PersistentVector<T> {
    return this.wrap(vecSet(this.vec, i, value));
  }

  trySet(i: number, value: T): IndexResult<PersistentVector<T>> {
    const res = vecTrySet(this.vec, i, value);
    return res.ok ? { ok: true, value: this.wrap(res.value) } : res;
  }

  elems(): T[] {
    return vecElems(this.vec);
  }

  [Symbol.iterator](): Iterator<T> {
    return vecIter(this.vec);
  }
}

// Public re-exports
export {
  hashKey,
  keyEquals,
  murmur3,
  popcount,
  bit,
  rank,
  setSlots,
  slotsToMask,
  OutOfRangeError,
  InvariantError,
  type HashFn,
  type KeyEquals,
  type IndexResult,
  type UpdateFn,
  type Some,
  type Maybe,
} from './internal';
