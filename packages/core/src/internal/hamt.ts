/**
 * HAMT - Hash Array Mapped Trie
 * Bitmap-indexed trie with dense nodes and full-hash collision buckets
 */

import {
  BITS,
  BRANCH_FACTOR,
  HASH_BITS,
  MAX_BITMAP_CHILDREN,
  MIN_FULL_CHILDREN,
} from './constants';
import { bit, fragment, popcount, rank, setSlots } from './bits';
import { invariant } from './errors';
import { hashKey, keyEquals, type HashFn, type KeyEquals } from './hash';

// Types
export interface HEmpty {
  readonly kind: 'empty';
}

export interface HLeaf<K, V> {
  readonly kind: 'leaf';
  readonly hash: number;
  readonly key: K;
  readonly value: V;
}

export interface HCollision<K, V> {
  readonly kind: 'collision';
  readonly hash: number;
  readonly entries: readonly HLeaf<K, V>[];
}

export interface HBitmap<K, V> {
  readonly kind: 'bitmap';
  readonly bitmap: number;
  readonly children: readonly HChild<K, V>[];
}

export interface HFull<K, V> {
  readonly kind: 'full';
  readonly count: number;
  readonly children: readonly HNode<K, V>[];
}

export type HChild<K, V> = HLeaf<K, V> | HCollision<K, V> | HBitmap<K, V> | HFull<K, V>;
export type HNode<K, V> = HEmpty | HChild<K, V>;

export interface HMap<K, V> {
  readonly hashFn: HashFn<K>;
  readonly equals: KeyEquals<K>;
  readonly root: HNode<K, V>;
  readonly size: number;
}

/** A present value. Boxed so that `undefined` itself can be stored. */
export interface Some<V> {
  readonly value: V;
}

export type Maybe<V> = Some<V> | undefined;

/** Receives the current entry (undefined when absent); returning undefined removes the key. */
export type UpdateFn<V> = (current: Maybe<V>) => Maybe<V>;

type Change = 'added' | 'removed' | 'modified';

export const EMPTY: HEmpty = { kind: 'empty' };

function leaf<K, V>(hash: number, key: K, value: V): HLeaf<K, V> {
  return { kind: 'leaf', hash, key, value };
}

function hashOf<K, V>(map: HMap<K, V>, key: K): number {
  return map.hashFn(key) >>> 0;
}

export function hamtEmpty<K, V>(
  hashFn: HashFn<K> = hashKey,
  equals: KeyEquals<K> = keyEquals
): HMap<K, V> {
  return { hashFn, equals, root: EMPTY, size: 0 };
}

// Alteration of an absent key: a new leaf, or nothing
function materialize<K, V>(hash: number, key: K, fn: UpdateFn<V>): HLeaf<K, V> | undefined {
  const next = fn(undefined);
  return next === undefined ? undefined : leaf(hash, key, next.value);
}

function entriesOf<K, V>(node: HLeaf<K, V> | HCollision<K, V>): readonly HLeaf<K, V>[] {
  return node.kind === 'leaf' ? [node] : node.entries;
}

/**
 * Place two entry nodes that now share a parent at `level`. Fragments are
 * consumed until they differ; once the hash is exhausted both go into one
 * collision bucket.
 */
function combine<K, V>(
  level: number,
  a: HLeaf<K, V> | HCollision<K, V>,
  b: HLeaf<K, V> | HCollision<K, V>
): HChild<K, V> {
  if (level >= HASH_BITS) {
    invariant(a.hash === b.hash, 'entries below the last fragment must share a hash');
    return { kind: 'collision', hash: a.hash, entries: [...entriesOf(a), ...entriesOf(b)] };
  }

  const fa = fragment(a.hash, level);
  const fb = fragment(b.hash, level);
  if (fa === fb) {
    return {
      kind: 'bitmap',
      bitmap: bit(fa),
      children: [combine(level + BITS, a, b)],
    };
  }
  return {
    kind: 'bitmap',
    bitmap: bit(fa) | bit(fb),
    children: fa < fb ? [a, b] : [b, a],
  };
}

function alterCollision<K, V>(
  node: HCollision<K, V>,
  hash: number,
  key: K,
  fn: UpdateFn<V>,
  eq: KeyEquals<K>
): HNode<K, V> {
  // Buckets sit below the last fragment, so any key reaching one shares its hash
  invariant(node.hash === hash, 'key routed to a collision bucket of another hash');

  const entries = node.entries;
  let idx = -1;
  for (let i = 0; i < entries.length; i++) {
    if (eq(entries[i].key, key)) {
      idx = i;
      break;
    }
  }

  if (idx === -1) {
    const added = materialize(hash, key, fn);
    if (!added) return node;
    return { kind: 'collision', hash, entries: [...entries, added] };
  }

  const existing = entries[idx];
  const next = fn(existing);
  if (next === undefined) {
    if (entries.length === 2) return entries[1 - idx];
    const newEntries = entries.slice();
    newEntries.splice(idx, 1);
    return { kind: 'collision', hash, entries: newEntries };
  }
  if (Object.is(next.value, existing.value)) return node;

  const newEntries = entries.slice();
  newEntries[idx] = leaf(hash, existing.key, next.value);
  return { kind: 'collision', hash, entries: newEntries };
}

function expandBitmap<K, V>(bitmap: number, children: readonly HChild<K, V>[]): HFull<K, V> {
  const slots = new Array<HNode<K, V>>(BRANCH_FACTOR).fill(EMPTY);
  setSlots(bitmap).forEach((slot, i) => {
    slots[slot] = children[i];
  });
  return { kind: 'full', count: children.length, children: slots };
}

function packFull<K, V>(children: readonly HNode<K, V>[]): HBitmap<K, V> {
  let bitmap = 0;
  const packed: HChild<K, V>[] = [];
  for (let i = 0; i < BRANCH_FACTOR; i++) {
    const child = children[i];
    if (child.kind !== 'empty') {
      bitmap |= bit(i);
      packed.push(child);
    }
  }
  return { kind: 'bitmap', bitmap, children: packed };
}

function alterBitmap<K, V>(
  node: HBitmap<K, V>,
  level: number,
  hash: number,
  key: K,
  fn: UpdateFn<V>,
  eq: KeyEquals<K>
): HNode<K, V> {
  const frag = fragment(hash, level);
  const b = bit(frag);
  const exists = (node.bitmap & b) !== 0;
  const idx = rank(node.bitmap, frag);
  const child: HNode<K, V> = exists ? node.children[idx] : EMPTY;
  const next = alterNode(child, level + BITS, hash, key, fn, eq);
  if (next === child) return node;

  let change: Change;
  let bitmap = node.bitmap;
  let children: HChild<K, V>[];
  if (next.kind === 'empty') {
    change = 'removed';
    bitmap &= ~b;
    children = node.children.slice();
    children.splice(idx, 1);
  } else if (exists) {
    change = 'modified';
    children = node.children.slice();
    children[idx] = next;
  } else {
    change = 'added';
    bitmap |= b;
    children = node.children.slice();
    children.splice(idx, 0, next);
  }

  if (bitmap === 0) return EMPTY;
  if (children.length === 1 && children[0].kind === 'leaf') return children[0];
  if (change === 'added' && children.length > MAX_BITMAP_CHILDREN) {
    return expandBitmap(bitmap, children);
  }
  return { kind: 'bitmap', bitmap, children };
}

function alterFull<K, V>(
  node: HFull<K, V>,
  level: number,
  hash: number,
  key: K,
  fn: UpdateFn<V>,
  eq: KeyEquals<K>
): HNode<K, V> {
  const frag = fragment(hash, level);
  const child = node.children[frag];
  const next = alterNode(child, level + BITS, hash, key, fn, eq);
  if (next === child) return node;

  const count =
    node.count + (child.kind === 'empty' ? 1 : 0) - (next.kind === 'empty' ? 1 : 0);
  const children = node.children.slice();
  children[frag] = next;
  if (count < MIN_FULL_CHILDREN) return packFull(children);
  return { kind: 'full', count, children };
}

function alterNode<K, V>(
  node: HNode<K, V>,
  level: number,
  hash: number,
  key: K,
  fn: UpdateFn<V>,
  eq: KeyEquals<K>
): HNode<K, V> {
  switch (node.kind) {
    case 'empty':
      return materialize(hash, key, fn) ?? node;

    case 'leaf': {
      if (node.hash === hash && eq(node.key, key)) {
        const next = fn(node);
        if (next === undefined) return EMPTY;
        return Object.is(next.value, node.value) ? node : leaf(hash, node.key, next.value);
      }
      const added = materialize(hash, key, fn);
      return added ? combine(level, node, added) : node;
    }

    case 'collision':
      return alterCollision(node, hash, key, fn, eq);

    case 'bitmap':
      return alterBitmap(node, level, hash, key, fn, eq);

    case 'full':
      return alterFull(node, level, hash, key, fn, eq);
  }
}

function findLeaf<K, V>(map: HMap<K, V>, key: K): HLeaf<K, V> | undefined {
  const hash = hashOf(map, key);
  const eq = map.equals;
  let node = map.root;
  let level = 0;

  for (;;) {
    switch (node.kind) {
      case 'empty':
        return undefined;
      case 'leaf':
        return node.hash === hash && eq(node.key, key) ? node : undefined;
      case 'collision':
        if (node.hash !== hash) return undefined;
        return node.entries.find((entry) => eq(entry.key, key));
      case 'bitmap': {
        const frag = fragment(hash, level);
        if ((node.bitmap & bit(frag)) === 0) return undefined;
        node = node.children[rank(node.bitmap, frag)];
        break;
      }
      case 'full':
        node = node.children[fragment(hash, level)];
        break;
    }
    level += BITS;
  }
}

/** The stored value, or undefined. A stored `undefined` is told apart by {@link hamtMember}. */
export function hamtLookup<K, V>(map: HMap<K, V>, key: K): V | undefined {
  return findLeaf(map, key)?.value;
}

export function hamtMember<K, V>(map: HMap<K, V>, key: K): boolean {
  return findLeaf(map, key) !== undefined;
}

/**
 * General update primitive. Every other mutator goes through here.
 * Returns `map` itself when nothing changed.
 */
export function hamtAlter<K, V>(map: HMap<K, V>, key: K, updateFn: UpdateFn<V>): HMap<K, V> {
  const probe = { existed: false, present: false };
  const root = alterNode(
    map.root,
    0,
    hashOf(map, key),
    key,
    (current) => {
      probe.existed = current !== undefined;
      const next = updateFn(current);
      probe.present = next !== undefined;
      return next;
    },
    map.equals
  );
  if (root === map.root) return map;
  return {
    hashFn: map.hashFn,
    equals: map.equals,
    root,
    size: map.size + (probe.present ? 1 : 0) - (probe.existed ? 1 : 0),
  };
}

/** Inserts `value`; an existing `old` for the key becomes `combineFn(value, old)`. */
export function hamtInsertWith<K, V>(
  map: HMap<K, V>,
  key: K,
  value: V,
  combineFn: (value: V, old: V) => V
): HMap<K, V> {
  return hamtAlter(map, key, (current) => ({
    value: current === undefined ? value : combineFn(value, current.value),
  }));
}

export function hamtInsert<K, V>(map: HMap<K, V>, key: K, value: V): HMap<K, V> {
  return hamtInsertWith(map, key, value, (v) => v);
}

export function hamtUpdate<K, V>(
  map: HMap<K, V>,
  key: K,
  fn: (value: V) => Maybe<V>
): HMap<K, V> {
  return hamtAlter(map, key, (current) => (current === undefined ? undefined : fn(current.value)));
}

export function hamtAdjust<K, V>(map: HMap<K, V>, key: K, fn: (value: V) => V): HMap<K, V> {
  return hamtUpdate(map, key, (value) => ({ value: fn(value) }));
}

export function hamtDelete<K, V>(map: HMap<K, V>, key: K): HMap<K, V> {
  return hamtAlter(map, key, () => undefined);
}

export function hamtFromList<K, V>(
  entries: Iterable<readonly [K, V]>,
  hashFn: HashFn<K> = hashKey,
  equals: KeyEquals<K> = keyEquals
): HMap<K, V> {
  let map = hamtEmpty<K, V>(hashFn, equals);
  for (const [k, v] of entries) {
    map = hamtInsert(map, k, v);
  }
  return map;
}

export function* hamtIter<K, V>(map: HMap<K, V>): IterableIterator<[K, V]> {
  const stack: HNode<K, V>[] = [map.root];
  let node: HNode<K, V> | undefined;
  while ((node = stack.pop()) !== undefined) {
    switch (node.kind) {
      case 'empty':
        break;
      case 'leaf':
        yield [node.key, node.value];
        break;
      case 'collision':
        for (const entry of node.entries) {
          yield [entry.key, entry.value];
        }
        break;
      default: {
        const children = node.children;
        for (let i = children.length - 1; i >= 0; i--) {
          stack.push(children[i]);
        }
      }
    }
  }
}

export function hamtToList<K, V>(map: HMap<K, V>): [K, V][] {
  return [...hamtIter(map)];
}

export function hamtKeys<K, V>(map: HMap<K, V>): K[] {
  const keys: K[] = [];
  for (const [k] of hamtIter(map)) keys.push(k);
  return keys;
}

export function hamtElems<K, V>(map: HMap<K, V>): V[] {
  const values: V[] = [];
  for (const [, v] of hamtIter(map)) values.push(v);
  return values;
}

// =====================================================
// Structural verification
// =====================================================

function pathMatches(hash: number, level: number, prefix: number): boolean {
  if (level >= HASH_BITS) return hash === prefix >>> 0;
  return ((hash & (bit(level) - 1)) >>> 0) === prefix >>> 0;
}

function verifyEntry<K, V>(map: HMap<K, V>, entry: HLeaf<K, V>, level: number, prefix: number): void {
  invariant(hashOf(map, entry.key) === entry.hash, 'leaf hash differs from its key hash');
  invariant(pathMatches(entry.hash, level, prefix), 'leaf stored off its hash path');
}

function verifyNode<K, V>(map: HMap<K, V>, node: HChild<K, V>, level: number, prefix: number): number {
  switch (node.kind) {
    case 'leaf':
      verifyEntry(map, node, level, prefix);
      return 1;

    case 'collision': {
      invariant(level >= HASH_BITS, 'collision bucket above the last fragment');
      const { hash, entries } = node;
      invariant(entries.length >= 2, 'collision bucket with fewer than two entries');
      entries.forEach((entry, i) => {
        invariant(entry.hash === hash, 'collision entry with a different hash');
        verifyEntry(map, entry, level, prefix);
        for (let j = i + 1; j < entries.length; j++) {
          invariant(!map.equals(entry.key, entries[j].key), 'duplicate key in collision bucket');
        }
      });
      return entries.length;
    }

    case 'bitmap': {
      invariant(level < HASH_BITS, 'bitmap node below the last fragment');
      invariant(node.bitmap !== 0, 'bitmap node with an empty mask');
      invariant(node.children.length === popcount(node.bitmap), 'bitmap children do not match mask');
      invariant(node.children.length <= MAX_BITMAP_CHILDREN, 'bitmap node above promotion threshold');
      invariant(
        !(node.children.length === 1 && node.children[0].kind === 'leaf'),
        'bitmap node holding a single leaf'
      );
      const children = node.children;
      let total = 0;
      setSlots(node.bitmap).forEach((slot, i) => {
        total += verifyNode(map, children[i], level + BITS, prefix | (slot << level));
      });
      return total;
    }

    case 'full': {
      invariant(level < HASH_BITS, 'full node below the last fragment');
      invariant(node.children.length === BRANCH_FACTOR, 'full node without 32 slots');
      let live = 0;
      let total = 0;
      node.children.forEach((child, slot) => {
        if (child.kind === 'empty') return;
        live++;
        total += verifyNode(map, child, level + BITS, prefix | (slot << level));
      });
      invariant(live === node.count, 'full node count does not match live slots');
      invariant(live >= MIN_FULL_CHILDREN, 'full node below demotion threshold');
      return total;
    }
  }
}

/** Throws InvariantError if any node breaks a representation invariant. */
export function hamtVerify<K, V>(map: HMap<K, V>): void {
  const total = map.root.kind === 'empty' ? 0 : verifyNode(map, map.root, 0, 0);
  invariant(total === map.size, 'tracked size differs from stored entries');
}
