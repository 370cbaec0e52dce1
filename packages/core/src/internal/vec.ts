/**
 * Vec - bit-partitioned persistent vector with an append tail
 */

import { BITS, BRANCH_FACTOR, MASK } from './constants';
import { invariant, OutOfRangeError, type IndexResult } from './errors';
import type { Owner, VBody, VLeaf, VNode, Vec } from './types';

function emptyNode<T>(): VBody<T> {
  return { kind: 'body', arr: [] };
}

export function vecEmpty<T>(): Vec<T> {
  return { count: 0, shift: BITS, root: emptyNode<T>(), tail: [] };
}

/** First index held by the tail. */
export function tailOffset(count: number): number {
  return count < BRANCH_FACTOR ? 0 : ((count - 1) >>> BITS) << BITS;
}

function asBody<T>(node: VNode<T>): VBody<T> {
  invariant(node.kind === 'body', 'leaf found above the bottom level');
  return node;
}

function ensureEditableBody<T>(node: VBody<T>, owner: Owner): VBody<T> {
  if (owner && node.owner === owner) return node;
  return { kind: 'body', owner, arr: node.arr.slice() };
}

function inRange(count: number, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < count;
}

// =====================================================
// Read
// =====================================================

function leafFor<T>(vec: Vec<T>, index: number): VLeaf<T> {
  let node = vec.root;
  let level = vec.shift;
  while (node.kind === 'body') {
    node = node.arr[(index >>> level) & MASK];
    level -= BITS;
  }
  return node;
}

function getUnchecked<T>(vec: Vec<T>, index: number): T {
  const off = tailOffset(vec.count);
  if (index >= off) return vec.tail[index - off];
  return leafFor(vec, index).arr[index & MASK];
}

export function vecTryIndex<T>(vec: Vec<T>, index: number): IndexResult<T> {
  if (!inRange(vec.count, index)) {
    return { ok: false, error: new OutOfRangeError(index, vec.count) };
  }
  return { ok: true, value: getUnchecked(vec, index) };
}

export function vecIndex<T>(vec: Vec<T>, index: number): T {
  if (!inRange(vec.count, index)) throw new OutOfRangeError(index, vec.count);
  return getUnchecked(vec, index);
}

// =====================================================
// Append
// =====================================================

function newPath<T>(level: number, node: VNode<T>, owner: Owner): VNode<T> {
  if (level === 0) return node;
  return { kind: 'body', owner, arr: [newPath(level - BITS, node, owner)] };
}

// Hang the full tail under `parent`, creating bodies along the path for index count - 1
function pushTail<T>(
  count: number,
  level: number,
  parent: VBody<T>,
  tailNode: VLeaf<T>,
  owner: Owner
): VBody<T> {
  const subIdx = ((count - 1) >>> level) & MASK;
  let child: VNode<T>;
  if (level === BITS) {
    child = tailNode;
  } else {
    const existing = parent.arr[subIdx];
    child = existing
      ? pushTail(count, level - BITS, asBody(existing), tailNode, owner)
      : newPath(level - BITS, tailNode, owner);
  }
  const editable = ensureEditableBody(parent, owner);
  editable.arr[subIdx] = child;
  return editable;
}

function vecPush<T>(vec: Vec<T>, owner: Owner, value: T): Vec<T> {
  const { count, shift, root, tail } = vec;

  if (count - tailOffset(count) < BRANCH_FACTOR) {
    if (owner && vec.tailOwner === owner) {
      tail.push(value);
      return { count: count + 1, shift, root, tail, tailOwner: owner };
    }
    const newTail = tail.slice();
    newTail.push(value);
    return { count: count + 1, shift, root, tail: newTail, tailOwner: owner };
  }

  const tailNode: VLeaf<T> = { kind: 'leaf', owner, arr: tail };
  let newRoot: VBody<T>;
  let newShift = shift;
  if (count >>> BITS > 1 << shift) {
    newRoot = { kind: 'body', owner, arr: [root, newPath(shift, tailNode, owner)] };
    newShift += BITS;
  } else {
    newRoot = pushTail(count, shift, asBody(root), tailNode, owner);
  }
  return { count: count + 1, shift: newShift, root: newRoot, tail: [value], tailOwner: owner };
}

export function vecAppend<T>(vec: Vec<T>, value: T): Vec<T> {
  return vecPush(vec, undefined, value);
}

// =====================================================
// Set
// =====================================================

function assocPath<T>(node: VNode<T>, level: number, index: number, value: T): VNode<T> {
  const subIdx = (index >>> level) & MASK;
  if (node.kind === 'leaf') {
    const arr = node.arr.slice();
    arr[subIdx] = value;
    return { kind: 'leaf', arr };
  }
  const arr = node.arr.slice();
  arr[subIdx] = assocPath(node.arr[subIdx], level - BITS, index, value);
  return { kind: 'body', arr };
}

function setUnchecked<T>(vec: Vec<T>, index: number, value: T): Vec<T> {
  if (Object.is(getUnchecked(vec, index), value)) return vec;
  const { count, shift, root, tail } = vec;
  const off = tailOffset(count);
  if (index >= off) {
    const newTail = tail.slice();
    newTail[index - off] = value;
    return { count, shift, root, tail: newTail };
  }
  return { count, shift, root: assocPath(root, shift, index, value), tail };
}

export function vecTrySet<T>(vec: Vec<T>, index: number, value: T): IndexResult<Vec<T>> {
  if (!inRange(vec.count, index)) {
    return { ok: false, error: new OutOfRangeError(index, vec.count) };
  }
  return { ok: true, value: setUnchecked(vec, index, value) };
}

export function vecSet<T>(vec: Vec<T>, index: number, value: T): Vec<T> {
  if (!inRange(vec.count, index)) throw new OutOfRangeError(index, vec.count);
  return setUnchecked(vec, index, value);
}

// =====================================================
// Bulk
// =====================================================

export function vecFromList<T>(values: Iterable<T>): Vec<T> {
  const owner: Owner = {};
  let vec = vecEmpty<T>();
  for (const v of values) {
    vec = vecPush(vec, owner, v);
  }
  // Later pushes must copy the tail again
  return { count: vec.count, shift: vec.shift, root: vec.root, tail: vec.tail };
}

export function* vecIter<T>(vec: Vec<T>): IterableIterator<T> {
  yield* iterNode(vec.root);
  yield* vec.tail;
}

function* iterNode<T>(node: VNode<T>): IterableIterator<T> {
  if (node.kind === 'leaf') {
    yield* node.arr;
    return;
  }
  for (const child of node.arr) {
    yield* iterNode(child);
  }
}

export function vecElems<T>(vec: Vec<T>): T[] {
  return [...vecIter(vec)];
}

// =====================================================
// Structural verification
// =====================================================

function verifyNode<T>(node: VNode<T>, level: number): number {
  if (node.kind === 'leaf') {
    invariant(level === 0, 'leaf found above the bottom level');
    invariant(node.arr.length === BRANCH_FACTOR, 'trie leaf not full');
    return node.arr.length;
  }
  invariant(level > 0, 'body found at the bottom level');
  invariant(node.arr.length <= BRANCH_FACTOR, 'body wider than the branch factor');
  let total = 0;
  for (const child of node.arr) {
    invariant(child !== undefined, 'hole in body node');
    total += verifyNode(child, level - BITS);
  }
  return total;
}

/** Throws InvariantError if the vector's shape disagrees with its count. */
export function vecVerify<T>(vec: Vec<T>): void {
  invariant(vec.shift >= BITS && vec.shift % BITS === 0, 'shift not a positive multiple of the fragment width');
  const off = tailOffset(vec.count);
  invariant(vec.tail.length === vec.count - off, 'tail length disagrees with count');
  invariant(verifyNode(vec.root, vec.shift) === off, 'trie holds a different number of elements');
}
