/**
 * Internal modules barrel export
 */

// Constants
export {
  BITS,
  BRANCH_FACTOR,
  MASK,
  HASH_BITS,
  MAX_BITMAP_CHILDREN,
  MIN_FULL_CHILDREN,
} from './constants';

// Bit-index utility
export { popcount, bit, rank, setSlots, slotsToMask, fragment } from './bits';

// Errors
export {
  OutOfRangeError,
  InvariantError,
  invariant,
  type IndexResult,
} from './errors';

// Hashing
export { hashKey, keyEquals, murmur3, type HashFn, type KeyEquals } from './hash';

// Vec (bit-partitioned trie)
export {
  vecEmpty,
  tailOffset,
  vecIndex,
  vecTryIndex,
  vecAppend,
  vecSet,
  vecTrySet,
  vecFromList,
  vecIter,
  vecElems,
  vecVerify,
} from './vec';

// HAMT
export {
  EMPTY,
  hamtEmpty,
  hamtLookup,
  hamtMember,
  hamtAlter,
  hamtInsert,
  hamtInsertWith,
  hamtUpdate,
  hamtAdjust,
  hamtDelete,
  hamtFromList,
  hamtIter,
  hamtToList,
  hamtKeys,
  hamtElems,
  hamtVerify,
  type HEmpty,
  type HLeaf,
  type HCollision,
  type HBitmap,
  type HFull,
  type HChild,
  type HNode,
  type HMap,
  type UpdateFn,
  type Some,
  type Maybe,
} from './hamt';

// Types
export type { Owner, VLeaf, VBody, VNode, Vec } from './types';
