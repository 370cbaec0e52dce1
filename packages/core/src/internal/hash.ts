/**
 * Default key hashing and equality for the hash trie map
 */

// Identity hashes for reference keys
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

export type HashFn<K> = (key: K) => number;
export type KeyEquals<K> = (a: K, b: K) => boolean;

// Scratch view for reading the bits of a double
const F64 = new Float64Array(1);
const F64_WORDS = new Uint32Array(F64.buffer);

// Murmur3 finalizer; a bijection on 32-bit words
function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

// Murmur3 32-bit hash over UTF-16 code units
export function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 2 <= key.length) {
    k = (key.charCodeAt(i) & 0xffff) | ((key.charCodeAt(i + 1) & 0xffff) << 16);
    i += 2;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  if (i < key.length) {
    k = key.charCodeAt(i) & 0xffff;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
  }

  return fmix32(h ^ key.length);
}

// int32 values (and -0) hash by value; every other double by its bit pattern
function hashNumber(n: number): number {
  if ((n | 0) === n) return fmix32(n | 0);
  if (n !== n) return 0x7ff80000;
  F64[0] = n;
  return fmix32(F64_WORDS[0] ^ Math.imul(F64_WORDS[1], 0x9e3779b1));
}

function identityHash(key: object): number {
  let id = OBJ_HASH.get(key);
  if (id === undefined) {
    id = OBJ_SEQ++;
    OBJ_HASH.set(key, id);
  }
  return Math.imul(id, 0x85ebca77) >>> 0;
}

/**
 * Default hash function: structural for primitives, identity for objects,
 * functions and symbols. Consistent with {@link keyEquals}.
 */
export function hashKey(key: unknown): number {
  switch (typeof key) {
    case 'string':
      return murmur3(key);
    case 'number':
      return hashNumber(key);
    case 'boolean':
      return key ? 0x27d4eb2d : 0x165667b1;
    case 'bigint':
      return murmur3(key.toString(), 0x9e3779b1);
    case 'symbol': {
      let id = SYM_HASH.get(key);
      if (id === undefined) {
        id = SYM_SEQ++;
        SYM_HASH.set(key, id);
      }
      return Math.imul(id, 0x9e3779b1) >>> 0;
    }
    case 'function':
      return identityHash(key);
    case 'object':
      if (key === null) return 0x811c9dc5;
      return identityHash(key);
    default:
      return 0x9747b28c;
  }
}

// SameValueZero
export function keyEquals(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}
