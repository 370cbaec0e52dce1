/**
 * Core constants for the trie engines
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const BRANCH_FACTOR = 1 << BITS; // 32
export const MASK = BRANCH_FACTOR - 1;  // 31

// Width of a key hash; fragments run out once a level reaches this
export const HASH_BITS = 32;

// Bitmap → Full promotion (strictly above) and Full → Bitmap demotion (strictly below)
export const MAX_BITMAP_CHILDREN = 16;
export const MIN_FULL_CHILDREN = 8;
