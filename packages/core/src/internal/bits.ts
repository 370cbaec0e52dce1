/**
 * Bit-index helpers for bitmap-indexed nodes
 */

import { MASK } from './constants';

// SWAR population count
export function popcount(n: number): number {
  n = n - ((n >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return Math.imul((n + (n >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24;
}

export function bit(slot: number): number {
  return 1 << slot;
}

/** Dense array position of `slot` in a node whose presence mask is `mask`. */
export function rank(mask: number, slot: number): number {
  return popcount(mask & (bit(slot) - 1));
}

export function setSlots(mask: number): number[] {
  const slots: number[] = [];
  let m = mask | 0;
  while (m !== 0) {
    const low = m & -m;
    slots.push(31 - Math.clz32(low));
    m ^= low;
  }
  return slots;
}

export function slotsToMask(slots: Iterable<number>): number {
  let mask = 0;
  for (const slot of slots) mask |= bit(slot);
  return mask;
}

/** 5-bit slice of a hash or index starting at bit `level`. */
export function fragment(hash: number, level: number): number {
  return (hash >>> level) & MASK;
}
