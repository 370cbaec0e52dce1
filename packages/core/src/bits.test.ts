/**
 * Tests for the bit-index helpers
 */

import { describe, it, expect } from 'vitest';
import { popcount, bit, rank, setSlots, slotsToMask, fragment } from './internal';

describe('bit-index utility', () => {
  describe('popcount', () => {
    it('should count set bits', () => {
      expect(popcount(0)).toBe(0);
      expect(popcount(0b1011)).toBe(3);
      expect(popcount(0x80000000)).toBe(1);
      expect(popcount(0xffffffff)).toBe(32);
    });

    it('should treat negative int32 masks as 32-bit patterns', () => {
      expect(popcount(-1)).toBe(32);
      expect(popcount(1 << 31)).toBe(1);
    });
  });

  describe('bit and rank', () => {
    it('should build single-bit masks', () => {
      expect(bit(0)).toBe(1);
      expect(bit(4)).toBe(16);
      expect(bit(31) >>> 0).toBe(0x80000000);
    });

    it('should give the dense position of a slot', () => {
      const mask = 0b10110;
      expect(rank(mask, 0)).toBe(0);
      expect(rank(mask, 1)).toBe(0);
      expect(rank(mask, 2)).toBe(1);
      expect(rank(mask, 4)).toBe(2);
      expect(rank(mask, 5)).toBe(3);
    });

    it('should rank the top slot of a full mask', () => {
      expect(rank(-1, 31)).toBe(31);
    });
  });

  describe('setSlots', () => {
    it('should list set slots in ascending order', () => {
      expect(setSlots(0)).toEqual([]);
      expect(setSlots(0b10110)).toEqual([1, 2, 4]);
      expect(setSlots(bit(31) | 1)).toEqual([0, 31]);
    });

    it('should invert slotsToMask', () => {
      expect(slotsToMask([1, 2, 4])).toBe(0b10110);
      expect(setSlots(slotsToMask([3, 9, 30]))).toEqual([3, 9, 30]);
    });
  });

  describe('fragment', () => {
    it('should slice five bits at a level', () => {
      expect(fragment(0b1111100000, 5)).toBe(31);
      expect(fragment(0b1111100000, 0)).toBe(0);
      expect(fragment(42, 0)).toBe(10);
      expect(fragment(42, 5)).toBe(1);
    });

    it('should read the two top bits at level 30', () => {
      expect(fragment(0xc0000000, 30)).toBe(3);
    });
  });
});
