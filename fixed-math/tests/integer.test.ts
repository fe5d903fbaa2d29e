import { describe, it, expect } from 'vitest';
import { I8, I32, I64, I128, Int, U8, U128 } from '../src/Integer.js';

describe('Integer Kinds', () => {
  describe('Bounds', () => {
    it('should derive signed bounds from the width', () => {
      expect(I8.min).toBe(-128n);
      expect(I8.max).toBe(127n);
      expect(I64.min).toBe(-9223372036854775808n);
      expect(I128.max).toBe(2n ** 127n - 1n);
    });

    it('should derive unsigned bounds from the width', () => {
      expect(U8.min).toBe(0n);
      expect(U8.max).toBe(255n);
      expect(U128.max).toBe(2n ** 128n - 1n);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(I32)).toBe(true);
    });
  });

  describe('Range', () => {
    it('should narrow values that fit', () => {
      expect(Int.fits(I8, -128n)).toBe(true);
      expect(Int.tryInto(I8, 127n)).toBe(127n);
    });

    it('should return null for values that do not fit', () => {
      expect(Int.fits(U8, -1n)).toBe(false);
      expect(Int.tryInto(I8, 128n)).toBeNull();
    });

    it('should clamp when saturating', () => {
      expect(Int.saturate(I8, 1000n)).toBe(127n);
      expect(Int.saturate(I8, -1000n)).toBe(-128n);
      expect(Int.saturate(U8, -5n)).toBe(0n);
      expect(Int.saturate(U8, 17n)).toBe(17n);
    });

    it("should wrap in two's complement", () => {
      expect(Int.wrap(I8, 200n)).toBe(-56n);
      expect(Int.wrap(I8, 128n)).toBe(-128n);
      expect(Int.wrap(U8, -1n)).toBe(255n);
      expect(Int.wrap(I32, I32.max + 1n)).toBe(I32.min);
    });
  });

  describe('Sign', () => {
    it('should compute signum', () => {
      expect(Int.signum(42n)).toBe(1n);
      expect(Int.signum(-42n)).toBe(-1n);
      expect(Int.signum(0n)).toBe(0n);
    });

    it('should take the exact absolute value of a signed minimum', () => {
      expect(Int.abs(I64.min)).toBe(2n ** 63n);
      expect(Int.abs(-3n)).toBe(3n);
    });
  });

  describe('Checked', () => {
    it('should return null on overflow', () => {
      expect(Int.checkedAdd(I32, I32.max, 1n)).toBeNull();
      expect(Int.checkedSub(I32, I32.min, 1n)).toBeNull();
      expect(Int.checkedMul(I32, 70_000n, 70_000n)).toBeNull();
    });

    it('should compute in-range results', () => {
      expect(Int.checkedAdd(I32, 2n, 3n)).toBe(5n);
      expect(Int.checkedSub(U8, 3n, 2n)).toBe(1n);
      expect(Int.checkedMul(I32, -7n, 6n)).toBe(-42n);
    });

    it('should truncate division toward zero', () => {
      expect(Int.checkedDiv(I32, 7n, 2n)).toBe(3n);
      expect(Int.checkedDiv(I32, -7n, 2n)).toBe(-3n);
    });

    it('should return null for a zero divisor and MIN / -1', () => {
      expect(Int.checkedDiv(I32, 1n, 0n)).toBeNull();
      expect(Int.checkedDiv(I32, I32.min, -1n)).toBeNull();
    });
  });

  describe('Saturating', () => {
    it('should clamp by the sign of the true result', () => {
      expect(Int.saturatingMul(I32, 70_000n, 70_000n)).toBe(I32.max);
      expect(Int.saturatingMul(I32, -70_000n, 70_000n)).toBe(I32.min);
      expect(Int.saturatingAdd(I8, 100n, 100n)).toBe(127n);
      expect(Int.saturatingSub(U8, 1n, 2n)).toBe(0n);
    });
  });
});
