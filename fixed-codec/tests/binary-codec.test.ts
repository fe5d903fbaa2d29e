import { describe, it, expect } from 'vitest';
import { FixedI32, FixedI64, FixedI128 } from 'fixed-math';
import { decode, encode } from '../src/BinaryCodec.js';

describe('Binary Codec', () => {
  describe('encode', () => {
    it('should write little-endian bytes of the inner width', () => {
      expect(Array.from(encode(FixedI32, FixedI32.fromInner(1n)))).toEqual([1, 0, 0, 0]);
      expect(Array.from(encode(FixedI32, FixedI32.fromInner(0x01020304n)))).toEqual([4, 3, 2, 1]);
      expect(Array.from(encode(FixedI64, FixedI64.one()))).toEqual([0, 202, 154, 59, 0, 0, 0, 0]);
    });

    it("should write negative values in two's complement", () => {
      expect(Array.from(encode(FixedI32, FixedI32.fromInner(-1n)))).toEqual([255, 255, 255, 255]);
      expect(Array.from(encode(FixedI128, FixedI128.fromInner(-2n)))).toEqual([
        254, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255, 255,
      ]);
    });
  });

  describe('decode', () => {
    it('should read values written by encode', () => {
      for (const value of [FixedI32.minValue(), FixedI32.maxValue(), FixedI32.fromInner(-1n)]) {
        expect(decode(FixedI32, encode(FixedI32, value))).toEqual(value);
      }
      for (const value of [FixedI64.minValue(), FixedI64.fromRational(-7n, 3n)]) {
        expect(decode(FixedI64, encode(FixedI64, value))).toEqual(value);
      }
      for (const value of [FixedI128.minValue(), FixedI128.maxValue(), FixedI128.zero()]) {
        expect(decode(FixedI128, encode(FixedI128, value))).toEqual(value);
      }
    });

    it('should reject a buffer of the wrong length', () => {
      expect(() => decode(FixedI64, new Uint8Array(4))).toThrow(
        'Invalid length for FixedI64: 4 bytes. Expected 8.'
      );
    });
  });
});
