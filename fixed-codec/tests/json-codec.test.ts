import { describe, it, expect } from 'vitest';
import { FixedI64, FixedI128 } from 'fixed-math';
import { fixedReplacer, fromJSONValue, isFixedPointLike, toJSONValue } from '../src/JsonCodec.js';

describe('JSON Codec', () => {
  it('should write the inner value as a string', () => {
    expect(toJSONValue(FixedI128.maxValue())).toBe('170141183460469231731687303715884105727');
  });

  it('should read a value back', () => {
    expect(fromJSONValue(FixedI64, '1000000000')).toEqual(FixedI64.one());
  });

  it('should throw on anything but an in-range integer string', () => {
    expect(() => fromJSONValue(FixedI64, 5)).toThrow('invalid string input');
    expect(() => fromJSONValue(FixedI64, 'x')).toThrow('invalid string input');
    expect(() => fromJSONValue(FixedI64, '9223372036854775808')).toThrow('invalid string input');
  });

  it('should recognise fixed-point values', () => {
    expect(isFixedPointLike(FixedI64.one())).toBe(true);
    expect(isFixedPointLike({ inner: 1 })).toBe(false);
    expect(isFixedPointLike(null)).toBe(false);
    expect(isFixedPointLike('5')).toBe(false);
  });

  it('should serialise nested values with the replacer', () => {
    const json = JSON.stringify({ fee: FixedI64.one(), count: 1 }, fixedReplacer);
    expect(json).toBe('{"fee":"1000000000","count":1}');

    const parsed: unknown = JSON.parse(json);
    const fee = typeof parsed === 'object' && parsed !== null && 'fee' in parsed ? parsed.fee : null;
    expect(fromJSONValue(FixedI64, fee)).toEqual(FixedI64.one());
  });

  it('should round-trip 128-bit values through JSON', () => {
    const value = FixedI128.minValue();
    const json = JSON.stringify([value], fixedReplacer);
    expect(json).toBe('["-170141183460469231731687303715884105728"]');
  });
});
