import { describe, it, expect } from 'vitest';
import { FixedI64, FixedI128 } from 'fixed-math';
import { createCodec } from '../src/index.js';

describe('createCodec', () => {
  it('should bind every form to one family', () => {
    const codec = createCodec(FixedI128);
    const quarter = FixedI128.fromRational(1n, 4n);

    expect(codec.debug(quarter)).toBe('FixedI128(0.250000000000000000)');
    expect(codec.getStr(quarter)).toBe('250000000000000000');
    expect(codec.tryFromStr(codec.getStr(quarter))).toEqual({ ok: true, value: quarter });
    expect(codec.fromDecimalString(codec.toDecimalString(quarter))).toEqual({
      ok: true,
      value: quarter,
    });
    expect(codec.fromJSONValue(codec.toJSONValue(quarter))).toEqual(quarter);
    expect(codec.decode(codec.encode(quarter))).toEqual(quarter);
  });

  it('should keep families apart', () => {
    const codec = createCodec(FixedI64);
    expect(codec.toDecimalString(FixedI64.fromRational(1n, 4n))).toBe('0.250000000');
  });
});
