import { describe, it, expect } from 'vitest';
import { U128 } from '../src/Integer.js';
import { scaledMultiplyDivide } from '../src/ScaledMath.js';

describe('scaledMultiplyDivide', () => {
  it('should compute floor(a * b / c)', () => {
    expect(scaledMultiplyDivide(6n, 7n, 3n)).toEqual({ ok: true, value: 14n });
    expect(scaledMultiplyDivide(7n, 1n, 2n)).toEqual({ ok: true, value: 3n });
  });

  it('should not overflow on an intermediate product', () => {
    expect(scaledMultiplyDivide(U128.max, 2n, 4n)).toEqual({ ok: true, value: U128.max / 2n });
    expect(scaledMultiplyDivide(U128.max, U128.max, U128.max)).toEqual({
      ok: true,
      value: U128.max,
    });
  });

  it('should report a result wider than 128 bits', () => {
    expect(scaledMultiplyDivide(U128.max, 2n, 1n)).toEqual({ ok: false, error: 'Overflow' });
  });

  it('should report a zero divisor', () => {
    expect(scaledMultiplyDivide(1n, 1n, 0n)).toEqual({ ok: false, error: 'DivisionByZero' });
  });

  it('should reject operands that are not unsigned 128-bit integers', () => {
    expect(scaledMultiplyDivide(-1n, 1n, 1n)).toEqual({ ok: false, error: 'Overflow' });
    expect(scaledMultiplyDivide(1n, U128.max + 1n, 1n)).toEqual({ ok: false, error: 'Overflow' });
  });
});
