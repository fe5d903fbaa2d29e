import { Int, U128 } from './Integer.js';
import { err, ok } from './types/index.js';
import type { ArithmeticError, Result } from './types/index.js';

/**
 * Compute `floor(a * b / c)` for unsigned 128-bit operands.
 *
 * The product is held exactly, so it never overflows; only a quotient that
 * does not fit back into 128 bits is reported as `Overflow`.
 *
 * @example
 * ```typescript
 * scaledMultiplyDivide(U128.max, 2n, 4n); // { ok: true, value: U128.max / 2n }
 * scaledMultiplyDivide(1n, 1n, 0n); // { ok: false, error: 'DivisionByZero' }
 * ```
 */
export function scaledMultiplyDivide(
  a: bigint,
  b: bigint,
  c: bigint
): Result<bigint, ArithmeticError> {
  if (!Int.fits(U128, a) || !Int.fits(U128, b) || !Int.fits(U128, c)) {
    return err('Overflow');
  }
  if (c === 0n) {
    return err('DivisionByZero');
  }

  const quotient = (a * b) / c;
  if (quotient > U128.max) {
    return err('Overflow');
  }
  return ok(quotient);
}
