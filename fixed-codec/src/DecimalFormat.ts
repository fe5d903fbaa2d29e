import { Int, err, ok } from 'fixed-math';
import type { FixedPointLike, FixedPointStatics, Result } from 'fixed-math';
import { INVALID_STRING_INPUT } from './StringCodec.js';
import type { CodecError } from './StringCodec.js';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

/**
 * Human-readable decimal form, e.g. `-0.500000000` for a 9-digit family.
 *
 * The fraction is zero-padded to `PRECISION` digits. A negative value whose
 * integer part is zero keeps its sign.
 */
export function toDecimalString<T extends FixedPointLike>(
  type: FixedPointStatics<T>,
  value: T
): string {
  const integral = value.inner / type.DIV;
  const sign = integral === 0n && value.inner < 0n ? '-' : '';
  const fractional = Int.abs(value.inner % type.DIV)
    .toString()
    .padStart(type.PRECISION, '0');
  return `${sign}${integral}.${fractional}`;
}

/**
 * Parse the decimal form exactly.
 *
 * Fewer fraction digits than `PRECISION` are padded; more are rejected, as
 * is any value outside the inner type.
 */
export function fromDecimalString<T extends FixedPointLike>(
  type: FixedPointStatics<T>,
  s: string
): Result<T, CodecError> {
  const match = DECIMAL_PATTERN.exec(s);
  if (match === null) {
    return err(INVALID_STRING_INPUT);
  }
  const [, signText, integralText, fractionalText = ''] = match;
  if (fractionalText.length > type.PRECISION) {
    return err(INVALID_STRING_INPUT);
  }

  const fractional = fractionalText === '' ? 0n : BigInt(fractionalText.padEnd(type.PRECISION, '0'));
  const magnitude = BigInt(integralText) * type.DIV + fractional;
  const inner = signText === '-' ? -magnitude : magnitude;
  if (!Int.fits(type.Inner, inner)) {
    return err(INVALID_STRING_INPUT);
  }
  return ok(type.fromInner(inner));
}

/**
 * Debug form, e.g. `FixedI64(1.500000000)`
 */
export function debug<T extends FixedPointLike>(type: FixedPointStatics<T>, value: T): string {
  return `${type.NAME}(${toDecimalString(type, value)})`;
}
