import { Int, err, ok } from 'fixed-math';
import type { FixedPointLike, FixedPointStatics, Result } from 'fixed-math';

/** The only failure a string codec reports */
export type CodecError = 'invalid string input';

export const INVALID_STRING_INPUT: CodecError = 'invalid string input';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Inner value as a base-10 string
 */
export function getStr(value: FixedPointLike): string {
  return value.inner.toString();
}

/**
 * Parse a base-10 inner value back into a fixed-point value
 * @returns An error when `s` is not an integer or does not fit the inner type
 */
export function tryFromStr<T extends FixedPointLike>(
  type: FixedPointStatics<T>,
  s: string
): Result<T, CodecError> {
  if (!INTEGER_PATTERN.test(s)) {
    return err(INVALID_STRING_INPUT);
  }
  const inner = BigInt(s);
  if (!Int.fits(type.Inner, inner)) {
    return err(INVALID_STRING_INPUT);
  }
  return ok(type.fromInner(inner));
}
