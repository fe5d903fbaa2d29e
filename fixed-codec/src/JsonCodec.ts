/**
 * JSON form of fixed-point values.
 *
 * Values are written as their inner integer in a string, since a 128-bit
 * inner value does not survive a JSON number.
 *
 * @example
 * ```typescript
 * JSON.stringify({ fee: FixedI64.one() }, fixedReplacer); // '{"fee":"1000000000"}'
 * fromJSONValue(FixedI64, '1000000000'); // FixedI64.one()
 * ```
 */

import type { FixedPointLike, FixedPointStatics } from 'fixed-math';
import { getStr, tryFromStr } from './StringCodec.js';

export function isFixedPointLike(value: unknown): value is FixedPointLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    'inner' in value &&
    typeof value.inner === 'bigint' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export function toJSONValue(value: FixedPointLike): string {
  return getStr(value);
}

/**
 * Read a value written by `toJSONValue`
 * @throws Error when `json` is not a string holding an in-range integer
 */
export function fromJSONValue<T extends FixedPointLike>(
  type: FixedPointStatics<T>,
  json: unknown
): T {
  if (typeof json !== 'string') {
    throw new Error('invalid string input');
  }
  const result = tryFromStr(type, json);
  if (!result.ok) {
    throw new Error(result.error);
  }
  return result.value;
}

/**
 * `JSON.stringify` replacer writing every fixed-point value in its JSON form
 */
export function fixedReplacer(_key: string, value: unknown): unknown {
  return isFixedPointLike(value) ? toJSONValue(value) : value;
}
