/**
 * Fixed Codec - String, JSON and binary forms of fixed-point values
 *
 * @packageDocumentation
 */

import type { FixedPointLike, FixedPointStatics } from 'fixed-math';
import { decode, encode } from './BinaryCodec.js';
import { debug, fromDecimalString, toDecimalString } from './DecimalFormat.js';
import { fromJSONValue, toJSONValue } from './JsonCodec.js';
import { getStr, tryFromStr } from './StringCodec.js';

export { decode, encode } from './BinaryCodec.js';
export { debug, fromDecimalString, toDecimalString } from './DecimalFormat.js';
export { fixedReplacer, fromJSONValue, isFixedPointLike, toJSONValue } from './JsonCodec.js';
export { getStr, INVALID_STRING_INPUT, tryFromStr } from './StringCodec.js';
export type { CodecError } from './StringCodec.js';

/**
 * Bind every codec to one family
 *
 * @example
 * ```typescript
 * const codec = createCodec(FixedI128);
 * codec.debug(FixedI128.fromRational(1n, 4n)); // 'FixedI128(0.250000000000000000)'
 * ```
 */
export function createCodec<T extends FixedPointLike>(type: FixedPointStatics<T>) {
  return {
    // ============ Inner String ============
    getStr: (value: T) => getStr(value),
    tryFromStr: (s: string) => tryFromStr(type, s),

    // ============ Decimal String ============
    toDecimalString: (value: T) => toDecimalString(type, value),
    fromDecimalString: (s: string) => fromDecimalString(type, s),
    debug: (value: T) => debug(type, value),

    // ============ JSON ============
    toJSONValue: (value: T) => toJSONValue(value),
    fromJSONValue: (json: unknown) => fromJSONValue(type, json),

    // ============ Binary ============
    encode: (value: T) => encode(type, value),
    decode: (bytes: Uint8Array) => decode(type, bytes),
  };
}
