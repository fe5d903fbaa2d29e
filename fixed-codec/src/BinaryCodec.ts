import { Int } from 'fixed-math';
import type { FixedPointLike, FixedPointStatics } from 'fixed-math';

/**
 * Encode the inner value as little-endian two's complement, one byte per
 * 8 bits of the inner type
 */
export function encode<T extends FixedPointLike>(type: FixedPointStatics<T>, value: T): Uint8Array {
  const width = type.Inner.bits / 8;
  const bytes = new Uint8Array(width);
  let rest = BigInt.asUintN(type.Inner.bits, value.inner);
  for (let i = 0; i < width; i++) {
    bytes[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return bytes;
}

/**
 * Decode a value written by `encode`
 * @throws Error when `bytes` is not exactly the inner type's width
 */
export function decode<T extends FixedPointLike>(type: FixedPointStatics<T>, bytes: Uint8Array): T {
  const width = type.Inner.bits / 8;
  if (bytes.length !== width) {
    throw new Error(
      `Invalid length for ${type.NAME}: ${bytes.length} bytes. Expected ${width}.`
    );
  }
  let raw = 0n;
  for (let i = width - 1; i >= 0; i--) {
    raw = (raw << 8n) | BigInt(bytes[i]);
  }
  return type.fromInner(Int.wrap(type.Inner, raw));
}
