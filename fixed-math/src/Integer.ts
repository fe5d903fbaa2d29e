/**
 * Integer Kinds
 *
 * Every integer in the kernel is a `bigint`. A kind describes the fixed-width
 * integer a value stands for, and `Int` implements the checked, saturating and
 * wrapping arithmetic that width would have.
 *
 * @example
 * ```typescript
 * Int.checkedMul(I32, 70_000n, 70_000n); // null
 * Int.saturatingMul(I32, 70_000n, 70_000n); // 2147483647n
 * Int.wrap(I8, 200n); // -56n
 * ```
 */

import type { Sign } from './types/index.js';

/**
 * Fixed-width integer descriptor
 */
export interface IntegerKind {
  readonly name: string;
  readonly bits: number;
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
}

function defineInteger(name: string, bits: number, signed: boolean): IntegerKind {
  const width = BigInt(bits);
  return Object.freeze({
    name,
    bits,
    signed,
    min: signed ? -(1n << (width - 1n)) : 0n,
    max: signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n,
  });
}

export const I8 = defineInteger('i8', 8, true);
export const I16 = defineInteger('i16', 16, true);
export const I32 = defineInteger('i32', 32, true);
export const I64 = defineInteger('i64', 64, true);
export const I128 = defineInteger('i128', 128, true);

export const U8 = defineInteger('u8', 8, false);
export const U16 = defineInteger('u16', 16, false);
export const U32 = defineInteger('u32', 32, false);
export const U64 = defineInteger('u64', 64, false);
export const U128 = defineInteger('u128', 128, false);

/**
 * Int - integer arithmetic at a given width
 */
export const Int = {
  // ============ Range ============

  /** Whether `value` is representable in `kind` */
  fits: (kind: IntegerKind, value: bigint): boolean =>
    value >= kind.min && value <= kind.max,

  /** Narrow into `kind`, or null when out of range */
  tryInto: (kind: IntegerKind, value: bigint): bigint | null =>
    Int.fits(kind, value) ? value : null,

  /** Narrow into `kind`, clamping to its bounds */
  saturate: (kind: IntegerKind, value: bigint): bigint => {
    if (value > kind.max) {
      return kind.max;
    }
    if (value < kind.min) {
      return kind.min;
    }
    return value;
  },

  /** Two's-complement truncation to `kind` */
  wrap: (kind: IntegerKind, value: bigint): bigint =>
    kind.signed ? BigInt.asIntN(kind.bits, value) : BigInt.asUintN(kind.bits, value),

  // ============ Sign ============

  signum: (value: bigint): Sign => {
    if (value > 0n) {
      return 1n;
    }
    if (value < 0n) {
      return -1n;
    }
    return 0n;
  },

  /** Absolute value; exact for every kind, including the signed minimum */
  abs: (value: bigint): bigint => (value < 0n ? -value : value),

  // ============ Checked ============

  checkedAdd: (kind: IntegerKind, a: bigint, b: bigint): bigint | null =>
    Int.tryInto(kind, a + b),

  checkedSub: (kind: IntegerKind, a: bigint, b: bigint): bigint | null =>
    Int.tryInto(kind, a - b),

  checkedMul: (kind: IntegerKind, a: bigint, b: bigint): bigint | null =>
    Int.tryInto(kind, a * b),

  /** Truncating division; null on a zero divisor or `MIN / -1` */
  checkedDiv: (kind: IntegerKind, a: bigint, b: bigint): bigint | null =>
    b === 0n ? null : Int.tryInto(kind, a / b),

  // ============ Saturating ============

  saturatingAdd: (kind: IntegerKind, a: bigint, b: bigint): bigint =>
    Int.saturate(kind, a + b),

  saturatingSub: (kind: IntegerKind, a: bigint, b: bigint): bigint =>
    Int.saturate(kind, a - b),

  saturatingMul: (kind: IntegerKind, a: bigint, b: bigint): bigint =>
    Int.saturate(kind, a * b),
};
