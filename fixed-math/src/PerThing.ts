/**
 * Per-Thing Ratios
 *
 * Fixed-denominator fractions in `[0, ACCURACY]`. The fixed-point kernel only
 * reads `ACCURACY` and `deconstruct()`, and uses `mulInt` to scale an integer
 * of any width by the fractional part of a fixed-point value.
 *
 * @example
 * ```typescript
 * const quarter = Perbill.fromParts(250_000_000n);
 * quarter.mulInt(1_000n); // 250n
 * ```
 */

import { Int, U16, U32, U64, U8 } from './Integer.js';
import type { IntegerKind } from './Integer.js';

/**
 * Capability a ratio exposes to the fixed-point kernel
 */
export interface PerThingRatio {
  /** Denominator of the ratio */
  readonly accuracy: bigint;
  /** Numerator of the ratio, in `[0, accuracy]` */
  deconstruct(): bigint;
}

export interface PerThing extends PerThingRatio {
  readonly name: string;
  isZero(): boolean;
  isOne(): boolean;
  eq(other: PerThingRatio): boolean;
  /**
   * Scale an integer by this ratio, rounding to the nearest integer (ties
   * toward zero). The magnitude of the result never exceeds `|int|`.
   */
  mulInt(int: bigint): bigint;
}

/**
 * Static side of a ratio type
 */
export interface PerThingType<P extends PerThing = PerThing> {
  readonly NAME: string;
  readonly ACCURACY: bigint;
  readonly Inner: IntegerKind;
  /** Build from a raw numerator, saturating into `[0, ACCURACY]` */
  fromParts(parts: bigint): P;
  zero(): P;
  one(): P;
}

/**
 * Define a ratio type with the given denominator
 * @param name - Type name
 * @param inner - Unsigned integer holding the numerator
 * @param accuracy - Denominator; must fit `inner`
 */
export function implementPerThing<Name extends string>(
  name: Name,
  inner: IntegerKind,
  accuracy: bigint
) {
  if (inner.signed) {
    throw new Error(`Invalid inner type for ${name}: ${inner.name}. Must be unsigned.`);
  }
  if (accuracy <= 0n || accuracy > inner.max) {
    throw new Error(
      `Invalid accuracy for ${name}: ${accuracy}. Must be positive and fit ${inner.name}.`
    );
  }

  return class PerThingImpl implements PerThing {
    static readonly NAME: Name = name;
    static readonly ACCURACY: bigint = accuracy;
    static readonly Inner: IntegerKind = inner;

    readonly name: Name = name;
    readonly accuracy: bigint = accuracy;
    readonly parts: bigint;

    constructor(parts: bigint) {
      this.parts = parts < 0n ? 0n : parts > accuracy ? accuracy : parts;
      Object.freeze(this);
    }

    static fromParts(parts: bigint): PerThingImpl {
      return new PerThingImpl(parts);
    }

    static zero(): PerThingImpl {
      return new PerThingImpl(0n);
    }

    static one(): PerThingImpl {
      return new PerThingImpl(accuracy);
    }

    deconstruct(): bigint {
      return this.parts;
    }

    isZero(): boolean {
      return this.parts === 0n;
    }

    isOne(): boolean {
      return this.parts === accuracy;
    }

    eq(other: PerThingRatio): boolean {
      return other.accuracy === accuracy && other.deconstruct() === this.parts;
    }

    mulInt(int: bigint): bigint {
      const product = Int.abs(int) * this.parts;
      let magnitude = product / accuracy;
      if (product % accuracy > accuracy / 2n) {
        magnitude += 1n;
      }
      return int < 0n ? -magnitude : magnitude;
    }
  };
}

/** Hundredths */
export const Percent = implementPerThing('Percent', U8, 100n);
export type Percent = InstanceType<typeof Percent>;

/** Ten-thousandths (basis points) */
export const Permyriad = implementPerThing('Permyriad', U16, 10_000n);
export type Permyriad = InstanceType<typeof Permyriad>;

/** Millionths */
export const Permill = implementPerThing('Permill', U32, 1_000_000n);
export type Permill = InstanceType<typeof Permill>;

/** Billionths */
export const Perbill = implementPerThing('Perbill', U32, 1_000_000_000n);
export type Perbill = InstanceType<typeof Perbill>;

/** Quintillionths */
export const Perquintill = implementPerThing('Perquintill', U64, 1_000_000_000_000_000_000n);
export type Perquintill = InstanceType<typeof Perquintill>;
