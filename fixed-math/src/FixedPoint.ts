/**
 * Fixed-Point Number Families
 *
 * Provides deterministic decimal fixed-point arithmetic. A value is a signed
 * integer of a fixed width (`inner`) standing for `inner / DIV`; every
 * operation is a pure function of its operands, so all platforms produce
 * identical results.
 *
 * Three operation sets live side by side:
 *
 * - checked (`checked*`): return `null` on overflow or division by zero
 * - saturating (`saturating*`): clamp to `minValue()` / `maxValue()` by the
 *   sign of the true result
 * - raw (`add`, `sub`, `mul`, `div`, `fromRational`): unchecked, the caller
 *   asserts the operands are in a safe range. Overflow wraps at the inner
 *   width and a zero divisor throws the runtime's `RangeError`.
 *
 * @example
 * ```typescript
 * import { FixedI64 } from 'fixed-math';
 *
 * const price = FixedI64.fromRational(5n, 2n); // 2.5
 * const total = price.saturatingMulInt(10n); // 25n
 *
 * FixedI64.maxValue().checkedAdd(FixedI64.one()); // null
 * FixedI64.maxValue().saturatingAdd(FixedI64.one()); // maxValue()
 * ```
 */

import { validateFixedConfig } from './config/validation.js';
import { Int } from './Integer.js';
import type { IntegerKind } from './Integer.js';
import type { PerThingRatio, PerThingType } from './PerThing.js';
import { scaledMultiplyDivide } from './ScaledMath.js';
import type { FixedPointConfig } from './types/index.js';

/**
 * Instance surface shared by every family
 */
export interface FixedPointLike {
  readonly name: string;
  readonly inner: bigint;
}

/**
 * Static surface shared by every family
 */
export interface FixedPointStatics<T extends FixedPointLike> {
  readonly NAME: string;
  readonly DIV: bigint;
  readonly PRECISION: number;
  readonly Inner: IntegerKind;
  fromInner(inner: bigint): T;
}

/**
 * `x * y / d` truncated toward zero and narrowed into `kind`.
 *
 * Signs are combined separately and the magnitudes go through
 * `scaledMultiplyDivide`, so the product never overflows and the magnitude
 * of a signed minimum is exact.
 */
function signedMultiplyDivide(
  kind: IntegerKind,
  x: bigint,
  y: bigint,
  d: bigint
): bigint | null {
  const sign = Int.signum(x) * Int.signum(y) * Int.signum(d);
  const magnitude = scaledMultiplyDivide(Int.abs(x), Int.abs(y), Int.abs(d));
  if (!magnitude.ok) {
    return null;
  }
  return Int.tryInto(kind, sign * magnitude.value);
}

/**
 * Define a fixed-point family.
 *
 * The configuration is validated once; an invalid one throws.
 * @param userConfig - Inner, unsigned and half-width kinds, ratio type and divisor
 */
export function implementFixed<Name extends string>(userConfig: FixedPointConfig<Name>) {
  const config = validateFixedConfig(userConfig);
  const { name, inner: INNER, div: DIV, perThing: PER_THING } = config;

  class Fixed implements FixedPointLike {
    static readonly NAME: Name = name;
    static readonly DIV: bigint = DIV;
    static readonly PRECISION: number = config.precision;
    static readonly Inner: IntegerKind = INNER;
    static readonly Unsigned: IntegerKind = config.unsigned;
    static readonly PrevUnsigned: IntegerKind = config.prevUnsigned;
    static readonly PerThing: PerThingType = PER_THING;

    readonly name: Name = name;
    readonly inner: bigint;

    /**
     * @param inner - Scaled value; throws a `RangeError` when it does not fit the inner type
     */
    constructor(inner: bigint) {
      if (!Int.fits(INNER, inner)) {
        throw new RangeError(
          `Invalid inner value for ${name}: ${inner}. Must fit ${INNER.name}.`
        );
      }
      this.inner = inner;
      Object.freeze(this);
    }

    // ============ Creation ============

    /** Wrap an already scaled value */
    static fromInner(inner: bigint): Fixed {
      return new Fixed(inner);
    }

    /** `int * DIV`, saturating at the inner bounds */
    static fromInteger(int: bigint): Fixed {
      return new Fixed(Int.saturate(INNER, int * DIV));
    }

    /** `int * DIV`, or null when it does not fit */
    static checkedFromInteger(int: bigint): Fixed | null {
      return lift(Int.tryInto(INNER, int * DIV));
    }

    /**
     * Convert a whole number of units, saturating like `fromInteger`
     * @param value - A bigint, or a number that is a safe integer
     */
    static from(value: bigint | number): Fixed {
      if (typeof value === 'number' && !Number.isSafeInteger(value)) {
        throw new RangeError(`Invalid integer for ${name}: ${value}. Must be a safe integer.`);
      }
      return Fixed.fromInteger(BigInt(value));
    }

    /**
     * `n / d`, unchecked.
     *
     * `n` saturates into the inner type, then `(n * DIV) / d` is computed at
     * the inner width, wrapping on overflow. The caller must ensure `d !== 0n`;
     * a zero divisor throws a `RangeError`. Use `checkedFromRational` otherwise.
     */
    static fromRational(n: bigint, d: bigint): Fixed {
      const numerator = Int.saturate(INNER, n);
      return new Fixed(Int.wrap(INNER, Int.wrap(INNER, numerator * DIV) / d));
    }

    /** `n / d`, or null on a zero divisor or any overflow */
    static checkedFromRational(n: bigint, d: bigint): Fixed | null {
      if (d === 0n || !Int.fits(INNER, d)) {
        return null;
      }
      const numerator = Int.tryInto(INNER, n);
      if (numerator === null) {
        return null;
      }
      const scaled = Int.checkedMul(INNER, numerator, DIV);
      if (scaled === null) {
        return null;
      }
      return lift(Int.checkedDiv(INNER, scaled, d));
    }

    /**
     * Convert a ratio, falling back to `maxValue()` when its value does not
     * fit this family (e.g. a high-accuracy ratio into a narrow family)
     */
    static fromPerThing(ratio: PerThingRatio): Fixed {
      const value = Int.saturate(INNER, ratio.deconstruct());
      const accuracy = Int.saturate(INNER, ratio.accuracy);
      const fixed = Fixed.checkedFromRational(value, accuracy);
      if (fixed === null) {
        console.warn(
          `[FIXED] ${name}: ratio ${value}/${accuracy} does not fit, saturating to max`
        );
        return Fixed.maxValue();
      }
      return fixed;
    }

    // ============ Constants ============

    static zero(): Fixed {
      return new Fixed(0n);
    }

    static one(): Fixed {
      return new Fixed(DIV);
    }

    /** Raw inner minimum, not rescaled */
    static minValue(): Fixed {
      return new Fixed(INNER.min);
    }

    /** Raw inner maximum, not rescaled */
    static maxValue(): Fixed {
      return new Fixed(INNER.max);
    }

    static accuracy(): bigint {
      return DIV;
    }

    // ============ Accessors & Comparison ============

    intoInner(): bigint {
      return this.inner;
    }

    isZero(): boolean {
      return this.inner === 0n;
    }

    isPositive(): boolean {
      return this.inner > 0n;
    }

    isNegative(): boolean {
      return this.inner < 0n;
    }

    eq(rhs: Fixed): boolean {
      return this.inner === rhs.inner;
    }

    lt(rhs: Fixed): boolean {
      return this.inner < rhs.inner;
    }

    lte(rhs: Fixed): boolean {
      return this.inner <= rhs.inner;
    }

    gt(rhs: Fixed): boolean {
      return this.inner > rhs.inner;
    }

    gte(rhs: Fixed): boolean {
      return this.inner >= rhs.inner;
    }

    // ============ Checked Arithmetic ============

    checkedAdd(rhs: Fixed): Fixed | null {
      return lift(Int.checkedAdd(INNER, this.inner, rhs.inner));
    }

    checkedSub(rhs: Fixed): Fixed | null {
      return lift(Int.checkedSub(INNER, this.inner, rhs.inner));
    }

    checkedMul(rhs: Fixed): Fixed | null {
      return lift(signedMultiplyDivide(INNER, this.inner, rhs.inner, DIV));
    }

    checkedDiv(rhs: Fixed): Fixed | null {
      if (rhs.inner === 0n) {
        return null;
      }
      if (this.inner === 0n) {
        return this;
      }
      // MIN / -1 is the only quotient that does not fit
      if (this.inner === INNER.min && rhs.inner === -DIV) {
        return null;
      }
      return lift(signedMultiplyDivide(INNER, this.inner, DIV, rhs.inner));
    }

    // ============ Saturating Arithmetic ============

    saturatingAdd(rhs: Fixed): Fixed {
      return new Fixed(Int.saturatingAdd(INNER, this.inner, rhs.inner));
    }

    saturatingSub(rhs: Fixed): Fixed {
      return new Fixed(Int.saturatingSub(INNER, this.inner, rhs.inner));
    }

    saturatingMul(rhs: Fixed): Fixed {
      const product = this.checkedMul(rhs);
      if (product !== null) {
        return product;
      }
      return Int.signum(this.inner) * Int.signum(rhs.inner) < 0n
        ? Fixed.minValue()
        : Fixed.maxValue();
    }

    /** Absolute value; the minimum maps to `maxValue()` */
    saturatingAbs(): Fixed {
      if (this.inner === INNER.min) {
        return Fixed.maxValue();
      }
      return this.inner < 0n ? new Fixed(-this.inner) : this;
    }

    /**
     * Raise to a non-negative integer power by binary exponentiation,
     * saturating at every multiplication
     */
    saturatingPow(exp: number): Fixed {
      if (!Number.isSafeInteger(exp) || exp < 0) {
        throw new RangeError(`Invalid exponent: ${exp}. Must be a non-negative integer.`);
      }
      if (exp === 0) {
        return Fixed.one();
      }

      let result = Fixed.one();
      let base: Fixed = this;
      let remaining = exp;
      while (remaining > 0) {
        if (remaining % 2 === 1) {
          result = result.saturatingMul(base);
        }
        base = base.saturatingMul(base);
        remaining = Math.floor(remaining / 2);
      }
      return result;
    }

    // ============ Raw Arithmetic (unchecked) ============

    /** Unchecked: wraps on overflow */
    add(rhs: Fixed): Fixed {
      return new Fixed(Int.wrap(INNER, this.inner + rhs.inner));
    }

    /** Unchecked: wraps on overflow */
    sub(rhs: Fixed): Fixed {
      return new Fixed(Int.wrap(INNER, this.inner - rhs.inner));
    }

    /** Unchecked: the product is kept at the inner width and wraps */
    mul(rhs: Fixed): Fixed {
      return new Fixed(Int.wrap(INNER, this.inner * rhs.inner) / DIV);
    }

    /** Unchecked: wraps on overflow, throws a `RangeError` on a zero divisor */
    div(rhs: Fixed): Fixed {
      return new Fixed(Int.wrap(INNER, Int.wrap(INNER, this.inner * DIV) / rhs.inner));
    }

    // ============ Integer Scaling ============

    /**
     * Multiply an integer of kind `kind` by this value, truncating toward zero
     * @returns null when `other` does not fit the inner type or the result does not fit `kind`
     */
    checkedMulInt(other: bigint, kind: IntegerKind = INNER): bigint | null {
      if (!Int.fits(kind, other)) {
        return null;
      }
      const rhs = Int.tryInto(INNER, other);
      if (rhs === null) {
        return null;
      }
      const product = signedMultiplyDivide(INNER, this.inner, rhs, DIV);
      if (product === null) {
        return null;
      }
      return Int.tryInto(kind, product);
    }

    /**
     * Divide this value by an integer of kind `kind`, truncating toward zero
     * @returns null on a zero divisor or when a step does not fit
     */
    checkedDivInt(other: bigint, kind: IntegerKind = INNER): bigint | null {
      if (!Int.fits(kind, other)) {
        return null;
      }
      const rhs = Int.tryInto(INNER, other);
      if (rhs === null) {
        return null;
      }
      const quotient = Int.checkedDiv(INNER, this.inner, rhs);
      if (quotient === null) {
        return null;
      }
      const whole = Int.checkedDiv(INNER, quotient, DIV);
      if (whole === null) {
        return null;
      }
      return Int.tryInto(kind, whole);
    }

    /**
     * `checkedMulInt`, clamped to the bounds of `kind` on failure: the minimum
     * when `signum(other) * signum(this)` is negative, otherwise the maximum
     */
    saturatingMulInt(other: bigint, kind: IntegerKind = INNER): bigint {
      const value = Int.saturate(kind, other);
      const product = this.checkedMulInt(value, kind);
      if (product !== null) {
        return product;
      }
      const sign = Int.signum(Int.saturate(INNER, value)) * Int.signum(this.inner);
      return sign < 0n ? kind.min : kind.max;
    }

    /**
     * `int + this * int`, or `int - |this| * int` for a negative value, where
     * `int` is of an independent kind.
     *
     * The whole part of `|this|` multiplies `int` directly and the fractional
     * part goes through the family's ratio type, so the full-precision product
     * `inner * int` is never formed at any fixed width. Every step saturates
     * within `kind`.
     */
    saturatedMultiplyAccumulate(int: bigint, kind: IntegerKind = INNER): bigint {
      const value = Int.saturate(kind, int);
      const positive = this.inner > 0n;
      // |MIN| is MAX + 1, which a bigint holds exactly
      const parts = Int.abs(this.inner);

      const naturalParts = Int.saturate(kind, parts / DIV);
      const fractionalParts = parts % DIV;

      const n = Int.saturatingMul(kind, value, naturalParts);
      const p = PER_THING.fromParts(fractionalParts).mulInt(value);

      // everything to add to or subtract from `int`
      const excess = Int.saturatingAdd(kind, n, p);

      return positive
        ? Int.saturatingAdd(kind, value, excess)
        : Int.saturatingSub(kind, value, excess);
    }
  }

  function lift(inner: bigint | null): Fixed | null {
    return inner === null ? null : new Fixed(inner);
  }

  return Fixed;
}

/** Class of a fixed-point family */
export type FixedPointClass<Name extends string> = ReturnType<typeof implementFixed<Name>>;

/** Value of a fixed-point family */
export type FixedPointNumber<Name extends string> = InstanceType<FixedPointClass<Name>>;
