import type { IntegerKind } from '../Integer.js';
import type { PerThingType } from '../PerThing.js';

/**
 * Sign of a value, as returned by `Int.signum`
 */
export type Sign = -1n | 0n | 1n;

/**
 * Failure reasons of the widened-arithmetic primitive
 */
export type ArithmeticError = 'Overflow' | 'DivisionByZero';

/**
 * Outcome of a fallible computation that must not throw
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): { readonly ok: true; readonly value: T } => ({
  ok: true,
  value,
});

export const err = <E>(error: E): { readonly ok: false; readonly error: E } => ({
  ok: false,
  error,
});

/**
 * The five definition-time choices of a fixed-point family
 */
export interface FixedPointConfig<Name extends string = string> {
  /** Family name, used in debug output and log lines */
  name: Name;
  /** Signed integer backing the scaled value */
  inner: IntegerKind;
  /** Unsigned integer of the same width as `inner` */
  unsigned: IntegerKind;
  /** Unsigned integer of half the width, holds `inner % div` */
  prevUnsigned: IntegerKind;
  /** Ratio type whose accuracy equals `div`, used by multiply-accumulate */
  perThing: PerThingType;
  /** Scale divisor, a power of ten */
  div: bigint;
  /** Digits after the decimal point; derived from `div` when omitted */
  precision?: number;
}

/**
 * Family configuration after validation
 */
export type ResolvedFixedPointConfig<Name extends string = string> = Readonly<
  Required<FixedPointConfig<Name>>
>;
