/**
 * Fixed Math - Deterministic Fixed-Point Decimal Kernel
 *
 * Integer-backed decimal arithmetic with checked, saturating and raw
 * operation sets. All operations produce identical results regardless of
 * hardware or platform.
 *
 * @packageDocumentation
 */

export {
  // Predefined families
  FixedI32,
  FixedI64,
  FixedI128,
} from './FixedFamilies.js';

export { implementFixed } from './FixedPoint.js';
export type {
  FixedPointClass,
  FixedPointLike,
  FixedPointNumber,
  FixedPointStatics,
} from './FixedPoint.js';

export { I8, I16, I32, I64, I128, U8, U16, U32, U64, U128, Int } from './Integer.js';
export type { IntegerKind } from './Integer.js';

export {
  implementPerThing,
  Percent,
  Permyriad,
  Permill,
  Perbill,
  Perquintill,
} from './PerThing.js';
export type { PerThing, PerThingRatio, PerThingType } from './PerThing.js';

export { scaledMultiplyDivide } from './ScaledMath.js';

export { FIXED_FAMILIES } from './config/defaults.js';
export type { FixedFamilyPreset } from './config/defaults.js';
export { decimalExponent, validateFixedConfig } from './config/validation.js';

export { err, ok } from './types/index.js';
export type {
  ArithmeticError,
  FixedPointConfig,
  ResolvedFixedPointConfig,
  Result,
  Sign,
} from './types/index.js';
