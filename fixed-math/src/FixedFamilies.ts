import { FIXED_FAMILIES } from './config/defaults.js';
import { implementFixed } from './FixedPoint.js';

/** 32-bit family: 4 decimal places, fractional parts via `Permyriad` */
export const FixedI32 = implementFixed(FIXED_FAMILIES.FixedI32);
export type FixedI32 = InstanceType<typeof FixedI32>;

/** 64-bit family: 9 decimal places, fractional parts via `Perbill` */
export const FixedI64 = implementFixed(FIXED_FAMILIES.FixedI64);
export type FixedI64 = InstanceType<typeof FixedI64>;

/** 128-bit family: 18 decimal places, fractional parts via `Perquintill` */
export const FixedI128 = implementFixed(FIXED_FAMILIES.FixedI128);
export type FixedI128 = InstanceType<typeof FixedI128>;
