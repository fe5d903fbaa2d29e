import { I128, I32, I64, U128, U16, U32, U64 } from '../Integer.js';
import { Perbill, Permyriad, Perquintill } from '../PerThing.js';
import type { FixedPointConfig } from '../types/index.js';

export type FixedFamilyPreset = 'FixedI32' | 'FixedI64' | 'FixedI128';

/**
 * Predefined fixed-point families
 */
export const FIXED_FAMILIES: { [Name in FixedFamilyPreset]: FixedPointConfig<Name> } = {
  FixedI32: {
    name: 'FixedI32',
    inner: I32,
    unsigned: U32,
    prevUnsigned: U16,
    perThing: Permyriad,
    div: 10_000n,
  },
  FixedI64: {
    name: 'FixedI64',
    inner: I64,
    unsigned: U64,
    prevUnsigned: U32,
    perThing: Perbill,
    div: 1_000_000_000n,
  },
  FixedI128: {
    name: 'FixedI128',
    inner: I128,
    unsigned: U128,
    prevUnsigned: U64,
    perThing: Perquintill,
    div: 1_000_000_000_000_000_000n, // 10^18
  },
};
