import type { FixedPointConfig, ResolvedFixedPointConfig } from '../types/index.js';

/**
 * Exponent `k` such that `value === 10^k`, or null when `value` is not a power of ten
 */
export function decimalExponent(value: bigint): number | null {
  if (value <= 0n) {
    return null;
  }
  let exponent = 0;
  let rest = value;
  while (rest % 10n === 0n) {
    rest /= 10n;
    exponent++;
  }
  return rest === 1n ? exponent : null;
}

/**
 * Validates a family configuration and fills in derived values
 * @param config - Family configuration
 * @returns Complete validated configuration
 */
export function validateFixedConfig<Name extends string>(
  config: FixedPointConfig<Name>
): ResolvedFixedPointConfig<Name> {
  const { name, inner, unsigned, prevUnsigned, perThing, div } = config;

  if (name.length === 0) {
    throw new Error('Family name must not be empty');
  }

  // Validate integer kinds
  if (!inner.signed) {
    throw new Error(`Invalid inner type for ${name}: ${inner.name}. Must be signed.`);
  }
  if (unsigned.signed || unsigned.bits !== inner.bits) {
    throw new Error(
      `Invalid unsigned type for ${name}: ${unsigned.name}. Must be unsigned and ${inner.bits} bits wide.`
    );
  }
  if (prevUnsigned.signed || prevUnsigned.bits * 2 !== inner.bits) {
    throw new Error(
      `Invalid prevUnsigned type for ${name}: ${prevUnsigned.name}. Must be unsigned and ${inner.bits / 2} bits wide.`
    );
  }

  // Validate divisor
  if (div <= 0n) {
    throw new Error(`Invalid div for ${name}: ${div}. Must be positive.`);
  }
  const exponent = decimalExponent(div);
  if (exponent === null) {
    throw new Error(`Invalid div for ${name}: ${div}. Must be a power of ten.`);
  }
  if (div > inner.max) {
    throw new Error(`Invalid div for ${name}: ${div}. Must fit ${inner.name}.`);
  }
  if (div - 1n > prevUnsigned.max) {
    throw new Error(
      `Invalid div for ${name}: ${div}. Remainders must fit ${prevUnsigned.name}.`
    );
  }

  // Validate ratio type
  if (perThing.ACCURACY !== div) {
    throw new Error(
      `Invalid perThing for ${name}: ${perThing.NAME} has accuracy ${perThing.ACCURACY}, expected ${div}.`
    );
  }

  const precision = config.precision ?? exponent;
  if (precision !== exponent) {
    throw new Error(`Invalid precision for ${name}: ${precision}. div ${div} implies ${exponent}.`);
  }

  return Object.freeze({ name, inner, unsigned, prevUnsigned, perThing, div, precision });
}
