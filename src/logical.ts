/**
 * @quarry/core — logical type converters
 *
 * Pure mappings from a semantic value to the physical value its carrier
 * type encodes. No state, no configuration.
 */

import { digitCount, formatDecimal } from './decimal';
import { OverflowError, TypeMismatchError } from './errors';
import type { DecimalType, DecimalValue, Instant } from './types';

/** timestamp-millis → int64. Pre-epoch instants are negative; no clamping. */
export function timestampMillisToPhysical(instant: Instant): bigint {
  return instant.epochMillis;
}

/**
 * Minimal two's-complement big-endian bytes of `n`.
 *
 * Emits low bytes until the remainder is pure sign extension of the last
 * byte written, so there is never a redundant leading 0x00 or 0xFF:
 *
 *      0  → 00          127 → 7F        128 → 00 80
 *     -1  → FF         -128 → 80       -129 → FF 7F
 *   2325  → 09 15
 */
export function toTwosComplement(n: bigint): Uint8Array {
  const bytes: number[] = [];
  let rest = n;
  for (;;) {
    const byte = Number(rest & 0xffn);
    bytes.push(byte);
    rest >>= 8n; // arithmetic: negative values converge on -1n
    const negative = (byte & 0x80) !== 0;
    if ((rest === 0n && !negative) || (rest === -1n && negative)) break;
  }
  return Uint8Array.from(bytes.reverse());
}

/**
 * decimal → bytes: the unscaled value in minimal two's-complement form.
 * Reading those bytes back as a signed big-endian integer and dividing by
 * 10^scale reproduces the value exactly.
 */
export function decimalToPhysical(value: DecimalValue, type: DecimalType): Uint8Array {
  if (value.scale !== type.scale) {
    throw new TypeMismatchError(
      `decimal has scale ${value.scale}, field declares scale ${type.scale}`,
    );
  }
  if (digitCount(value.unscaled) > type.precision) {
    throw new OverflowError(
      `${formatDecimal(value.unscaled, value.scale)} exceeds precision ${type.precision}`,
    );
  }
  return toTwosComplement(value.unscaled);
}
