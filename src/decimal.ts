/**
 * @quarry/core — exact base-10 arithmetic on native bigint
 *
 * Decimal literals are never routed through a binary float. A literal is
 * split into an integer coefficient and a power-of-ten exponent:
 *
 *   "12.345"  → { coefficient: 12345n, exponent: -3 }
 *   "-1.5e3"  → { coefficient: -15n,   exponent:  2 }
 *
 * Rescaling to a target scale multiplies or divides by a power of ten; the
 * division rounds half to even.
 */

export interface ParsedDecimal {
  readonly coefficient: bigint;
  readonly exponent:    number;
}

const DECIMAL_LITERAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Parse a decimal literal in plain or exponent notation.
 * Returns null when the text is not a decimal literal.
 */
export function parseDecimal(text: string): ParsedDecimal | null {
  const match = DECIMAL_LITERAL.exec(text);
  if (match === null) return null;

  const sign     = match[1] ?? '';
  const intPart  = match[2] ?? '';
  const fracPart = match[3] ?? '';
  const expPart  = match[4];

  if (intPart.length === 0 && fracPart.length === 0) return null;

  const exponent = (expPart === undefined ? 0 : Number(expPart)) - fracPart.length;
  if (!Number.isFinite(exponent)) return null;

  const magnitude = BigInt(`${intPart}${fracPart}` || '0');
  return { coefficient: sign === '-' ? -magnitude : magnitude, exponent };
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/** Number of decimal digits in |n|. Zero has one digit. */
export function digitCount(n: bigint): number {
  return abs(n).toString().length;
}

/**
 * Order of magnitude: the value lies in [10^(m-1), 10^m) for m = result.
 * Zero returns 0. Cheap to compute for any exponent.
 */
export function integerDigits(value: ParsedDecimal): number {
  if (value.coefficient === 0n) return 0;
  return digitCount(value.coefficient) + value.exponent;
}

/**
 * Unscaled integer of `value` at `scale` fractional digits, rounding half to
 * even when digits are dropped and zero-padding when they are added.
 *
 *   rescaleHalfEven(12.345, 2) → 1234n   (tie, 4 is even: down)
 *   rescaleHalfEven(12.355, 2) → 1236n   (tie, 5 is odd:  up)
 *   rescaleHalfEven(23.25,  4) → 232500n
 *
 * Callers bound the magnitude first (see integerDigits): a huge positive
 * exponent produces a correspondingly huge bigint.
 */
export function rescaleHalfEven(value: ParsedDecimal, scale: number): bigint {
  const { coefficient } = value;
  if (coefficient === 0n) return 0n;

  const shift = value.exponent + scale;
  if (shift >= 0) return coefficient * 10n ** BigInt(shift);

  const drop      = -shift;
  const magnitude = abs(coefficient);

  // Fewer digits than are being dropped: |value| < 0.1 units, rounds to zero.
  if (drop > digitCount(magnitude)) return 0n;

  const divisor  = 10n ** BigInt(drop);
  let   quotient = magnitude / divisor;
  const twice    = (magnitude % divisor) * 2n;

  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    quotient += 1n;
  }
  return coefficient < 0n ? -quotient : quotient;
}

/**
 * Exact integer value, or null when the literal has a non-zero fractional
 * part. `1.0` and `1e2` are integral.
 */
export function toInteger(value: ParsedDecimal): bigint | null {
  const { coefficient, exponent } = value;
  // 0e9999999999 is zero; never raise 10 to its exponent.
  if (coefficient === 0n) return 0n;
  if (exponent >= 0) return coefficient * 10n ** BigInt(exponent);
  if (-exponent > digitCount(coefficient)) return null;

  const divisor = 10n ** BigInt(-exponent);
  if (coefficient % divisor !== 0n) return null;
  return coefficient / divisor;
}

/** Render an unscaled value at `scale` as plain decimal text. */
export function formatDecimal(unscaled: bigint, scale: number): string {
  const digits = abs(unscaled).toString();
  const sign   = unscaled < 0n ? '-' : '';
  if (scale === 0) return `${sign}${digits}`;

  const padded = digits.padStart(scale + 1, '0');
  const cut    = padded.length - scale;
  return `${sign}${padded.slice(0, cut)}.${padded.slice(cut)}`;
}
