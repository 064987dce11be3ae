/**
 * @quarry/core — exact decimal arithmetic
 *
 * Rescaling must round half to even on ties in BOTH directions. The literal
 * tie cases are spelled out: 12.345 → 12.34 (4 is even, stays) and
 * 12.355 → 12.36 (5 is odd, rounds up).
 */

import { describe, it, expect } from 'vitest';
import {
  parseDecimal,
  rescaleHalfEven,
  toInteger,
  digitCount,
  integerDigits,
  formatDecimal,
  type ParsedDecimal,
} from '../src/index';

function parsed(text: string): ParsedDecimal {
  const value = parseDecimal(text);
  if (value === null) throw new Error(`test literal ${text} did not parse`);
  return value;
}

function rescale(text: string, scale: number): string {
  return formatDecimal(rescaleHalfEven(parsed(text), scale), scale);
}

describe('parseDecimal', () => {
  it('splits plain literals into coefficient and exponent', () => {
    expect(parseDecimal('12.345')).toEqual({ coefficient: 12345n, exponent: -3 });
    expect(parseDecimal('-0.5')).toEqual({ coefficient: -5n, exponent: -1 });
    expect(parseDecimal('100')).toEqual({ coefficient: 100n, exponent: 0 });
  });

  it('folds exponent notation into the exponent', () => {
    expect(parseDecimal('-1.5e3')).toEqual({ coefficient: -15n, exponent: 2 });
    expect(parseDecimal('2E-2')).toEqual({ coefficient: 2n, exponent: -2 });
    expect(parseDecimal('7e+1')).toEqual({ coefficient: 7n, exponent: 1 });
  });

  it('keeps every digit of long literals', () => {
    expect(parseDecimal('123456789012345678901234567890.123456789')).toEqual({
      coefficient: 123456789012345678901234567890123456789n,
      exponent:    -9,
    });
  });

  it('returns null for non-literals', () => {
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('.')).toBeNull();
    expect(parseDecimal('-')).toBeNull();
    expect(parseDecimal('1.2.3')).toBeNull();
    expect(parseDecimal('abc')).toBeNull();
    expect(parseDecimal('1e')).toBeNull();
  });
});

describe('rescaleHalfEven', () => {
  it('rounds a tie down when the kept digit is even: 12.345 → 12.34', () => {
    expect(rescaleHalfEven(parsed('12.345'), 2)).toBe(1234n);
  });

  it('rounds a tie up when the kept digit is odd: 12.355 → 12.36', () => {
    expect(rescaleHalfEven(parsed('12.355'), 2)).toBe(1236n);
  });

  it('rounds non-ties to the nearest value', () => {
    expect(rescale('12.3449', 2)).toBe('12.34');
    expect(rescale('12.3451', 2)).toBe('12.35');
    expect(rescale('0.005', 2)).toBe('0.00');
    expect(rescale('0.015', 2)).toBe('0.02');
  });

  it('mirrors rounding for negative values', () => {
    expect(rescale('-12.345', 2)).toBe('-12.34');
    expect(rescale('-12.355', 2)).toBe('-12.36');
    expect(rescale('-2.5', 0)).toBe('-2');
    expect(rescale('-3.5', 0)).toBe('-4');
  });

  it('zero-pads when the source has fewer fractional digits', () => {
    expect(rescaleHalfEven(parsed('23.25'), 4)).toBe(232500n);
    expect(rescaleHalfEven(parsed('7'), 2)).toBe(700n);
    expect(rescaleHalfEven(parsed('1.5e2'), 2)).toBe(15000n);
  });

  it('collapses values far below the last kept digit to zero', () => {
    expect(rescaleHalfEven(parsed('1e-40'), 2)).toBe(0n);
    expect(rescaleHalfEven(parsed('-0.0004'), 2)).toBe(0n);
  });

  it('can carry into a new digit', () => {
    expect(rescale('9.995', 2)).toBe('10.00');
  });
});

describe('toInteger', () => {
  it('accepts integral literals in any notation', () => {
    expect(toInteger(parsed('42'))).toBe(42n);
    expect(toInteger(parsed('1.0'))).toBe(1n);
    expect(toInteger(parsed('1e2'))).toBe(100n);
    expect(toInteger(parsed('-2500e-2'))).toBe(-25n);
    expect(toInteger(parsed('0.000'))).toBe(0n);
  });

  it('reads zero with any exponent as zero without expanding it', () => {
    expect(toInteger(parsed('0e9999999999'))).toBe(0n);
    expect(toInteger(parsed('-0.0e99999999'))).toBe(0n);
  });

  it('returns null for fractional values', () => {
    expect(toInteger(parsed('1.5'))).toBeNull();
    expect(toInteger(parsed('0.001'))).toBeNull();
    expect(toInteger(parsed('1e-3'))).toBeNull();
  });
});

describe('digit counting', () => {
  it('counts digits of |n|, zero having one', () => {
    expect(digitCount(0n)).toBe(1);
    expect(digitCount(2325n)).toBe(4);
    expect(digitCount(-99999n)).toBe(5);
  });

  it('gives the order of magnitude of a literal', () => {
    expect(integerDigits(parsed('0'))).toBe(0);
    expect(integerDigits(parsed('23.25'))).toBe(2);
    expect(integerDigits(parsed('0.05'))).toBe(-1);
    expect(integerDigits(parsed('1e300000'))).toBe(300001);
  });
});

describe('formatDecimal', () => {
  it('places the point scale digits from the right', () => {
    expect(formatDecimal(2325n, 2)).toBe('23.25');
    expect(formatDecimal(5n, 3)).toBe('0.005');
    expect(formatDecimal(-1234n, 2)).toBe('-12.34');
    expect(formatDecimal(42n, 0)).toBe('42');
  });
});
