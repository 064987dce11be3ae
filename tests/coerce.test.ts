/**
 * @quarry/core — value coercion
 *
 * Each field type accepts exactly the JSON shapes documented in coerce.ts
 * and fails with the documented error class otherwise. Values are decoded
 * through decodeJsonLine so numbers arrive as lexical text, as they do in a
 * real run.
 */

import { describe, it, expect } from 'vitest';
import {
  coerce,
  coerceRecord,
  decodeJsonLine,
  parseSchema,
  MissingFieldError,
  OverflowError,
  ParseError,
  QuarryError,
  TypeMismatchError,
  type Field,
  type JsonValue,
  type SemanticValue,
} from '../src/index';

function field(type: unknown, name = 'x'): Field {
  const schema = parseSchema(JSON.stringify({ type: 'record', name: 'R', fields: [{ name, type }] }));
  const [only] = schema.fields;
  if (only === undefined) throw new Error('schema has no field');
  return only;
}

/** JSON text of a single value → JsonValue with lexical numbers. */
function json(text: string): JsonValue {
  const value = decodeJsonLine(`{"v": ${text}}`).get('v');
  if (value === undefined) throw new Error('no value');
  return value;
}

function coerceText(text: string, type: unknown): SemanticValue {
  return coerce(json(text), field(type));
}

function caught(fn: () => unknown): QuarryError {
  try {
    fn();
  } catch (err) {
    if (err instanceof QuarryError) return err;
    throw err;
  }
  throw new Error('expected a QuarryError');
}

const DECIMAL_16_2 = { type: 'bytes', logicalType: 'decimal', precision: 16, scale: 2 };

// ─── Strings, booleans, null ──────────────────────────────────────────────────

describe('coerce — string / boolean / null', () => {
  it('passes strings through', () => {
    expect(coerceText('"checkoutComplete"', 'string')).toEqual({ kind: 'string', value: 'checkoutComplete' });
  });

  it('rejects non-strings for string fields', () => {
    const err = caught(() => coerceText('42', 'string'));
    expect(err).toBeInstanceOf(TypeMismatchError);
    expect(err.message).toBe('expected string, got number');
    expect(err.context.field).toBe('x');
  });

  it('requires JSON booleans and JSON null', () => {
    expect(coerceText('true', 'boolean')).toEqual({ kind: 'bool', value: true });
    expect(coerceText('null', 'null')).toEqual({ kind: 'null' });
    expect(() => coerceText('"true"', 'boolean')).toThrow(TypeMismatchError);
    expect(() => coerceText('0', 'null')).toThrow(TypeMismatchError);
  });
});

// ─── Integers ─────────────────────────────────────────────────────────────────

describe('coerce — integers', () => {
  it('widens JSON integers to int64 values', () => {
    expect(coerceText('1', 'int')).toEqual({ kind: 'int64', value: 1n });
    expect(coerceText('-7', 'long')).toEqual({ kind: 'int64', value: -7n });
  });

  it('accepts integral values written with a fraction or exponent', () => {
    expect(coerceText('3.0', 'int')).toEqual({ kind: 'int64', value: 3n });
    expect(coerceText('1e2', 'int')).toEqual({ kind: 'int64', value: 100n });
  });

  it('reads zero with a huge exponent as zero', () => {
    expect(coerceText('0e9999999999', 'int')).toEqual({ kind: 'int64', value: 0n });
    expect(coerceText('0e9999999999', 'long')).toEqual({ kind: 'int64', value: 0n });
    expect(coerceText('0e9999999999', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 0n, scale: 2 });
  });

  it('keeps int64 extremes exact', () => {
    expect(coerceText('9223372036854775807', 'long')).toEqual({ kind: 'int64', value: 9223372036854775807n });
    expect(coerceText('-9223372036854775808', 'long')).toEqual({ kind: 'int64', value: -9223372036854775808n });
  });

  it('fails with TypeMismatch on fractional or non-numeric values', () => {
    expect(caught(() => coerceText('1.5', 'int')).message).toBe('expected int32, got fractional number 1.5');
    expect(caught(() => coerceText('"abc"', 'int')).message).toBe('expected int32, got string');
    expect(caught(() => coerceText('true', 'long'))).toBeInstanceOf(TypeMismatchError);
  });

  it('fails with Overflow outside the declared width', () => {
    expect(caught(() => coerceText('2147483648', 'int'))).toBeInstanceOf(OverflowError);
    expect(coerceText('2147483647', 'int')).toEqual({ kind: 'int64', value: 2147483647n });
    expect(coerceText('-2147483648', 'int')).toEqual({ kind: 'int64', value: -2147483648n });
    expect(caught(() => coerceText('9223372036854775808', 'long'))).toBeInstanceOf(OverflowError);
    expect(caught(() => coerceText('1e999999', 'long'))).toBeInstanceOf(OverflowError);
  });
});

// ─── Floats ───────────────────────────────────────────────────────────────────

describe('coerce — floats', () => {
  it('reads JSON numbers as doubles', () => {
    expect(coerceText('0.1', 'double')).toEqual({ kind: 'float64', value: 0.1 });
    expect(coerceText('-3', 'float')).toEqual({ kind: 'float64', value: -3 });
  });

  it('fails with Overflow when the value is not finite in the target width', () => {
    expect(caught(() => coerceText('1e39', 'float'))).toBeInstanceOf(OverflowError);
    expect(caught(() => coerceText('1e400', 'double'))).toBeInstanceOf(OverflowError);
    expect(coerceText('1e39', 'double')).toEqual({ kind: 'float64', value: 1e39 });
  });

  it('accepts float values that round down to the largest float32', () => {
    // Above 3.4028234663852886e38 but below the rounding midpoint to Infinity.
    expect(coerceText('3.4028235e38', 'float')).toEqual({ kind: 'float64', value: 3.4028235e38 });
    expect(caught(() => coerceText('3.4028236e38', 'float'))).toBeInstanceOf(OverflowError);
  });
});

// ─── Bytes ────────────────────────────────────────────────────────────────────

describe('coerce — bytes', () => {
  it('maps each code point ≤ U+00FF to one byte', () => {
    expect(coerceText('"AB\\u00ff"', 'bytes')).toEqual({
      kind: 'bytes', value: Uint8Array.of(0x41, 0x42, 0xff),
    });
  });

  it('rejects code points above U+00FF', () => {
    expect(caught(() => coerceText('"\\u0100"', 'bytes')).message)
      .toBe('bytes string holds code point U+0100 above U+00FF');
  });
});

// ─── timestamp-millis ─────────────────────────────────────────────────────────

describe('coerce — timestamp-millis', () => {
  const TS = { type: 'long', logicalType: 'timestamp-millis' };

  it('delegates to the timestamp parser and assumes UTC', () => {
    expect(coerceText('"1970-01-01 00:00:01.500"', TS)).toEqual({ kind: 'instant', epochMillis: 1500n });
  });

  it('fails with TypeMismatch on non-strings', () => {
    expect(caught(() => coerceText('1500', TS))).toBeInstanceOf(TypeMismatchError);
  });

  it('fails with ParseError naming the field on bad text', () => {
    const err = caught(() => coerce(json('"2023-01-25T12:00:00Z"'), field(TS, 'timestamp')));
    expect(err).toBeInstanceOf(ParseError);
    expect(err.context.field).toBe('timestamp');
  });

  it('uses an injected parser when given', () => {
    const value = coerce(json('"epoch+42"'), field(TS), { parseTimestamp: () => ({ epochMillis: 42n }) });
    expect(value).toEqual({ kind: 'instant', epochMillis: 42n });
  });
});

// ─── decimal ──────────────────────────────────────────────────────────────────

describe('coerce — decimal', () => {
  it('rescales from the exact lexical value', () => {
    expect(coerceText('23.25', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 2325n, scale: 2 });
    expect(coerceText('23', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 2300n, scale: 2 });
    expect(coerceText('2.5e1', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 2500n, scale: 2 });
  });

  it('rounds half to even on both tie directions', () => {
    expect(coerceText('12.345', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 1234n, scale: 2 });
    expect(coerceText('12.355', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 1236n, scale: 2 });
  });

  it('does not pick up binary float error', () => {
    // 0.1 + 0.2 style drift would show up in the 17th digit.
    expect(coerceText('0.30000000000000004', { ...DECIMAL_16_2, precision: 20, scale: 17 }))
      .toEqual({ kind: 'decimal', unscaled: 30000000000000004n, scale: 17 });
  });

  it('accepts a decimal literal inside a JSON string', () => {
    expect(coerceText('"19.99"', DECIMAL_16_2)).toEqual({ kind: 'decimal', unscaled: 1999n, scale: 2 });
    expect(caught(() => coerceText('"nineteen"', DECIMAL_16_2))).toBeInstanceOf(TypeMismatchError);
  });

  it('fails with Overflow when digits exceed precision', () => {
    const D42 = { ...DECIMAL_16_2, precision: 4 };
    expect(coerceText('99.99', D42)).toEqual({ kind: 'decimal', unscaled: 9999n, scale: 2 });
    expect(caught(() => coerceText('100', D42))).toBeInstanceOf(OverflowError);
    // Rounding carries into a fifth digit.
    expect(caught(() => coerceText('99.995', D42)).message).toBe('99.995 exceeds decimal(4, 2)');
    expect(caught(() => coerceText('1e999999', D42))).toBeInstanceOf(OverflowError);
  });

  it('fails with TypeMismatch on booleans', () => {
    expect(caught(() => coerceText('false', DECIMAL_16_2))).toBeInstanceOf(TypeMismatchError);
  });
});

// ─── Records ──────────────────────────────────────────────────────────────────

describe('coerceRecord', () => {
  const schema = parseSchema(JSON.stringify({
    type: 'record', name: 'Checkout',
    fields: [
      { name: 'eventType', type: 'string' },
      { name: 'customer',  type: { type: 'record', name: 'Customer', fields: [{ name: 'age', type: 'int' }] } },
    ],
  }));

  it('returns values in schema order and ignores unknown keys', () => {
    const raw    = decodeJsonLine('{"extra": 1, "customer": {"age": 30}, "eventType": "view"}');
    const values = coerceRecord(raw, schema.fields);

    expect([...values.keys()]).toEqual(['eventType', 'customer']);
    expect(values.get('customer')).toEqual({
      kind: 'record', fields: new Map([['age', { kind: 'int64', value: 30n }]]),
    });
  });

  it('fails with MissingField naming the path', () => {
    const err = caught(() => coerceRecord(decodeJsonLine('{"eventType": "view", "customer": {}}'), schema.fields));
    expect(err).toBeInstanceOf(MissingFieldError);
    expect(err.context.field).toBe('customer.age');
    expect(err.message).toBe("required field 'customer.age' is absent");
  });

  it('names nested paths on type errors', () => {
    const err = caught(() => coerceRecord(
      decodeJsonLine('{"eventType": "view", "customer": {"age": "thirty"}}'),
      schema.fields,
    ));
    expect(err).toBeInstanceOf(TypeMismatchError);
    expect(err.context.field).toBe('customer.age');
  });

  it('rejects a non-object for a record field', () => {
    const err = caught(() => coerceRecord(decodeJsonLine('{"eventType": "view", "customer": 5}'), schema.fields));
    expect(err.message).toBe('expected object, got number');
  });
});
