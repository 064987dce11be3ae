/**
 * @quarry/core — value coercion
 *
 * Maps an untyped JSON value onto the SemanticValue its field requires.
 * This is the only place input shape is judged: every value leaving here is
 * well-formed for its field, so the encoders downstream never reject input.
 *
 * Numbers arrive as LosslessNumber text and are read exactly:
 *
 *   int32 / int64   integral literal (1, 1.0, 1e2), range-checked
 *   decimal         any literal, rescaled half-to-even, precision-checked
 *   float32/float64 Number(text), must stay finite in the target width
 */

import { isLosslessNumber } from 'lossless-json';

import { INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from './constants';
import {
  digitCount,
  integerDigits,
  parseDecimal,
  rescaleHalfEven,
  toInteger,
  type ParsedDecimal,
} from './decimal';
import {
  MissingFieldError,
  OverflowError,
  ParseError,
  TypeMismatchError,
} from './errors';
import { isJsonObject } from './json-line';
import { parseTimestamp, type TimestampParser } from './timestamp';
import type {
  DecimalType,
  Field,
  JsonObject,
  JsonValue,
  ScalarField,
  SemanticRecord,
  SemanticValue,
} from './types';

export interface CoerceOptions {
  /** Replaces the built-in `YYYY-MM-DD HH:mm:ss.SSS` parser. */
  readonly parseTimestamp?: TimestampParser;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function describeJson(raw: JsonValue): string {
  if (raw === null) return 'null';
  if (isLosslessNumber(raw)) return 'number';
  if (Array.isArray(raw)) return 'array';
  if (isJsonObject(raw)) return 'object';
  return typeof raw;
}

function mismatch(path: string, expected: string, raw: JsonValue): TypeMismatchError {
  return new TypeMismatchError(`expected ${expected}, got ${describeJson(raw)}`, { field: path });
}

/** Numeric text of a JSON number, or null for any other JSON value. */
function numberText(raw: JsonValue): string | null {
  return isLosslessNumber(raw) ? raw.value : null;
}

function requireDecimal(text: string, path: string, raw: JsonValue): ParsedDecimal {
  const parsed = parseDecimal(text);
  if (parsed === null) throw mismatch(path, 'a decimal literal', raw);
  return parsed;
}

// ─── Scalar Coercion ──────────────────────────────────────────────────────────

function coerceInteger(raw: JsonValue, width: 32 | 64, path: string): SemanticValue {
  const text = numberText(raw);
  if (text === null) throw mismatch(path, `int${width}`, raw);

  const parsed = requireDecimal(text, path, raw);
  // 20 digits already exceeds the int64 range; avoids materializing 1e999999.
  if (integerDigits(parsed) > 20) {
    throw new OverflowError(`${text} does not fit in int${width}`, { field: path });
  }

  const value = toInteger(parsed);
  if (value === null) {
    throw new TypeMismatchError(`expected int${width}, got fractional number ${text}`, { field: path });
  }

  const min = width === 32 ? INT32_MIN : INT64_MIN;
  const max = width === 32 ? INT32_MAX : INT64_MAX;
  if (value < min || value > max) {
    throw new OverflowError(`${text} does not fit in int${width}`, { field: path });
  }
  return { kind: 'int64', value };
}

function coerceFloat(raw: JsonValue, width: 32 | 64, path: string): SemanticValue {
  const text = numberText(raw);
  if (text === null) throw mismatch(path, `float${width}`, raw);

  const value = Number(text);
  // Judge the value as the target width will store it.
  const stored = width === 32 ? Math.fround(value) : value;
  if (!Number.isFinite(stored)) {
    throw new OverflowError(`${text} is not finite as float${width}`, { field: path });
  }
  return { kind: 'float64', value };
}

function coerceDecimal(raw: JsonValue, type: DecimalType, path: string): SemanticValue {
  const text = typeof raw === 'string' ? raw : numberText(raw);
  if (text === null) throw mismatch(path, 'decimal number', raw);

  const parsed = requireDecimal(text.trim(), path, raw);
  const overflow = () => new OverflowError(
    `${text} exceeds decimal(${type.precision}, ${type.scale})`,
    { field: path },
  );

  if (integerDigits(parsed) + type.scale > type.precision) throw overflow();

  const unscaled = rescaleHalfEven(parsed, type.scale);
  // Rounding up can add a digit: 9.995 → 10.00.
  if (digitCount(unscaled) > type.precision) throw overflow();

  return { kind: 'decimal', unscaled, scale: type.scale };
}

function coerceTimestamp(raw: JsonValue, path: string, parse: TimestampParser): SemanticValue {
  if (typeof raw !== 'string') throw mismatch(path, 'timestamp string', raw);
  try {
    return { kind: 'instant', ...parse(raw) };
  } catch (err) {
    if (err instanceof ParseError) {
      throw new ParseError(err.message, { field: path, cause: err });
    }
    throw err;
  }
}

function coerceBytes(raw: JsonValue, path: string): SemanticValue {
  if (typeof raw !== 'string') throw mismatch(path, 'bytes string', raw);

  const out = new Uint8Array(raw.length);
  for (let i = 0; i < raw.length; i++) {
    const code = raw.charCodeAt(i);
    if (code > 0xff) {
      throw new TypeMismatchError(
        `bytes string holds code point U+${code.toString(16).padStart(4, '0')} above U+00FF`,
        { field: path },
      );
    }
    out[i] = code;
  }
  return { kind: 'bytes', value: out };
}

function coerceScalar(raw: JsonValue, field: ScalarField, path: string, options: CoerceOptions): SemanticValue {
  const { logicalType } = field;
  if (logicalType?.kind === 'timestamp-millis') {
    return coerceTimestamp(raw, path, options.parseTimestamp ?? parseTimestamp);
  }
  if (logicalType?.kind === 'decimal') {
    return coerceDecimal(raw, logicalType, path);
  }

  switch (field.physicalType) {
    case 'null':
      if (raw !== null) throw mismatch(path, 'null', raw);
      return { kind: 'null' };

    case 'boolean':
      if (typeof raw !== 'boolean') throw mismatch(path, 'boolean', raw);
      return { kind: 'bool', value: raw };

    case 'int32':   return coerceInteger(raw, 32, path);
    case 'int64':   return coerceInteger(raw, 64, path);
    case 'float32': return coerceFloat(raw, 32, path);
    case 'float64': return coerceFloat(raw, 64, path);
    case 'bytes':   return coerceBytes(raw, path);

    case 'string':
      if (typeof raw !== 'string') throw mismatch(path, 'string', raw);
      return { kind: 'string', value: raw };
  }
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Coerce one JSON value for `field`.
 *
 * @param path  Dotted field path used in error context; defaults to the
 *              field name.
 */
export function coerce(
  raw: JsonValue,
  field: Field,
  options: CoerceOptions = {},
  path: string = field.name,
): SemanticValue {
  if (field.physicalType === 'record') {
    if (!isJsonObject(raw)) throw mismatch(path, 'object', raw);
    return { kind: 'record', fields: coerceRecord(raw, field.record.fields, options, path) };
  }
  return coerceScalar(raw, field, path, options);
}

/**
 * Coerce every schema field of a decoded record, in schema order.
 * Keys the schema does not name are ignored.
 *
 * @throws MissingFieldError when a schema field is absent.
 */
export function coerceRecord(
  raw: JsonObject,
  fields: readonly Field[],
  options: CoerceOptions = {},
  prefix = '',
): SemanticRecord {
  const out = new Map<string, SemanticValue>();
  for (const field of fields) {
    const path  = prefix === '' ? field.name : `${prefix}.${field.name}`;
    const value = raw.get(field.name);
    if (value === undefined) {
      throw new MissingFieldError(`required field '${path}' is absent`, { field: path });
    }
    out.set(field.name, coerce(value, field, options, path));
  }
  return out;
}
