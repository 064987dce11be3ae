/**
 * @quarry/core — type definitions
 *
 * The schema model is a plain tagged-variant tree. Nothing here carries
 * behaviour; parsing lives in schema.ts, conversion in coerce.ts and
 * logical.ts.
 */

import type { LosslessNumber } from 'lossless-json';

// ─── Physical Types ───────────────────────────────────────────────────────────

/**
 * Binary encoding category of a field.
 *
 * Schema text uses the record-schema names (`int`, `long`, `float`,
 * `double`); they are mapped onto these width-explicit names on parse.
 */
export type PhysicalType =
  | 'null'
  | 'boolean'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'bytes'
  | 'string'
  | 'record';

export type ScalarPhysicalType = Exclude<PhysicalType, 'record'>;

// ─── Logical Types ────────────────────────────────────────────────────────────

/**
 * timestamp-millis: carried by int64; signed milliseconds since
 *                   1970-01-01T00:00:00Z.
 *
 * decimal:          carried by bytes; two's-complement big-endian bytes of
 *                   the unscaled value (value × 10^scale). At most
 *                   `precision` significant digits.
 */
export type LogicalType =
  | { readonly kind: 'timestamp-millis' }
  | { readonly kind: 'decimal'; readonly precision: number; readonly scale: number };

export type DecimalType = Extract<LogicalType, { kind: 'decimal' }>;

// ─── Schema ───────────────────────────────────────────────────────────────────

export interface ScalarField {
  readonly name:          string;
  readonly doc?:          string;
  readonly physicalType:  ScalarPhysicalType;
  readonly logicalType?:  LogicalType;
}

export interface RecordField {
  readonly name:         string;
  readonly doc?:         string;
  readonly physicalType: 'record';
  readonly record:       Schema;
}

export type Field = ScalarField | RecordField;

/**
 * A record schema. Field order is authoritative: it is the only valid
 * encode (and decode) order. Field names are unique within one record.
 */
export interface Schema {
  readonly name:       string;
  readonly namespace?: string;
  readonly doc?:       string;
  readonly fields:     readonly Field[];
}

// ─── Values ───────────────────────────────────────────────────────────────────

/** A UTC instant at millisecond resolution. */
export interface Instant {
  readonly epochMillis: bigint;
}

/** Fixed-point decimal: unscaled × 10^-scale. */
export interface DecimalValue {
  readonly unscaled: bigint;
  readonly scale:    number;
}

/**
 * Typed value produced by coercion, before logical conversion.
 *
 * All integer widths travel as `int64` (bigint); the field's physical type
 * decides the encoded width. Likewise `float64` serves both float widths.
 */
export type SemanticValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'bool';    readonly value: boolean }
  | { readonly kind: 'int64';   readonly value: bigint }
  | { readonly kind: 'float64'; readonly value: number }
  | { readonly kind: 'string';  readonly value: string }
  | { readonly kind: 'bytes';   readonly value: Uint8Array }
  | ({ readonly kind: 'instant' } & Instant)
  | ({ readonly kind: 'decimal' } & DecimalValue)
  | { readonly kind: 'record';  readonly fields: SemanticRecord };

export type SemanticRecord = ReadonlyMap<string, SemanticValue>;

// ─── JSON ─────────────────────────────────────────────────────────────────────

/**
 * Decoded JSON tree. Numbers keep their exact source text as a
 * LosslessNumber; objects are Maps keyed in source order. A `__proto__`
 * key does not survive decoding, which is why schemas reject that name.
 */
export type JsonValue =
  | null
  | boolean
  | string
  | LosslessNumber
  | readonly JsonValue[]
  | JsonObject;

export type JsonObject = ReadonlyMap<string, JsonValue>;
