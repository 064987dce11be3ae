import { INT32_MAX, INT32_MIN } from './constants';
import { BinaryEncoder } from './encoder';
import { MissingFieldError, OverflowError, QuarryError, TypeMismatchError } from './errors';
import { decimalToPhysical, timestampMillisToPhysical } from './logical';
import type { Field, Schema, SemanticRecord, SemanticValue } from './types';

function mismatch(path: string, expected: SemanticValue['kind'], value: SemanticValue): TypeMismatchError {
  return new TypeMismatchError(`expected ${expected} value, got ${value.kind}`, { field: path });
}

function encodeField(enc: BinaryEncoder, field: Field, value: SemanticValue, path: string): void {
  if (field.physicalType === 'record') {
    if (value.kind !== 'record') throw mismatch(path, 'record', value);
    encodeFields(enc, field.record.fields, value.fields, path);
    return;
  }

  const { logicalType } = field;
  if (logicalType?.kind === 'timestamp-millis') {
    if (value.kind !== 'instant') throw mismatch(path, 'instant', value);
    enc.writeLong(timestampMillisToPhysical(value));
    return;
  }
  if (logicalType?.kind === 'decimal') {
    if (value.kind !== 'decimal') throw mismatch(path, 'decimal', value);
    try {
      enc.writeBytes(decimalToPhysical(value, logicalType));
    } catch (err) {
      throw err instanceof QuarryError ? err.annotate({ field: path }) : err;
    }
    return;
  }

  switch (field.physicalType) {
    case 'null':
      if (value.kind !== 'null') throw mismatch(path, 'null', value);
      enc.writeNull();
      return;

    case 'boolean':
      if (value.kind !== 'bool') throw mismatch(path, 'bool', value);
      enc.writeBoolean(value.value);
      return;

    case 'int32':
      if (value.kind !== 'int64') throw mismatch(path, 'int64', value);
      if (value.value < INT32_MIN || value.value > INT32_MAX) {
        throw new OverflowError(`${value.value} does not fit in int32`, { field: path });
      }
      enc.writeInt(Number(value.value));
      return;

    case 'int64':
      if (value.kind !== 'int64') throw mismatch(path, 'int64', value);
      if (BigInt.asIntN(64, value.value) !== value.value) {
        throw new OverflowError(`${value.value} does not fit in int64`, { field: path });
      }
      enc.writeLong(value.value);
      return;

    case 'float32':
      if (value.kind !== 'float64') throw mismatch(path, 'float64', value);
      enc.writeFloat(value.value);
      return;

    case 'float64':
      if (value.kind !== 'float64') throw mismatch(path, 'float64', value);
      enc.writeDouble(value.value);
      return;

    case 'bytes':
      if (value.kind !== 'bytes') throw mismatch(path, 'bytes', value);
      enc.writeBytes(value.value);
      return;

    case 'string':
      if (value.kind !== 'string') throw mismatch(path, 'string', value);
      enc.writeString(value.value);
      return;
  }
}

function encodeFields(
  enc: BinaryEncoder,
  fields: readonly Field[],
  values: SemanticRecord,
  prefix: string,
): void {
  for (const field of fields) {
    const path  = prefix === '' ? field.name : `${prefix}.${field.name}`;
    const value = values.get(field.name);
    if (value === undefined) {
      throw new MissingFieldError(`required field '${path}' is absent`, { field: path });
    }
    encodeField(enc, field, value, path);
  }
}

/**
 * Encode one record. Fields are written in schema order, whatever the
 * insertion order of `values`, back to back with no separators: a reader
 * needs the same schema to find field boundaries.
 *
 * @throws MissingFieldError  when `values` lacks a schema field.
 * @throws TypeMismatchError  when a value's kind does not fit its field.
 * @throws OverflowError      when an integer or decimal exceeds its field.
 */
export function encodeRecord(schema: Schema, values: SemanticRecord): Uint8Array {
  const enc = new BinaryEncoder();
  encodeFields(enc, schema.fields, values, '');
  return enc.toBytes();
}
