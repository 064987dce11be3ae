/**
 * @quarry/core — schema parsing, canonical serialization, fingerprinting
 *
 * Schema text is JSON in the record-schema dialect:
 *
 *   {
 *     "type": "record",
 *     "name": "CheckoutEvent",
 *     "fields": [
 *       { "name": "eventType",  "type": "string" },
 *       { "name": "timestamp",  "type": { "type": "long",  "logicalType": "timestamp-millis" } },
 *       { "name": "totalValue", "type": { "type": "bytes", "logicalType": "decimal",
 *                                         "precision": 16, "scale": 2 } }
 *     ]
 *   }
 *
 * Parsing happens in two passes. zod checks the shape (type discriminators,
 * names, parameter types); a second pass resolves type names, checks logical
 * types against their carriers and rejects duplicate field names.
 *
 * The canonical serialization written to the container header is NOT the
 * input text: it is re-emitted from the parsed model with a fixed key order,
 * so two spellings of the same schema produce identical headers.
 */

import { z } from 'zod';

import { SchemaError } from './errors';
import type {
  Field,
  LogicalType,
  ScalarPhysicalType,
  Schema,
} from './types';

// ─── Type Name Mappings ───────────────────────────────────────────────────────

type PrimitiveName = 'null' | 'boolean' | 'int' | 'long' | 'float' | 'double' | 'bytes' | 'string';

const NAME_TO_PHYSICAL: Readonly<Record<PrimitiveName, ScalarPhysicalType>> = {
  null: 'null', boolean: 'boolean', int: 'int32', long: 'int64',
  float: 'float32', double: 'float64', bytes: 'bytes', string: 'string',
};

const PHYSICAL_TO_NAME: Readonly<Record<ScalarPhysicalType, PrimitiveName>> = {
  null: 'null', boolean: 'boolean', int32: 'int', int64: 'long',
  float32: 'float', float64: 'double', bytes: 'bytes', string: 'string',
};

// ─── Raw Shape (zod) ──────────────────────────────────────────────────────────

interface RawAnnotated {
  type:         PrimitiveName;
  logicalType?: string | undefined;
  precision?:   number | undefined;
  scale?:       number | undefined;
}

interface RawRecord {
  type:       'record';
  name:       string;
  namespace?: string | undefined;
  doc?:       string | undefined;
  fields:     RawField[];
}

interface RawField {
  name: string;
  doc?: string | undefined;
  type: PrimitiveName | RawAnnotated | RawRecord;
}

const nameSchema = z
  .string({ required_error: 'name is required' })
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'name must match [A-Za-z_][A-Za-z0-9_]*')
  // Record lines decode through plain-object assignment, where this key sets
  // the prototype instead; no input record can carry it.
  .refine(name => name !== '__proto__', "name '__proto__' is reserved");

const primitiveNameSchema = z.enum(['null', 'boolean', 'int', 'long', 'float', 'double', 'bytes', 'string']);

const annotatedSchema: z.ZodType<RawAnnotated> = z.object({
  type:        primitiveNameSchema,
  logicalType: z.string().optional(),
  precision:   z.number().int().optional(),
  scale:       z.number().int().optional(),
});

const recordSchema: z.ZodType<RawRecord> = z.lazy(() =>
  z.object({
    type:      z.literal('record'),
    name:      nameSchema,
    namespace: z.string().optional(),
    doc:       z.string().optional(),
    fields:    z.array(fieldSchema, { required_error: 'record requires a fields array' }),
  }),
);

const fieldSchema: z.ZodType<RawField> = z.lazy(() =>
  z.object({
    name: nameSchema,
    doc:  z.string().optional(),
    type: z.union([primitiveNameSchema, recordSchema, annotatedSchema], {
      errorMap: (issue, ctx) =>
        issue.code === 'invalid_union' && ctx.data === undefined
          ? { message: 'field type is required' }
          : { message: 'unknown or malformed field type' },
    }),
  }),
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// ─── Resolution ───────────────────────────────────────────────────────────────

function resolveLogicalType(
  raw: RawAnnotated,
  physicalType: ScalarPhysicalType,
  path: string,
): LogicalType | undefined {
  switch (raw.logicalType) {
    case undefined:
      return undefined;

    case 'timestamp-millis':
      if (physicalType !== 'int64') {
        throw new SchemaError(`${path}: timestamp-millis requires type long, got ${raw.type}`);
      }
      return { kind: 'timestamp-millis' };

    case 'decimal': {
      if (physicalType !== 'bytes') {
        throw new SchemaError(`${path}: decimal requires type bytes, got ${raw.type}`);
      }
      const { precision } = raw;
      const scale = raw.scale ?? 0;
      if (precision === undefined || precision < 1) {
        throw new SchemaError(`${path}: decimal precision must be a positive integer`);
      }
      if (scale < 0 || scale > precision) {
        throw new SchemaError(`${path}: decimal scale must be between 0 and precision (${precision})`);
      }
      return { kind: 'decimal', precision, scale };
    }

    // Unknown logical types fall back to their carrier type.
    default:
      return undefined;
  }
}

function resolveField(raw: RawField, path: string): Field {
  return Object.freeze(buildField(raw, path));
}

function buildField(raw: RawField, path: string): Field {
  const { type } = raw;
  const doc = raw.doc === undefined ? {} : { doc: raw.doc };

  if (typeof type === 'string') {
    return { name: raw.name, ...doc, physicalType: NAME_TO_PHYSICAL[type] };
  }
  if (type.type === 'record') {
    return { name: raw.name, ...doc, physicalType: 'record', record: resolveRecord(type, path) };
  }

  const physicalType = NAME_TO_PHYSICAL[type.type];
  const logicalType  = resolveLogicalType(type, physicalType, path);
  return logicalType === undefined
    ? { name: raw.name, ...doc, physicalType }
    : { name: raw.name, ...doc, physicalType, logicalType };
}

function resolveRecord(raw: RawRecord, path: string): Schema {
  const seen   = new Set<string>();
  const fields: Field[] = [];

  for (const rawField of raw.fields) {
    const fieldPath = path === '' ? rawField.name : `${path}.${rawField.name}`;
    if (seen.has(rawField.name)) {
      throw new SchemaError(
        `duplicate field name '${fieldPath}'. All field names must be unique within a record.`,
      );
    }
    seen.add(rawField.name);
    fields.push(resolveField(rawField, fieldPath));
  }

  return Object.freeze({
    name: raw.name,
    ...(raw.namespace === undefined ? {} : { namespace: raw.namespace }),
    ...(raw.doc === undefined ? {} : { doc: raw.doc }),
    fields: Object.freeze(fields),
  });
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

/**
 * Parse schema text into an immutable Schema.
 *
 * @throws SchemaError on malformed JSON, a non-record root, a missing or
 *         unknown type, a logical type on the wrong carrier, bad decimal
 *         parameters or colliding field names.
 */
export function parseSchema(schemaText: string): Schema {
  let json: unknown;
  try {
    json = JSON.parse(schemaText);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaError(`schema is not valid JSON: ${reason}`, { cause: err });
  }

  const result = recordSchema.safeParse(json);
  if (!result.success) {
    throw new SchemaError(`invalid schema: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return resolveRecord(result.data, '');
}

// ─── Serialization ────────────────────────────────────────────────────────────

type CanonicalType = PrimitiveName | Record<string, unknown>;

function canonicalType(field: Field): CanonicalType {
  if (field.physicalType === 'record') return canonicalRecord(field.record);

  const name = PHYSICAL_TO_NAME[field.physicalType];
  const lt   = field.logicalType;
  if (lt === undefined) return name;
  if (lt.kind === 'timestamp-millis') return { type: name, logicalType: lt.kind };
  return { type: name, logicalType: lt.kind, precision: lt.precision, scale: lt.scale };
}

function canonicalRecord(schema: Schema): Record<string, unknown> {
  return {
    type: 'record',
    name: schema.name,
    ...(schema.namespace === undefined ? {} : { namespace: schema.namespace }),
    ...(schema.doc === undefined ? {} : { doc: schema.doc }),
    fields: schema.fields.map(f => ({
      name: f.name,
      type: canonicalType(f),
      ...(f.doc === undefined ? {} : { doc: f.doc }),
    })),
  };
}

/** Compact JSON with a fixed key order. This is the header's schema text. */
export function serializeSchema(schema: Schema): string {
  return JSON.stringify(canonicalRecord(schema));
}

// ─── FNV-1a 32-bit ────────────────────────────────────────────────────────────

/** FNV-1a, 32-bit. Math.imul keeps each multiply within uint32. */
function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5;
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

const utf8Encoder = new TextEncoder();

/** FNV-1a fingerprint of the canonical serialization. */
export function schemaFingerprint(schema: Schema): number {
  return fnv1a32(utf8Encoder.encode(serializeSchema(schema)));
}
