/**
 * @quarry/core — error taxonomy
 *
 * Every failure raised by the library is a QuarryError with a stable `code`.
 * Record-level errors (parse, type mismatch, overflow, missing field) carry
 * the field path where they arose; the transcoder adds the record index and
 * input line before rethrowing or logging them.
 */

export type ErrorCode =
  | 'SCHEMA_ERROR'
  | 'PARSE_ERROR'
  | 'TYPE_MISMATCH'
  | 'OVERFLOW'
  | 'MISSING_FIELD'
  | 'IO_ERROR'
  | 'CONTAINER_STATE';

export interface ErrorContext {
  /** Zero-based position of the record among non-blank input lines. */
  readonly recordIndex?: number;
  /** One-based input line number. */
  readonly line?:        number;
  /** Dotted field path, e.g. `customer.address`. */
  readonly field?:       string;
}

export interface QuarryErrorOptions extends ErrorContext {
  readonly cause?: unknown;
}

const RECORD_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'PARSE_ERROR',
  'TYPE_MISMATCH',
  'OVERFLOW',
  'MISSING_FIELD',
]);

export abstract class QuarryError extends Error {
  abstract readonly code: ErrorCode;
  context: ErrorContext;

  constructor(message: string, options: QuarryErrorOptions = {}) {
    const { cause, ...context } = options;
    super(message, cause === undefined ? undefined : { cause });
    this.name    = new.target.name;
    this.context = context;
    Error.captureStackTrace(this, new.target);
  }

  /** Merge record position into the context. Returns this for rethrow. */
  annotate(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  /** `[CODE] message (record 3, line 4, field totalValue)` */
  describe(): string {
    const parts: string[] = [];
    if (this.context.recordIndex !== undefined) parts.push(`record ${this.context.recordIndex}`);
    if (this.context.line !== undefined)        parts.push(`line ${this.context.line}`);
    if (this.context.field !== undefined)       parts.push(`field ${this.context.field}`);
    const where = parts.length > 0 ? ` (${parts.join(', ')})` : '';
    return `[${this.code}] ${this.message}${where}`;
  }
}

/** Malformed or internally inconsistent schema text. Always fatal. */
export class SchemaError extends QuarryError {
  readonly code = 'SCHEMA_ERROR' as const;
}

/** Malformed JSON line or timestamp text. */
export class ParseError extends QuarryError {
  readonly code = 'PARSE_ERROR' as const;
}

/** A JSON value does not have the shape its field's type requires. */
export class TypeMismatchError extends QuarryError {
  readonly code = 'TYPE_MISMATCH' as const;
}

/** Integer outside its declared width, or decimal beyond its precision. */
export class OverflowError extends QuarryError {
  readonly code = 'OVERFLOW' as const;
}

/** A schema field is absent from the input record. */
export class MissingFieldError extends QuarryError {
  readonly code = 'MISSING_FIELD' as const;
}

/** Wraps failures of the underlying file or stream. Always fatal. */
export class IoError extends QuarryError {
  readonly code = 'IO_ERROR' as const;
}

/** A ContainerWriter method was called in a state that does not allow it. */
export class ContainerStateError extends QuarryError {
  readonly code = 'CONTAINER_STATE' as const;
}

/** True for per-record failures that the skip policy may pass over. */
export function isRecordError(err: unknown): err is QuarryError {
  return err instanceof QuarryError && RECORD_ERROR_CODES.has(err.code);
}
