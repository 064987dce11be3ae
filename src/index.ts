// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PhysicalType,
  ScalarPhysicalType,
  LogicalType,
  DecimalType,
  ScalarField,
  RecordField,
  Field,
  Schema,
  Instant,
  DecimalValue,
  SemanticValue,
  SemanticRecord,
  JsonValue,
  JsonObject,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  QUARRY_MAGIC,
  QUARRY_VERSION,
  SYNC_MARKER_SIZE,
  DEFAULT_RECORDS_PER_BLOCK,
  INT32_MIN,
  INT32_MAX,
  INT64_MIN,
  INT64_MAX,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  QuarryError,
  SchemaError,
  ParseError,
  TypeMismatchError,
  OverflowError,
  MissingFieldError,
  IoError,
  ContainerStateError,
  isRecordError,
} from './errors';
export type { ErrorCode, ErrorContext } from './errors';

// ─── Schema ───────────────────────────────────────────────────────────────────
export { parseSchema, serializeSchema, schemaFingerprint } from './schema';

// ─── Collaborators ────────────────────────────────────────────────────────────
export { parseTimestamp } from './timestamp';
export type { TimestampParser } from './timestamp';
export { decodeJsonLine, isJsonObject } from './json-line';
export {
  parseDecimal,
  rescaleHalfEven,
  toInteger,
  digitCount,
  integerDigits,
  formatDecimal,
} from './decimal';
export type { ParsedDecimal } from './decimal';

// ─── Encoding ─────────────────────────────────────────────────────────────────
export { coerce, coerceRecord } from './coerce';
export type { CoerceOptions } from './coerce';
export { timestampMillisToPhysical, decimalToPhysical, toTwosComplement } from './logical';
export { BinaryEncoder } from './encoder';
export { encodeRecord } from './record';

// ─── Container ────────────────────────────────────────────────────────────────
export { ContainerWriter } from './container';
export type { ContainerState, ContainerWriterOptions } from './container';
export { MemorySink, FileSink } from './sink';
export type { ByteSink } from './sink';

// ─── Pipeline ─────────────────────────────────────────────────────────────────
export { transcode, transcodeFile, encodeLine } from './transcoder';
export type { ErrorPolicy, TranscodeOptions, TranscodeStats, TranscodePaths } from './transcoder';
export { Logger, silentLogger } from './logger';
export type { LogLevel, LogFormat, LoggerOptions } from './logger';
export { loadConfig, ConfigError } from './config';
export type { QuarryConfig } from './config';
