/**
 * @quarry/core — transcoding pump
 *
 * Strictly sequential: read a line → decode → coerce → encode → append →
 * next line. Blocks appear in the file in input order, and the writer is
 * always closed before control returns, success or not.
 *
 * Error policy for per-record failures (parse, type mismatch, overflow,
 * missing field):
 *
 *   abort  (default) the error is annotated with record index and line,
 *          the container is closed, and the error propagates
 *   skip   the error is logged at warn and the record is dropped
 *
 * Schema and I/O errors are always fatal.
 */

import { open, readFile, type FileHandle } from 'node:fs/promises';

import { coerceRecord } from './coerce';
import { ContainerWriter } from './container';
import { IoError, QuarryError, isRecordError } from './errors';
import { decodeJsonLine } from './json-line';
import { silentLogger, type Logger } from './logger';
import { encodeRecord } from './record';
import { parseSchema, schemaFingerprint } from './schema';
import { FileSink, type ByteSink } from './sink';
import type { TimestampParser } from './timestamp';
import type { Schema } from './types';

export type ErrorPolicy = 'abort' | 'skip';

export interface TranscodeOptions {
  readonly recordsPerBlock?: number;
  readonly onError?:         ErrorPolicy;
  readonly logger?:          Logger;
  readonly parseTimestamp?:  TimestampParser;
  /** Fixed sync marker, for reproducible output. */
  readonly syncMarker?:      Uint8Array;
}

export interface TranscodeStats {
  /** Records written to the container. */
  readonly records: number;
  /** Records dropped under the skip policy. */
  readonly skipped: number;
  readonly blocks:  number;
}

export interface TranscodePaths {
  readonly schemaPath: string;
  readonly inputPath:  string;
  readonly outputPath: string;
}

/** Decode, coerce and encode one input line. */
export function encodeLine(
  schema: Schema,
  line: string,
  parseTimestamp?: TimestampParser,
): Uint8Array {
  const raw    = decodeJsonLine(line);
  const values = coerceRecord(raw, schema.fields, parseTimestamp ? { parseTimestamp } : {});
  return encodeRecord(schema, values);
}

/**
 * Transcode `lines` into a container written to `sink`. Blank lines are
 * ignored. The sink is closed on return.
 */
export async function transcode(
  schema: Schema,
  lines: AsyncIterable<string> | Iterable<string>,
  sink: ByteSink,
  options: TranscodeOptions = {},
): Promise<TranscodeStats> {
  const logger = options.logger ?? silentLogger;
  const policy = options.onError ?? 'abort';
  const writer = new ContainerWriter(sink, {
    logger,
    ...(options.recordsPerBlock === undefined ? {} : { recordsPerBlock: options.recordsPerBlock }),
    ...(options.syncMarker === undefined ? {} : { syncMarker: options.syncMarker }),
  });

  let recordIndex = 0;
  let lineNumber  = 0;
  let skipped     = 0;

  try {
    writer.open(schema);

    for await (const line of lines) {
      lineNumber += 1;
      if (line.trim() === '') continue;

      const index = recordIndex++;
      let encoded: Uint8Array;
      try {
        encoded = encodeLine(schema, line, options.parseTimestamp);
      } catch (err) {
        if (!isRecordError(err)) throw err;
        err.annotate({ recordIndex: index, line: lineNumber });
        if (policy === 'abort') throw err;

        skipped += 1;
        logger.warn('record skipped', { code: err.code, error: err.message, ...err.context });
        continue;
      }
      writer.append(encoded);
    }
  } finally {
    writer.close();
  }

  return { records: writer.recordCount, skipped, blocks: writer.blockCount };
}

/**
 * Read the schema file, stream the input file line by line and write the
 * container to `outputPath`, replacing any existing file.
 */
export async function transcodeFile(
  paths: TranscodePaths,
  options: TranscodeOptions = {},
): Promise<TranscodeStats> {
  const logger = (options.logger ?? silentLogger).child({ input: paths.inputPath });

  let schemaText: string;
  try {
    schemaText = await readFile(paths.schemaPath, 'utf8');
  } catch (err) {
    throw new IoError(`cannot read schema ${paths.schemaPath}`, { cause: err });
  }
  const schema = parseSchema(schemaText);
  logger.debug('schema parsed', {
    name:        schema.name,
    fields:      schema.fields.length,
    fingerprint: schemaFingerprint(schema),
  });

  // Open the input before the output so a missing input leaves no file behind.
  let input: FileHandle;
  try {
    input = await open(paths.inputPath, 'r');
  } catch (err) {
    throw new IoError(`cannot open input ${paths.inputPath}`, { cause: err });
  }

  try {
    const sink = new FileSink(paths.outputPath);
    logger.info('writing output', { path: paths.outputPath });
    return await transcode(schema, input.readLines({ encoding: 'utf8' }), sink, { ...options, logger });
  } catch (err) {
    if (isSystemError(err)) {
      throw new IoError(`reading ${paths.inputPath} failed`, { cause: err });
    }
    throw err;
  } finally {
    await input.close();
  }
}

function isSystemError(err: unknown): boolean {
  return err instanceof Error && !(err instanceof QuarryError) && 'syscall' in err;
}
