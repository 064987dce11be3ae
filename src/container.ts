/**
 * @quarry/core — ContainerWriter
 *
 * Frames encoded records into a self-describing container.
 *
 * ── States ───────────────────────────────────────────────────────────────────
 *
 *   unopened ──open()──▶ header-written ──append()──▶ block-in-progress
 *                              │                        │    ▲
 *                              │ writeBlock()    flush()│    │append()
 *                              ▼                        ▼    │
 *                         block-flushed ◀───────────────┘────┘
 *
 *   Any state ──close()──▶ closed   (idempotent)
 *
 * ── Atomic blocks ────────────────────────────────────────────────────────────
 *
 * A block (count, byte length, payload, sync marker) is assembled in memory
 * and handed to the sink as ONE write. A record that fails to encode never
 * reaches append(), so an aborted run leaves a file that is a valid
 * container truncated after its last complete block.
 *
 * ── Batching ─────────────────────────────────────────────────────────────────
 *
 * append() buffers encoded records and emits a block once recordsPerBlock are
 * pending. The default of 1 writes one record per block. Any batch size
 * produces the same format; count and byte length keep each block
 * self-describing.
 */

import { randomBytes } from 'node:crypto';

import {
  DEFAULT_RECORDS_PER_BLOCK,
  QUARRY_MAGIC,
  QUARRY_VERSION,
  SYNC_MARKER_SIZE,
} from './constants';
import { BinaryEncoder } from './encoder';
import { ContainerStateError } from './errors';
import { silentLogger, type Logger } from './logger';
import { schemaFingerprint, serializeSchema } from './schema';
import type { ByteSink } from './sink';
import type { Schema } from './types';

export type ContainerState =
  | 'unopened'
  | 'header-written'
  | 'block-in-progress'
  | 'block-flushed'
  | 'closed';

export interface ContainerWriterOptions {
  /** Records per block for append(). Must be a positive integer. */
  readonly recordsPerBlock?: number;
  /** Fixed 16-byte sync marker. Random when omitted. */
  readonly syncMarker?: Uint8Array;
  readonly logger?: Logger;
}

function randomSyncMarker(): Uint8Array {
  return new Uint8Array(randomBytes(SYNC_MARKER_SIZE));
}

export class ContainerWriter {
  private readonly sink:            ByteSink;
  private readonly sync:            Uint8Array;
  private readonly recordsPerBlock: number;
  private readonly logger:          Logger;
  private readonly pending:         Uint8Array[] = [];
  private readonly blockEncoder     = new BinaryEncoder(256);

  private _state:   ContainerState = 'unopened';
  private _blocks  = 0;
  private _records = 0;

  constructor(sink: ByteSink, options: ContainerWriterOptions = {}) {
    const recordsPerBlock = options.recordsPerBlock ?? DEFAULT_RECORDS_PER_BLOCK;
    if (!Number.isInteger(recordsPerBlock) || recordsPerBlock < 1) {
      throw new RangeError(`recordsPerBlock must be a positive integer, got ${recordsPerBlock}`);
    }
    if (options.syncMarker !== undefined && options.syncMarker.length !== SYNC_MARKER_SIZE) {
      throw new RangeError(
        `syncMarker must be ${SYNC_MARKER_SIZE} bytes, got ${options.syncMarker.length}`,
      );
    }

    this.sink            = sink;
    this.sync            = options.syncMarker?.slice() ?? randomSyncMarker();
    this.recordsPerBlock = recordsPerBlock;
    this.logger          = options.logger ?? silentLogger;
  }

  // ── Accessors ─────────────────────────────────────────────────────────────

  get state(): ContainerState {
    return this._state;
  }

  /** Copy of the marker written after the header and after every block. */
  get syncMarker(): Uint8Array {
    return this.sync.slice();
  }

  /** Blocks handed to the sink so far. */
  get blockCount(): number {
    return this._blocks;
  }

  /** Records written in completed blocks (pending records excluded). */
  get recordCount(): number {
    return this._records;
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Write the header: magic, version, canonical schema text, sync marker.
   *
   * @throws ContainerStateError unless the writer is unopened.
   */
  open(schema: Schema): void {
    if (this._state !== 'unopened') {
      throw new ContainerStateError(`open() called in state '${this._state}'`);
    }

    const enc = new BinaryEncoder(256);
    enc.writeFixed(QUARRY_MAGIC);
    enc.writeFixed(Uint8Array.of(QUARRY_VERSION));
    enc.writeString(serializeSchema(schema));
    enc.writeFixed(this.sync);

    this.sink.write(enc.toBytes());
    this._state = 'header-written';

    this.logger.debug('container opened', {
      schema:      schema.name,
      fields:      schema.fields.length,
      fingerprint: schemaFingerprint(schema),
      headerBytes: enc.size,
    });
  }

  /**
   * Buffer one encoded record. Emits a block once recordsPerBlock records
   * are pending.
   */
  append(record: Uint8Array): void {
    this.assertWritable('append');
    this.pending.push(record);
    this._state = 'block-in-progress';
    if (this.pending.length >= this.recordsPerBlock) this.flush();
  }

  /** Emit pending records as one block. No-op when nothing is pending. */
  flush(): void {
    if (this.pending.length === 0) return;
    this.assertWritable('flush');
    this.emitBlock(this.pending.splice(0));
  }

  /**
   * Write `records` as one block. Pending appended records are flushed first
   * so that file order matches call order. An empty list writes nothing.
   */
  writeBlock(records: readonly Uint8Array[]): void {
    this.assertWritable('writeBlock');
    this.flush();
    if (records.length === 0) return;
    this.emitBlock(records);
  }

  /**
   * Flush pending records and close the sink. The sink is closed even when
   * the flush throws. Calling close() again is a no-op.
   */
  close(): void {
    if (this._state === 'closed') return;
    try {
      if (this._state !== 'unopened') this.flush();
    } finally {
      this._state = 'closed';
      this.sink.close();
    }
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private assertWritable(op: string): void {
    if (this._state === 'unopened' || this._state === 'closed') {
      throw new ContainerStateError(`${op}() called in state '${this._state}'`);
    }
  }

  private emitBlock(records: readonly Uint8Array[]): void {
    const byteLength = records.reduce((n, r) => n + r.length, 0);

    const enc = this.blockEncoder;
    enc.reset();
    enc.writeLong(BigInt(records.length));
    enc.writeLong(BigInt(byteLength));
    for (const record of records) enc.writeFixed(record);
    enc.writeFixed(this.sync);

    this.sink.write(enc.toBytes());
    this._state    = 'block-flushed';
    this._blocks  += 1;
    this._records += records.length;

    this.logger.debug('block written', { records: records.length, bytes: byteLength });
  }
}
