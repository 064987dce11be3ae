import { closeSync, openSync, writeSync } from 'node:fs';

import { IoError } from './errors';

/**
 * Destination for container bytes. ContainerWriter hands each header and
 * each block over as a single `write` call.
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
  close(): void;
}

/** Collects chunks in memory. */
export class MemorySink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private closed = false;

  write(chunk: Uint8Array): void {
    if (this.closed) throw new IoError('write to a closed MemorySink');
    this.chunks.push(chunk.slice());
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Every chunk written so far, concatenated. */
  bytes(): Uint8Array {
    const total = this.chunks.reduce((n, c) => n + c.length, 0);
    const out   = new Uint8Array(total);
    let   off   = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, off);
      off += chunk.length;
    }
    return out;
  }
}

/**
 * Synchronous file sink. The file is created or truncated on construction.
 * writeSync may accept fewer bytes than offered, so each chunk is written
 * in a loop until it is complete.
 */
export class FileSink implements ByteSink {
  private fd: number | null;

  constructor(readonly path: string) {
    try {
      this.fd = openSync(path, 'w');
    } catch (err) {
      throw new IoError(`cannot open ${path} for writing`, { cause: err });
    }
  }

  write(chunk: Uint8Array): void {
    if (this.fd === null) throw new IoError(`write to closed file ${this.path}`);
    try {
      let offset = 0;
      while (offset < chunk.length) {
        offset += writeSync(this.fd, chunk, offset, chunk.length - offset);
      }
    } catch (err) {
      throw new IoError(`write to ${this.path} failed`, { cause: err });
    }
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (err) {
      throw new IoError(`closing ${this.path} failed`, { cause: err });
    }
  }
}
