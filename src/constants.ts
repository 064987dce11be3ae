/**
 * @quarry/core — layout constants
 *
 * These constants define the binary contract of a Quarry container.
 * Any change to the magic bytes or header layout is a BREAKING CHANGE
 * requiring a bump of QUARRY_VERSION.
 *
 * Container layout:
 *
 *   ── Header (written once by ContainerWriter.open) ──────────────────────
 *   [0..3]    magic        4 bytes = QUARRY_MAGIC ('QRRY')
 *   [4]       version      u8      = QUARRY_VERSION
 *   [5..]     schema       varint byte length + UTF-8 canonical schema JSON
 *   [..+16]   sync marker  16 random bytes
 *
 *   ── Block (repeated; one sink write each) ───────────────────────────────
 *   count        zig-zag varint: records in this block
 *   byte_length  zig-zag varint: length of the concatenated record bytes
 *   records      byte_length bytes
 *   sync marker  16 bytes, identical to the header's
 */

// ─── Magic & Version ──────────────────────────────────────────────────────────

/** 'QRRY' in ASCII. First four bytes of every container. */
export const QUARRY_MAGIC: Uint8Array = new Uint8Array([0x51, 0x52, 0x52, 0x59]);

/** Container format version, written as a single byte after the magic. */
export const QUARRY_VERSION = 1;

// ─── Framing ──────────────────────────────────────────────────────────────────

export const SYNC_MARKER_SIZE = 16; // bytes

/** One record per block unless the caller batches. */
export const DEFAULT_RECORDS_PER_BLOCK = 1;

// ─── Integer Bounds ───────────────────────────────────────────────────────────

export const INT32_MIN = -(2n ** 31n);
export const INT32_MAX = 2n ** 31n - 1n;
export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

