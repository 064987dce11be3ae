/**
 * @quarry/core — JSON line decoder
 *
 * lossless-json keeps every number as its source text (LosslessNumber), so
 * `23.25` and `100000000000000000001` reach coercion exactly as written.
 * The parsed tree is then rebuilt with Maps for objects.
 */

import { isLosslessNumber, parse } from 'lossless-json';

import { ParseError } from './errors';
import type { JsonObject, JsonValue } from './types';

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return value;
  if (isLosslessNumber(value)) return value;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const out = new Map<string, JsonValue>();
    for (const [key, entry] of Object.entries(value)) {
      out.set(key, toJsonValue(entry));
    }
    return out;
  }
  throw new ParseError(`unexpected ${typeof value} in decoded JSON`);
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value instanceof Map;
}

/** Decode one input line into a record. The root must be a JSON object. */
export function decodeJsonLine(line: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = parse(line);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`malformed JSON: ${reason}`, { cause: err });
  }

  const value = toJsonValue(parsed);
  if (!isJsonObject(value)) {
    throw new ParseError('record must be a JSON object');
  }
  return value;
}
