import { describe, it, expect } from 'vitest';
import { isLosslessNumber } from 'lossless-json';
import { decodeJsonLine, ParseError, type JsonValue } from '../src/index';

function numberText(value: JsonValue | undefined): string | undefined {
  return value !== undefined && isLosslessNumber(value) ? value.value : undefined;
}

describe('decodeJsonLine', () => {
  it('decodes objects into Maps in source order', () => {
    const record = decodeJsonLine('{"b": true, "a": "x", "c": null}');
    expect([...record.keys()]).toEqual(['b', 'a', 'c']);
    expect(record.get('a')).toBe('x');
    expect(record.get('b')).toBe(true);
    expect(record.get('c')).toBeNull();
  });

  it('keeps the exact lexical form of numbers', () => {
    const record = decodeJsonLine('{"big": 100000000000000000001, "dec": 23.250, "exp": 1.5e-7}');
    expect(numberText(record.get('big'))).toBe('100000000000000000001');
    expect(numberText(record.get('dec'))).toBe('23.250');
    expect(numberText(record.get('exp'))).toBe('1.5e-7');
  });

  it('decodes nested objects and arrays', () => {
    const record = decodeJsonLine('{"customer": {"id": "c-1"}, "tags": ["a", 1]}');

    const customer = record.get('customer');
    expect(customer).toBeInstanceOf(Map);
    expect(customer instanceof Map && customer.get('id')).toBe('c-1');

    const tags = record.get('tags');
    expect(Array.isArray(tags)).toBe(true);
    expect(Array.isArray(tags) && tags[0]).toBe('a');
  });

  it('rejects malformed JSON with ParseError', () => {
    expect(() => decodeJsonLine('{"eventType": ')).toThrow(ParseError);
    expect(() => decodeJsonLine('not json')).toThrow(ParseError);
    expect(() => decodeJsonLine('{"a": 1} trailing')).toThrow(ParseError);
  });

  it('rejects a root that is not an object', () => {
    expect(() => decodeJsonLine('[1, 2]')).toThrow('record must be a JSON object');
    expect(() => decodeJsonLine('"text"')).toThrow('record must be a JSON object');
    expect(() => decodeJsonLine('null')).toThrow('record must be a JSON object');
  });
});
