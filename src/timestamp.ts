import { ParseError } from './errors';
import type { Instant } from './types';

/** Converts timestamp text to a UTC instant, throwing ParseError on bad input. */
export type TimestampParser = (text: string) => Instant;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})\.(\d{3})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse `YYYY-MM-DD HH:mm:ss.SSS`. The text carries no offset and is always
 * read as UTC; no zone inference is attempted.
 */
export const parseTimestamp: TimestampParser = (text) => {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (match === null) {
    throw new ParseError(`timestamp '${text}' does not match YYYY-MM-DD HH:mm:ss.SSS`);
  }

  const [year, month, day, hour, minute, second, millis] = match.slice(1).map(Number);
  if (
    year === undefined || month === undefined || day === undefined ||
    hour === undefined || minute === undefined || second === undefined ||
    millis === undefined
  ) {
    throw new ParseError(`timestamp '${text}' is incomplete`);
  }

  if (month < 1 || month > 12)                   throw new ParseError(`timestamp '${text}': month out of range`);
  if (day < 1 || day > daysInMonth(year, month)) throw new ParseError(`timestamp '${text}': day out of range`);
  if (hour > 23)                                 throw new ParseError(`timestamp '${text}': hour out of range`);
  if (minute > 59)                               throw new ParseError(`timestamp '${text}': minute out of range`);
  if (second > 59)                               throw new ParseError(`timestamp '${text}': second out of range`);

  // setUTCFullYear, unlike Date.UTC, does not remap years 0–99 onto 1900–1999.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);

  return { epochMillis: BigInt(date.getTime()) };
};
