// src/core/checkpoint/instant.ts

import { isValid, parseISO } from 'date-fns';

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Parse an ISO 8601 timestamp into a UTC instant. Text without a zone
 * designator is read as UTC.
 *
 * @throws {RangeError} on anything that is not a valid ISO 8601 date-time
 */
export function parseInstant(raw: string): Date {
  const text = raw.trim();
  if (!text) {
    throw new RangeError('ISO 8601 timestamp must not be empty');
  }

  const parsed = parseISO(withUtcZone(text));
  if (!isValid(parsed)) {
    throw new RangeError(`Invalid ISO 8601 timestamp: ${JSON.stringify(raw)}`);
  }
  return parsed;
}

// parseISO reads zone-less text in local time and only knows an uppercase Z
function withUtcZone(text: string): string {
  const separator = text.search(/[T ]/);
  if (separator === -1) {
    return `${text}T00:00:00Z`;
  }
  const time = text.slice(separator + 1);
  return ZONE_DESIGNATOR.test(time) ? text.replace(/z$/, 'Z') : `${text}Z`;
}

/**
 * Accepts an instant or ISO text and returns a valid Date.
 */
export function toInstant(value: Date | string): Date {
  if (typeof value === 'string') {
    return parseInstant(value);
  }
  if (!isValid(value)) {
    throw new RangeError('Invalid Date');
  }
  return value;
}

/**
 * ISO 8601 in UTC with a `Z` suffix; milliseconds only when non-zero.
 */
export function formatInstant(value: Date): string {
  const iso = value.toISOString();
  return value.getUTCMilliseconds() === 0 ? iso.replace('.000Z', 'Z') : iso;
}
