// tests/unit/instant.test.ts

import { describe, it, expect } from 'vitest';
import { formatInstant, parseInstant, toInstant } from '../../src/core/checkpoint/instant';

describe('parseInstant', () => {
  it.each([
    ['2026-02-17T09:00:00Z', '2026-02-17T09:00:00.000Z'],
    ['2026-02-17T09:00:00', '2026-02-17T09:00:00.000Z'],
    ['2026-02-17 09:00', '2026-02-17T09:00:00.000Z'],
    ['2026-02-17', '2026-02-17T00:00:00.000Z'],
    ['2026-02-17T09:00:00.5Z', '2026-02-17T09:00:00.500Z'],
    ['2026-02-17T18:00:00+09:00', '2026-02-17T09:00:00.000Z'],
    ['2026-02-17T04:30:00-0430', '2026-02-17T09:00:00.000Z'],
    ['  2026-02-17T09:00:00z  ', '2026-02-17T09:00:00.000Z'],
    ['2026-02-17T24:00:00Z', '2026-02-18T00:00:00.000Z'],
    ['0050-01-01T00:00:00Z', '0050-01-01T00:00:00.000Z'],
  ])('parses %s', (raw, expected) => {
    expect(parseInstant(raw).toISOString()).toBe(expected);
  });

  it.each(['', '   ', 'yesterday', '2026-02-30T00:00:00Z', '2026-13-01', '2026-02-17T25:00:00Z'])(
    'rejects %j',
    (raw) => {
      expect(() => parseInstant(raw)).toThrow(RangeError);
    }
  );
});

describe('toInstant', () => {
  it('passes valid dates through', () => {
    const date = new Date('2026-02-17T09:00:00Z');

    expect(toInstant(date)).toBe(date);
  });

  it('rejects an invalid Date', () => {
    expect(() => toInstant(new Date('nope'))).toThrow('Invalid Date');
  });
});

describe('formatInstant', () => {
  it('omits zero milliseconds', () => {
    expect(formatInstant(new Date('2026-02-17T09:00:00.000Z'))).toBe('2026-02-17T09:00:00Z');
  });

  it('keeps non-zero milliseconds', () => {
    expect(formatInstant(new Date('2026-02-17T09:00:00.123Z'))).toBe('2026-02-17T09:00:00.123Z');
  });
});
