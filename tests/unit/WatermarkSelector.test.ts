// tests/unit/WatermarkSelector.test.ts

import { describe, it, expect } from 'vitest';
import { selectUnseen, compareItems } from '../../src/core/checkpoint/WatermarkSelector';
import { pullRequest } from '../support/fakes';

const T = '2026-02-17T09:00:00Z';

describe('selectUnseen', () => {
  it('returns everything in delivery order when no watermark is set', () => {
    const items = [
      pullRequest(3, '2026-02-17T09:05:00Z'),
      pullRequest(2, '2026-02-17T09:00:00Z'),
      pullRequest(1, '2026-02-17T09:05:00Z'),
    ];

    expect(selectUnseen(items, null, new Set()).map((item) => item.id)).toEqual([2, 1, 3]);
  });

  it('breaks timestamp ties by seen ids', () => {
    const items = [pullRequest(5, T), pullRequest(6, T)];

    expect(selectUnseen(items, new Date(T), new Set([5])).map((item) => item.id)).toEqual([6]);
  });

  it('drops items older than the watermark and keeps newer ones', () => {
    const items = [
      pullRequest(1, '2026-02-17T08:59:59Z'),
      pullRequest(2, T),
      pullRequest(3, '2026-02-17T09:00:01Z'),
    ];

    expect(selectUnseen(items, new Date(T), new Set()).map((item) => item.id)).toEqual([2, 3]);
  });

  it('ignores seen ids that are not at the watermark', () => {
    const items = [pullRequest(7, '2026-02-17T09:10:00Z')];

    expect(selectUnseen(items, new Date(T), new Set([7])).map((item) => item.id)).toEqual([7]);
  });

  it('selects the unseen sibling and the newer item', () => {
    const items = [pullRequest(30, '2026-02-17T10:01:00Z'), pullRequest(21, '2026-02-17T10:00:00Z')];
    const watermark = new Date('2026-02-17T10:00:00Z');

    expect(selectUnseen(items, watermark, new Set([20])).map((item) => item.id)).toEqual([21, 30]);
  });

  it('reads a watermark string without zone as UTC', () => {
    const items = [pullRequest(1, '2026-02-17T09:00:00Z'), pullRequest(2, '2026-02-17T09:30:00Z')];

    expect(selectUnseen(items, '2026-02-17T09:00:00', new Set([1])).map((item) => item.id)).toEqual([2]);
  });

  it('compares instants across zone offsets', () => {
    const items = [pullRequest(1, '2026-02-17T09:00:00Z')];

    // same instant as the item
    expect(selectUnseen(items, '2026-02-17T18:00:00+09:00', new Set([1]))).toEqual([]);
  });

  it('keeps the last occurrence of a duplicate id', () => {
    const first = pullRequest(9, '2026-02-17T09:00:00Z');
    const second = { ...pullRequest(9, '2026-02-17T09:20:00Z'), title: 'Updated' };

    const result = selectUnseen([first, second], null, new Set());

    expect(result).toHaveLength(1);
    expect(result[0]).toBe(second);
  });

  it('does not mutate its inputs', () => {
    const items = [pullRequest(2, T), pullRequest(1, T)];
    const seen = new Set([1]);

    const result = selectUnseen(items, new Date(T), seen);

    expect(items.map((item) => item.id)).toEqual([2, 1]);
    expect(Array.from(seen)).toEqual([1]);
    expect(result).not.toBe(items);
  });

  it('rejects an unparseable watermark', () => {
    expect(() => selectUnseen([], 'not a date', new Set())).toThrow(RangeError);
  });
});

describe('compareItems', () => {
  it('orders by timestamp, then id', () => {
    const sorted = [pullRequest(4, T), pullRequest(2, '2026-02-17T10:00:00Z'), pullRequest(3, T)].sort(
      compareItems
    );

    expect(sorted.map((item) => item.id)).toEqual([3, 4, 2]);
  });
});
