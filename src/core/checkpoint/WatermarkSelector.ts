// src/core/checkpoint/WatermarkSelector.ts

import type { TimestampedItem } from '../normalizer/types';
import { toInstant } from './instant';

/**
 * Delivery order: timestamp ascending, then id ascending.
 */
export function compareItems(a: TimestampedItem, b: TimestampedItem): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;
}

/**
 * Items of `items` not yet delivered according to a lane's watermark, in
 * delivery order.
 *
 * Duplicate ids are collapsed first; the last occurrence in `items` wins.
 * A watermark given as text without a zone designator is read as UTC.
 * Pure: inputs are never mutated.
 */
export function selectUnseen<T extends TimestampedItem>(
  items: readonly T[],
  watermark: Date | string | null,
  seenIds: ReadonlySet<number>
): T[] {
  const byId = new Map<number, T>();
  for (const item of items) {
    byId.set(item.id, item);
  }

  const boundary = watermark === null ? null : toInstant(watermark).getTime();
  const unique = Array.from(byId.values()).sort(compareItems);

  if (boundary === null) {
    return unique;
  }

  return unique.filter((item) => {
    const at = item.timestamp.getTime();
    if (at < boundary) return false;
    if (at > boundary) return true;
    return !seenIds.has(item.id);
  });
}
