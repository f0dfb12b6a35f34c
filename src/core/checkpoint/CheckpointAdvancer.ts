// src/core/checkpoint/CheckpointAdvancer.ts

import type { TimestampedItem } from '../normalizer/types';
import type { Checkpoint, LaneCheckpoint, LaneName } from './types';

/**
 * Lane checkpoint after `delivered` have gone out.
 *
 * The watermark moves to the newest timestamp seen so far and never backwards.
 * `seenIds` keeps every id stamped exactly at that watermark, so siblings
 * sharing a coarse timestamp are neither skipped nor repeated on the next run.
 */
export function advanceLane(
  current: LaneCheckpoint,
  delivered: readonly TimestampedItem[]
): LaneCheckpoint {
  if (delivered.length === 0) {
    return current;
  }

  let max = current.watermark?.getTime() ?? Number.NEGATIVE_INFINITY;
  for (const item of delivered) {
    max = Math.max(max, item.timestamp.getTime());
  }

  const seenIds = new Set<number>();
  if (current.watermark?.getTime() === max) {
    current.seenIds.forEach((id) => seenIds.add(id));
  }
  for (const item of delivered) {
    if (item.timestamp.getTime() === max) {
      seenIds.add(item.id);
    }
  }

  return { watermark: new Date(max), seenIds };
}

export function withLane(checkpoint: Checkpoint, lane: LaneName, next: LaneCheckpoint): Checkpoint {
  return { ...checkpoint, [lane]: next };
}
