// src/core/checkpoint/BootstrapPolicy.ts

import type { TimestampedItem } from '../normalizer/types';
import type { LaneCheckpoint } from './types';
import { advanceLane } from './CheckpointAdvancer';

/**
 * A lane that has never recorded a watermark must not flood the channel with
 * its historical backlog.
 */
export function isBootstrapPending(lane: LaneCheckpoint): boolean {
  return lane.watermark === null;
}

/**
 * Checkpoint that treats the whole batch as already delivered, or null when
 * the batch is empty (the lane stays pending and is retried next run).
 */
export function bootstrapLane(
  lane: LaneCheckpoint,
  batch: readonly TimestampedItem[]
): LaneCheckpoint | null {
  if (batch.length === 0) {
    return null;
  }
  return advanceLane(lane, batch);
}
