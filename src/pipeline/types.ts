// src/pipeline/types.ts

import type { WatchedItem } from '../core/normalizer/types';
import type { Checkpoint, LaneName } from '../core/checkpoint/types';
import type { WatchError } from '../utils/errors';

export type RunOutcome = 'dry-run' | 'no-updates' | 'bootstrapped' | 'delivered' | 'partial' | 'failed';

export interface RunResult {
  success: boolean; // false for 'partial' and 'failed'
  deliveredCount: number; // both lanes
  message: string;
  outcome: RunOutcome;
  error?: WatchError;
}

/**
 * One stream of watched items with its own checkpoint lane.
 */
export interface Lane<T extends WatchedItem = WatchedItem> {
  readonly name: LaneName;
  /** Human readable, used in logs and error messages */
  readonly label: string;
  fetch(): Promise<readonly T[]>;
  render(item: T): Promise<string>;
}

export interface CheckpointRepository {
  load(): Promise<Checkpoint>;
  save(checkpoint: Checkpoint): Promise<void>;
}

export interface PipelineOptions {
  dryRun: boolean;
  maxNotificationsPerRun: number;
}
