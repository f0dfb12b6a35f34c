// src/core/checkpoint/types.ts

/**
 * Progress of one item stream. `seenIds` only covers items stamped exactly
 * at `watermark`; anything earlier is implicitly seen, anything later is not.
 * A null watermark always comes with an empty `seenIds`.
 */
export interface LaneCheckpoint {
  readonly watermark: Date | null;
  readonly seenIds: ReadonlySet<number>;
}

export interface Checkpoint {
  readonly pullRequests: LaneCheckpoint;
  readonly releases: LaneCheckpoint;
}

export type LaneName = keyof Checkpoint;

export function emptyLane(): LaneCheckpoint {
  return { watermark: null, seenIds: new Set() };
}

export function emptyCheckpoint(): Checkpoint {
  return { pullRequests: emptyLane(), releases: emptyLane() };
}
