// src/core/normalizer/types.ts

/**
 * Anything the watermark core can order and deduplicate.
 */
export interface TimestampedItem {
  readonly id: number;
  readonly timestamp: Date; // UTC instant
}

/**
 * Fields every notification renders, whatever the item kind.
 */
export interface WatchedItem extends TimestampedItem {
  readonly title: string;
  readonly url: string;
}

export interface PullRequest extends WatchedItem {
  readonly kind: 'pullRequest';
  readonly number: number;
}

export interface PullRequestDetail extends PullRequest {
  readonly body: string | null;
}

export interface Release extends WatchedItem {
  readonly kind: 'release';
  readonly tagName: string;
  readonly name: string;
  readonly body: string | null;
  readonly prerelease: boolean;
}
