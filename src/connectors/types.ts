// src/connectors/types.ts

import type { PullRequest, PullRequestDetail, Release } from '../core/normalizer/types';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface PageParams {
  perPage: number;
  page: number;
}

/**
 * Where watched items come from. List calls return eligible items only,
 * sorted by (timestamp, id).
 */
export interface ItemSource {
  fetchMergedPullRequests(params?: Partial<PageParams>): Promise<PullRequest[]>;
  fetchPullRequestDetail(number: number): Promise<PullRequestDetail>;
  fetchReleases(params?: Partial<PageParams>): Promise<Release[]>;
  fetchReleaseByTag(tag: string): Promise<Release>;
}

export interface ItemSummary {
  overview: string;
  featureDetails: string;
  enabledOutcomes: string;
}

/**
 * Never throws for model trouble: a summarizer falls back to a fixed summary.
 */
export interface Summarizer {
  summarizePullRequest(pr: PullRequest, detail?: PullRequestDetail): Promise<ItemSummary>;
  summarizeRelease(release: Release): Promise<ItemSummary>;
}

/**
 * Resolves once the message is accepted; rejects with DeliveryError otherwise.
 */
export interface Notifier {
  send(content: string): Promise<void>;
}

export interface CoreDeps {
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
