// tests/support/fakes.ts

import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { emptyCheckpoint, type Checkpoint } from '../../src/core/checkpoint/types';
import type { PullRequest, PullRequestDetail, Release } from '../../src/core/normalizer/types';
import type { CheckpointRepository } from '../../src/pipeline/types';
import type { CoreDeps, ItemSource, ItemSummary, Notifier, Summarizer } from '../../src/connectors/types';
import type { RetryConfig } from '../../src/core/http/types';
import { HttpCore } from '../../src/core/http/HttpCore';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { ApiClientError, DeliveryError, PersistenceError } from '../../src/utils/errors';

export function silentLogger(): Logger {
  return new Logger({ silent: true });
}

export function testMetrics(): MetricsCollector {
  return new MetricsCollector({ enabled: true });
}

export const NO_RETRY: RetryConfig = {
  maxRetries: 0,
  baseDelay: 10,
  maxDelay: 50,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

/** Real HttpCore (stubbed with nock in tests), silent logger, fresh registry */
export function testCore(retry: RetryConfig = NO_RETRY): CoreDeps {
  const logger = silentLogger();
  const metrics = testMetrics();
  return {
    http: new HttpCore({ timeout: 2000, retry }, metrics, logger),
    normalizer: new Normalizer(logger),
    logger,
    metrics,
  };
}

export function pullRequest(id: number, mergedAt: string, number: number = id): PullRequest {
  return {
    kind: 'pullRequest',
    id,
    number,
    title: `Change ${number}`,
    url: `https://github.com/acme/widgets/pull/${number}`,
    timestamp: new Date(mergedAt),
  };
}

export function release(id: number, publishedAt: string, tagName: string = `v1.${id}.0`): Release {
  return {
    kind: 'release',
    id,
    tagName,
    name: tagName,
    title: tagName,
    url: `https://github.com/acme/widgets/releases/tag/${tagName}`,
    timestamp: new Date(publishedAt),
    body: null,
    prerelease: false,
  };
}

/**
 * In-memory checkpoint record; `events` is shared with RecordingNotifier to
 * assert interleaving.
 */
export class MemoryCheckpointStore implements CheckpointRepository {
  saves: Checkpoint[] = [];
  loadError?: Error;
  /** 1-based index of the save call that fails */
  failOnSave?: number;

  constructor(
    public current: Checkpoint = emptyCheckpoint(),
    public events: string[] = []
  ) {}

  async load(): Promise<Checkpoint> {
    this.events.push('load');
    if (this.loadError) throw this.loadError;
    return this.current;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const attempt = this.saves.length + 1;
    this.events.push(`save:${attempt}`);
    if (this.failOnSave === attempt) {
      this.failOnSave = undefined;
      throw new PersistenceError('Failed to save checkpoint atomically: memory');
    }
    this.saves.push(checkpoint);
    this.current = checkpoint;
  }
}

export class RecordingNotifier implements Notifier {
  sent: string[] = [];
  /** Messages containing this text are rejected */
  failWhen?: string;

  constructor(public events: string[] = []) {}

  async send(content: string): Promise<void> {
    this.events.push('send');
    if (this.failWhen !== undefined && content.includes(this.failWhen)) {
      throw new DeliveryError('Discord rejected the message');
    }
    this.sent.push(content);
  }
}

/** GitHub stand-in serving fixed lists */
export class MemorySource implements ItemSource {
  calls: string[] = [];

  constructor(
    public pullRequests: PullRequest[] = [],
    public releases: Release[] = []
  ) {}

  async fetchMergedPullRequests(): Promise<PullRequest[]> {
    this.calls.push('pulls');
    return [...this.pullRequests];
  }

  async fetchPullRequestDetail(number: number): Promise<PullRequestDetail> {
    this.calls.push(`pull:${number}`);
    const pr = this.pullRequests.find((candidate) => candidate.number === number);
    if (!pr) throw new ApiClientError('Client error: 404', 404);
    return { ...pr, body: `Body of #${number}` };
  }

  async fetchReleases(): Promise<Release[]> {
    this.calls.push('releases');
    return [...this.releases];
  }

  async fetchReleaseByTag(tag: string): Promise<Release> {
    this.calls.push(`release:${tag}`);
    const found = this.releases.find((candidate) => candidate.tagName === tag);
    if (!found) throw new ApiClientError('Client error: 404', 404);
    return found;
  }
}

export const STATIC_SUMMARY: ItemSummary = {
  overview: 'Short overview.',
  featureDetails: 'What changed.',
  enabledOutcomes: 'What it enables.',
};

export class StaticSummarizer implements Summarizer {
  async summarizePullRequest(): Promise<ItemSummary> {
    return { ...STATIC_SUMMARY };
  }

  async summarizeRelease(): Promise<ItemSummary> {
    return { ...STATIC_SUMMARY };
  }
}
