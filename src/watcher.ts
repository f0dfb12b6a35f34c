// src/watcher.ts

import type { CoreDeps, ItemSource, Notifier, Summarizer } from './connectors/types';
import type { Release } from './core/normalizer/types';
import type { RunResult } from './pipeline/types';
import type { Settings } from './config/ConfigValidator';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { CheckpointStore } from './core/checkpoint/CheckpointStore';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { GitHubSource } from './connectors/github/GitHubSource';
import { DiscordNotifier } from './connectors/discord/DiscordNotifier';
import { OpenAISummarizer } from './connectors/openai/OpenAISummarizer';
import { DeliveryPipeline } from './pipeline/DeliveryPipeline';
import { pullRequestLane, releaseLane } from './pipeline/lanes';
import { buildReleaseMessage } from './pipeline/messages';

export interface RepoWatcherOverrides {
  logger?: Logger;
  metrics?: MetricsCollector;
  source?: ItemSource;
  summarizer?: Summarizer;
  notifier?: Notifier;
}

/**
 * Wires GitHub, OpenAI, Discord and the checkpoint store into one pipeline.
 */
export class RepoWatcher {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly source: ItemSource;
  readonly summarizer: Summarizer;
  readonly notifier: Notifier;
  private pipeline: DeliveryPipeline;

  /**
   * Build all dependencies before anything reads them
   */
  private constructor(
    readonly settings: Settings,
    overrides: RepoWatcherOverrides
  ) {
    const logger = overrides.logger ?? new Logger(settings.logging);
    const metrics =
      overrides.metrics ??
      new MetricsCollector(
        { enabled: settings.metrics.enabled, textfilePath: settings.metrics.textfilePath },
        logger
      );
    const http = new HttpCore(
      {
        timeout: settings.http.timeout,
        retry: settings.http.retry,
        circuitBreaker: settings.http.circuitBreaker,
        rateLimits: { github: { qps: 10, concurrency: 2 } },
      },
      metrics,
      logger
    );
    const core: CoreDeps = { http, normalizer: new Normalizer(logger), logger, metrics };

    this.logger = logger;
    this.metrics = metrics;
    this.source =
      overrides.source ??
      new GitHubSource(core, {
        repo: settings.github.repo,
        baseBranch: settings.github.baseBranch,
        apiUrl: settings.github.apiUrl,
        token: settings.github.token,
        perPage: settings.github.perPage,
      });
    this.summarizer = overrides.summarizer ?? new OpenAISummarizer(core, settings.openai);
    this.notifier = overrides.notifier ?? new DiscordNotifier(core, settings.discord);

    this.pipeline = new DeliveryPipeline(
      {
        store: new CheckpointStore(settings.statePath, logger),
        notifier: this.notifier,
        logger,
        metrics,
      },
      [pullRequestLane(this.source, this.summarizer, logger), releaseLane(this.source, this.summarizer)],
      { dryRun: settings.dryRun, maxNotificationsPerRun: settings.maxNotificationsPerRun }
    );
  }

  /**
   * @param settings - Validated settings, see `loadSettings`
   * @param overrides - Replacement collaborators, mainly for tests
   */
  static create(settings: Settings, overrides: RepoWatcherOverrides = {}): RepoWatcher {
    const watcher = new RepoWatcher(settings, overrides);

    watcher.logger.info('Watcher initialized', {
      repo: settings.github.repo,
      baseBranch: settings.github.baseBranch,
      dryRun: settings.dryRun,
      statePath: settings.statePath,
      pollIntervalMinutes: settings.pollIntervalMinutes,
    });

    return watcher;
  }

  /**
   * One pipeline run over both lanes. Never rejects.
   */
  async runOnce(): Promise<RunResult> {
    const result = await this.pipeline.run();
    await this.metrics.writeTextfile();
    return result;
  }

  /**
   * Fetch one release by tag and render its notification without touching
   * the checkpoint.
   */
  async renderRelease(tag: string): Promise<{ release: Release; message: string }> {
    const release = await this.source.fetchReleaseByTag(tag);
    const summary = await this.summarizer.summarizeRelease(release);
    return { release, message: buildReleaseMessage(release, summary) };
  }
}
