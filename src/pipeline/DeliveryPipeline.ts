// src/pipeline/DeliveryPipeline.ts

import type { Checkpoint } from '../core/checkpoint/types';
import type { WatchedItem } from '../core/normalizer/types';
import type { Notifier } from '../connectors/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import type { CheckpointRepository, Lane, PipelineOptions, RunOutcome, RunResult } from './types';
import { selectUnseen } from '../core/checkpoint/WatermarkSelector';
import { advanceLane, withLane } from '../core/checkpoint/CheckpointAdvancer';
import { bootstrapLane, isBootstrapPending } from '../core/checkpoint/BootstrapPolicy';
import { generateCorrelationId, withDeliverySpan, withSpan } from '../observability/tracing';
import {
  DeliveryError,
  PersistenceError,
  SourceFetchError,
  WatchError,
  errorMessage,
} from '../utils/errors';

export interface PipelineDeps {
  store: CheckpointRepository;
  notifier: Notifier;
  logger: Logger;
  metrics: MetricsCollector;
}

const SUCCESS_MESSAGES: Record<'dry-run' | 'no-updates' | 'bootstrapped' | 'delivered', string> = {
  'dry-run': 'dry-run no-op',
  'no-updates': 'no updates',
  bootstrapped: 'bootstrapped without backfill',
  delivered: 'processed notifications',
};

interface FetchedLane {
  lane: Lane;
  batch: readonly WatchedItem[];
}

/**
 * One polling run: load the checkpoint, fetch every lane, then deliver unseen
 * items one at a time, committing the checkpoint after each. Lanes run in the
 * order given and share the per-run delivery cap.
 */
export class DeliveryPipeline {
  constructor(
    private deps: PipelineDeps,
    private lanes: readonly Lane[],
    private options: PipelineOptions
  ) {}

  /**
   * Never rejects; every failure is reported through the result.
   */
  async run(): Promise<RunResult> {
    const runId = generateCorrelationId();
    const logger = this.deps.logger.child({ runId });
    const startTime = Date.now();

    const result = await withSpan('Pipeline run', () => this.execute(logger), { 'run.id': runId });

    this.deps.metrics.recordLatency('run_duration', Date.now() - startTime, {
      outcome: result.outcome,
    });
    const meta = {
      outcome: result.outcome,
      deliveredCount: result.deliveredCount,
      message: result.message,
    };
    if (result.success) {
      logger.info('Run finished', meta);
    } else {
      logger.error('Run failed', { ...meta, code: result.error?.code });
    }
    return result;
  }

  private async execute(logger: Logger): Promise<RunResult> {
    if (this.options.dryRun) {
      logger.info('Dry run enabled, skipping GitHub, OpenAI and Discord calls');
      return succeeded('dry-run', 0);
    }

    let checkpoint: Checkpoint;
    try {
      checkpoint = await this.deps.store.load();
    } catch (error) {
      return failed(asWatchError(error, (message) => new PersistenceError(message)), 0);
    }

    const fetched: FetchedLane[] = [];
    for (const lane of this.lanes) {
      try {
        fetched.push({ lane, batch: await lane.fetch() });
      } catch (error) {
        return failed(
          new SourceFetchError(`Failed to fetch ${lane.label}: ${errorMessage(error)}`, {
            lane: lane.name,
            code: error instanceof WatchError ? error.code : undefined,
          }),
          0
        );
      }
    }

    let delivered = 0;
    let bootstrapped = false;
    let capReached = false;

    for (const { lane, batch } of fetched) {
      const laneLogger = logger.child({ lane: lane.name });
      const current = checkpoint[lane.name];

      if (isBootstrapPending(current)) {
        const next = bootstrapLane(current, batch);
        if (next === null) {
          laneLogger.info('Nothing to bootstrap from yet, lane stays pending');
          continue;
        }

        try {
          checkpoint = await this.commit(withLane(checkpoint, lane.name, next));
        } catch (error) {
          return failed(asPersistenceError(error), delivered);
        }

        bootstrapped = true;
        this.deps.metrics.incrementCounter('lane_bootstraps', { lane: lane.name });
        laneLogger.info('Lane bootstrapped without backfill', {
          skipped: batch.length,
          watermark: next.watermark?.toISOString(),
        });
        continue;
      }

      const unseen = selectUnseen(batch, current.watermark, current.seenIds);
      laneLogger.debug('Selected unseen items', { fetched: batch.length, unseen: unseen.length });

      for (const item of unseen) {
        if (delivered >= this.options.maxNotificationsPerRun) {
          capReached = true;
          break;
        }

        try {
          await withDeliverySpan(lane.name, item.id, async () => {
            const content = await lane.render(item);
            await this.deps.notifier.send(content);
          });
        } catch (error) {
          this.deps.metrics.incrementCounter('notification_failures', { lane: lane.name });
          return failed(
            error instanceof DeliveryError
              ? error
              : new DeliveryError(
                  `Failed to deliver ${lane.name} item ${item.id}: ${errorMessage(error)}`,
                  {
                    lane: lane.name,
                    itemId: item.id,
                    code: error instanceof WatchError ? error.code : undefined,
                  }
                ),
            delivered
          );
        }

        try {
          checkpoint = await this.commit(
            withLane(checkpoint, lane.name, advanceLane(checkpoint[lane.name], [item]))
          );
        } catch (error) {
          return failed(asPersistenceError(error), delivered);
        }

        delivered += 1;
        this.deps.metrics.incrementCounter('notifications_delivered', { lane: lane.name });
        laneLogger.info('Notification delivered', { itemId: item.id, title: item.title });
      }
    }

    if (delivered > 0) {
      return capReached
        ? {
            ...succeeded('delivered', delivered),
            message: `${SUCCESS_MESSAGES.delivered} (delivery cap reached)`,
          }
        : succeeded('delivered', delivered);
    }
    return succeeded(bootstrapped ? 'bootstrapped' : 'no-updates', 0);
  }

  private async commit(checkpoint: Checkpoint): Promise<Checkpoint> {
    try {
      await this.deps.store.save(checkpoint);
    } catch (error) {
      this.deps.metrics.incrementCounter('checkpoint_saves', { status: 'failure' });
      throw error;
    }
    this.deps.metrics.incrementCounter('checkpoint_saves', { status: 'success' });
    return checkpoint;
  }
}

function succeeded(outcome: keyof typeof SUCCESS_MESSAGES, deliveredCount: number): RunResult {
  return { success: true, deliveredCount, message: SUCCESS_MESSAGES[outcome], outcome };
}

function failed(error: WatchError, deliveredCount: number): RunResult {
  const outcome: RunOutcome = deliveredCount > 0 ? 'partial' : 'failed';
  return { success: false, deliveredCount, message: error.message, outcome, error };
}

/** Keeps typed errors as they are; anything else is wrapped by `wrap`. */
function asWatchError(error: unknown, wrap: (message: string) => WatchError): WatchError {
  return error instanceof WatchError ? error : wrap(errorMessage(error));
}

function asPersistenceError(error: unknown): WatchError {
  return error instanceof PersistenceError
    ? error
    : new PersistenceError(`Failed to save checkpoint: ${errorMessage(error)}`);
}
