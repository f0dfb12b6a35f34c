// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  /** node-exporter textfile collector target, rewritten after every run */
  textfilePath?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private logger?: Logger;

  constructor(
    private config: MetricsConfig = {},
    logger?: Logger
  ) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.addCounter('http_requests_total', 'Total HTTP requests', ['provider', 'method', 'status']);
    this.addCounter('http_errors', 'HTTP errors', ['provider', 'status'], 'http_errors_total');
    this.addCounter(
      'http_cache_hits',
      'Conditional requests answered from the ETag cache',
      ['provider'],
      'http_cache_hits_total'
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['provider', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Current rate limit queue size',
        labelNames: ['provider'],
        registers: [this.registry],
      })
    );

    // Delivery metrics
    this.addCounter(
      'notifications_delivered',
      'Notifications delivered',
      ['lane'],
      'notifications_delivered_total'
    );
    this.addCounter(
      'notification_failures',
      'Notifications that failed to render or send',
      ['lane'],
      'notification_failures_total'
    );
    this.addCounter(
      'summary_fallbacks',
      'Notifications sent with the fallback summary',
      ['lane'],
      'summary_fallbacks_total'
    );
    this.addCounter(
      'checkpoint_saves',
      'Checkpoint writes',
      ['status'],
      'checkpoint_saves_total'
    );
    this.addCounter(
      'lane_bootstraps',
      'Lanes bootstrapped without backfill',
      ['lane'],
      'lane_bootstraps_total'
    );

    this.histograms.set(
      'run_duration',
      new Histogram({
        name: 'run_duration_seconds',
        help: 'Pipeline run duration',
        labelNames: ['outcome'],
        buckets: [1, 5, 15, 30, 60, 120],
        registers: [this.registry],
      })
    );
  }

  private addCounter(key: string, help: string, labelNames: string[], name: string = key): void {
    this.counters.set(
      key,
      new Counter({
        name,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  /**
   * Write the exposition to `metrics.textfilePath` (temp file + rename so the
   * collector never scrapes a half-written file). No-op when unset.
   */
  async writeTextfile(): Promise<void> {
    const target = this.config.textfilePath;
    if (!target || this.config.enabled === false) return;

    const temp = `${target}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(temp, await this.getMetrics(), 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      this.logger?.warn('Failed to write metrics textfile', {
        path: target,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.removeTemp(temp);
    }
  }

  private async removeTemp(temp: string): Promise<void> {
    try {
      await fs.rm(temp, { force: true });
    } catch (cleanupError) {
      this.logger?.warn('Failed to remove temporary metrics file', {
        path: temp,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    }
  }
}
