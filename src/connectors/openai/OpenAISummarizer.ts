// src/connectors/openai/OpenAISummarizer.ts

import { z } from 'zod';
import type { CoreDeps, ItemSummary, Summarizer } from '../types';
import type { PullRequest, PullRequestDetail, Release } from '../../core/normalizer/types';
import type { LaneName } from '../../core/checkpoint/types';
import { SummarizeError, WatchError, errorMessage } from '../../utils/errors';
import { addSpanEvent } from '../../observability/tracing';

export interface OpenAISummarizerOptions {
  apiKey?: string;
  model: string;
  apiUrl: string;
  summaryLanguage: string;
}

export const FALLBACK_PULL_REQUEST_SUMMARY: Readonly<ItemSummary> = Object.freeze({
  overview: 'The summary for this pull request could not be generated. Please read the PR description.',
  featureDetails: 'The OpenAI API request failed, so this section shows a fallback message.',
  enabledOutcomes: 'Notifications keep flowing; follow the PR link to review the changes.',
});

export const FALLBACK_RELEASE_SUMMARY: Readonly<ItemSummary> = Object.freeze({
  overview: 'The summary for this release could not be generated. Please read the release notes.',
  featureDetails: 'The OpenAI API request failed, so this section shows a fallback message.',
  enabledOutcomes: 'Notifications keep flowing; follow the release link to review the changes.',
});

const PULL_REQUEST_SYSTEM_PROMPT =
  'You summarize merged GitHub pull requests. Return valid JSON only with keys ' +
  'overview, feature_details, enabled_outcomes. Keep each value concise.';

const RELEASE_SYSTEM_PROMPT =
  'You summarize GitHub releases. Return valid JSON only with keys ' +
  'overview, feature_details, enabled_outcomes. Keep each value concise.';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

const SummaryField = (field: string) =>
  z
    .string({
      required_error: `Summary field '${field}' must be text`,
      invalid_type_error: `Summary field '${field}' must be text`,
    })
    .trim()
    .min(1, `Summary field '${field}' must not be empty`);

const SummaryPayloadSchema = z
  .object(
    {
      overview: SummaryField('overview'),
      feature_details: SummaryField('feature_details'),
      enabled_outcomes: SummaryField('enabled_outcomes'),
    },
    { invalid_type_error: 'OpenAI response JSON must be an object' }
  )
  .transform(
    (payload): ItemSummary => ({
      overview: payload.overview,
      featureDetails: payload.feature_details,
      enabledOutcomes: payload.enabled_outcomes,
    })
  );

/**
 * Three-part summaries from the OpenAI chat completions API. Any model or
 * transport problem is logged and answered with a fixed fallback summary.
 */
export class OpenAISummarizer implements Summarizer {
  constructor(
    private deps: Pick<CoreDeps, 'http' | 'logger' | 'metrics'>,
    private options: OpenAISummarizerOptions
  ) {}

  async summarizePullRequest(pr: PullRequest, detail?: PullRequestDetail): Promise<ItemSummary> {
    try {
      return await this.requestSummary(PULL_REQUEST_SYSTEM_PROMPT, this.pullRequestPrompt(pr, detail));
    } catch (error) {
      return this.fallback(error, 'pullRequests', FALLBACK_PULL_REQUEST_SUMMARY, {
        number: pr.number,
      });
    }
  }

  async summarizeRelease(release: Release): Promise<ItemSummary> {
    try {
      return await this.requestSummary(RELEASE_SYSTEM_PROMPT, this.releasePrompt(release));
    } catch (error) {
      return this.fallback(error, 'releases', FALLBACK_RELEASE_SUMMARY, {
        tag: release.tagName,
      });
    }
  }

  private fallback(
    error: unknown,
    lane: LaneName,
    summary: Readonly<ItemSummary>,
    meta: Record<string, unknown>
  ): ItemSummary {
    if (!(error instanceof SummarizeError)) {
      throw error;
    }

    this.deps.logger.warn('Falling back to static summary', {
      ...meta,
      error: error.message,
    });
    this.deps.metrics.incrementCounter('summary_fallbacks', { lane });
    addSpanEvent('summary.fallback', { lane, reason: error.message });

    return { ...summary };
  }

  private async requestSummary(systemPrompt: string, userPrompt: string): Promise<ItemSummary> {
    if (!this.options.apiKey) {
      throw new SummarizeError('OPENAI_API_KEY is not configured');
    }

    let data: unknown;
    try {
      const response = await this.deps.http.post(
        `${this.options.apiUrl.replace(/\/+$/, '')}/chat/completions`,
        {
          model: this.options.model,
          temperature: 0.2,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
        },
        {
          provider: 'openai',
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
          },
        }
      );
      data = response.data;
    } catch (error) {
      // HttpCore failures (status, timeout, circuit breaker) all extend WatchError
      if (error instanceof WatchError) {
        throw new SummarizeError(`OpenAI request failed: ${error.message}`, { code: error.code });
      }
      throw error;
    }

    const completion = ChatCompletionSchema.safeParse(data);
    if (!completion.success) {
      throw new SummarizeError('OpenAI response payload must include message content');
    }

    const content = completion.data.choices[0]?.message.content;
    if (typeof content !== 'string' || !content.trim()) {
      throw new SummarizeError('OpenAI response content must be non-empty text');
    }

    let payload: unknown;
    try {
      payload = JSON.parse(content);
    } catch (error) {
      throw new SummarizeError('OpenAI response must be valid JSON', { cause: errorMessage(error) });
    }

    const summary = SummaryPayloadSchema.safeParse(payload);
    if (!summary.success) {
      throw new SummarizeError(summary.error.issues[0]?.message ?? 'Invalid summary payload');
    }
    return summary.data;
  }

  private pullRequestPrompt(pr: PullRequest, detail?: PullRequestDetail): string {
    const lines = [
      `Summarize this merged PR in ${this.options.summaryLanguage}.`,
      `PR number: ${pr.number}`,
      `Title: ${pr.title}`,
      `URL: ${pr.url}`,
    ];
    if (detail?.body) {
      lines.push('Body:', detail.body);
    }
    return lines.join('\n');
  }

  private releasePrompt(release: Release): string {
    const lines = [
      `Summarize this GitHub release in ${this.options.summaryLanguage}.`,
      `Release tag: ${release.tagName}`,
      `Release name: ${release.name}`,
      `URL: ${release.url}`,
      `Published at: ${release.timestamp.toISOString()}`,
    ];
    if (release.body) {
      lines.push('Body:', release.body);
    }
    return lines.join('\n');
  }
}
