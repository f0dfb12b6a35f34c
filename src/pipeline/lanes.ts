// src/pipeline/lanes.ts

import type { ItemSource, Summarizer } from '../connectors/types';
import type { PullRequest, PullRequestDetail, Release } from '../core/normalizer/types';
import type { Logger } from '../observability/Logger';
import type { Lane } from './types';
import { buildPullRequestMessage, buildReleaseMessage } from './messages';
import { WatchError } from '../utils/errors';

export function pullRequestLane(
  source: ItemSource,
  summarizer: Summarizer,
  logger: Logger
): Lane<PullRequest> {
  return {
    name: 'pullRequests',
    label: 'merged pull requests',
    fetch: () => source.fetchMergedPullRequests(),
    async render(pr) {
      let detail: PullRequestDetail | undefined;
      try {
        detail = await source.fetchPullRequestDetail(pr.number);
      } catch (error) {
        if (!(error instanceof WatchError)) throw error;
        logger.warn('Pull request detail unavailable, summarizing from list item', {
          number: pr.number,
          error: error.message,
          code: error.code,
        });
      }

      const summary = await summarizer.summarizePullRequest(pr, detail);
      return buildPullRequestMessage(detail ?? pr, summary);
    },
  };
}

export function releaseLane(source: ItemSource, summarizer: Summarizer): Lane<Release> {
  return {
    name: 'releases',
    label: 'releases',
    fetch: () => source.fetchReleases(),
    async render(release) {
      const summary = await summarizer.summarizeRelease(release);
      return buildReleaseMessage(release, summary);
    },
  };
}
