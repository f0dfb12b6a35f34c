// src/pipeline/messages.ts

import type { PullRequest, Release, WatchedItem } from '../core/normalizer/types';
import type { ItemSummary } from '../connectors/types';
import { formatInstant } from '../core/checkpoint/instant';

export interface MessageLines {
  /** e.g. `PR: #12 Fix parser` */
  label: string;
  timestampLabel: string;
}

/**
 * Discord markdown for one notification.
 *
 * @throws {Error} when the item has no title or URL
 */
export function renderNotification(
  heading: string,
  item: WatchedItem,
  lines: MessageLines,
  summary: ItemSummary
): string {
  requireText(item.title, 'title');
  const url = requireText(item.url, 'url');

  return [
    `### ${heading}`,
    `- ${lines.label}`,
    `- URL: ${url}`,
    `- ${lines.timestampLabel}: ${formatInstant(item.timestamp)}`,
    '',
    'Overview',
    summary.overview,
    '',
    'What changed',
    summary.featureDetails,
    '',
    'What it enables',
    summary.enabledOutcomes,
  ].join('\n');
}

export function buildPullRequestMessage(pr: PullRequest, summary: ItemSummary): string {
  return renderNotification(
    'Pull request merged',
    pr,
    { label: `PR: #${pr.number} ${pr.title.trim()}`, timestampLabel: 'Merged at' },
    summary
  );
}

export function buildReleaseMessage(release: Release, summary: ItemSummary): string {
  return renderNotification(
    'Release published',
    release,
    {
      label: `Release: ${release.tagName.trim()} (${release.name.trim()})`,
      timestampLabel: 'Published at',
    },
    summary
  );
}

function requireText(value: string, field: string): string {
  const text = value.trim();
  if (!text) {
    throw new Error(`Notification field '${field}' must not be empty`);
  }
  return text;
}
