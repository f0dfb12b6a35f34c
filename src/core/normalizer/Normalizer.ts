// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { PullRequest, PullRequestDetail, Release } from './types';
import type { Logger } from '../../observability/Logger';
import {
  RawPullRequestSchema,
  RawReleaseSchema,
  mapPullRequest,
  mapPullRequestDetail,
  mapRelease,
  optionalText,
  type RawRelease,
} from './ProviderMappers';
import { compareItems } from '../checkpoint/WatermarkSelector';
import { UnexpectedPayloadError } from '../../utils/errors';

const RowListSchema = z.array(z.unknown());

/**
 * Turns raw GitHub REST payloads into typed items. List endpoints skip rows
 * that are not eligible (unmerged, other base branch, drafts, pre-releases);
 * single-resource endpoints throw instead.
 */
export class Normalizer {
  constructor(private logger?: Logger) {}

  pullRequests(raw: unknown, baseBranch: string): PullRequest[] {
    const items: PullRequest[] = [];

    for (const row of this.rows(raw, 'pull request list')) {
      const parsed = RawPullRequestSchema.safeParse(row);
      if (!parsed.success) {
        this.logger?.debug('Skipping malformed pull request row', {
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        });
        continue;
      }

      const pr = parsed.data;
      const mergedAt = pr.merged_at;
      if (typeof mergedAt !== 'string') continue;
      if (pr.base?.ref !== baseBranch) continue;

      const item = this.tryMap(() => mapPullRequest(pr, mergedAt), pr.id);
      if (item) items.push(item);
    }

    return items.sort(compareItems);
  }

  pullRequestDetail(raw: unknown): PullRequestDetail {
    const parsed = RawPullRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnexpectedPayloadError('Unexpected GitHub pull request payload', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const mergedAt = parsed.data.merged_at;
    if (typeof mergedAt !== 'string') {
      throw new UnexpectedPayloadError('Pull request detail must include merged_at', {
        number: parsed.data.number,
      });
    }

    return mapPullRequestDetail(parsed.data, mergedAt);
  }

  releases(raw: unknown): Release[] {
    const items: Release[] = [];

    for (const row of this.rows(raw, 'release list')) {
      const parsed = RawReleaseSchema.safeParse(row);
      if (!parsed.success) {
        this.logger?.debug('Skipping malformed release row', {
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        });
        continue;
      }

      const release = parsed.data;
      if (release.draft) continue;

      const fields = releaseFields(release);
      if (!fields) continue;

      const name = optionalText(release.name) ?? fields.tagName;
      if (shouldIgnoreRelease(fields.tagName, name, release.prerelease ?? false)) continue;

      const item = this.tryMap(() => mapRelease(release, fields), release.id);
      if (item) items.push(item);
    }

    return items.sort(compareItems);
  }

  /**
   * A single release, looked up by tag. Pre-releases are not filtered here:
   * the caller asked for this tag explicitly.
   */
  release(raw: unknown): Release {
    const parsed = RawReleaseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnexpectedPayloadError('Unexpected GitHub release payload', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const fields = releaseFields(parsed.data);
    if (!fields) {
      throw new UnexpectedPayloadError('Release must include tag_name, html_url and published_at', {
        id: parsed.data.id,
      });
    }
    return mapRelease(parsed.data, fields);
  }

  private rows(raw: unknown, what: string): unknown[] {
    const parsed = RowListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnexpectedPayloadError(`Unexpected GitHub API response format for ${what}`);
    }
    return parsed.data;
  }

  private tryMap<T>(map: () => T, id: number): T | undefined {
    try {
      return map();
    } catch (error) {
      this.logger?.debug('Skipping row with invalid timestamp', {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }
}

function releaseFields(
  release: RawRelease
): { tagName: string; htmlUrl: string; publishedAt: string } | null {
  const tagName = optionalText(release.tag_name);
  const htmlUrl = optionalText(release.html_url);
  const publishedAt = optionalText(release.published_at);
  if (!tagName || !htmlUrl || !publishedAt) return null;
  return { tagName, htmlUrl, publishedAt };
}

export function shouldIgnoreRelease(tagName: string, name: string, prerelease: boolean): boolean {
  if (prerelease) return true;

  const text = `${tagName} ${name}`.toLowerCase();
  return text.includes('alpha') || text.includes('α');
}
