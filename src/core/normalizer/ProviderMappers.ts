// src/core/normalizer/ProviderMappers.ts

import { z } from 'zod';
import type { PullRequest, PullRequestDetail, Release } from './types';
import { parseInstant } from '../checkpoint/instant';

const OptionalText = z.string().nullable().optional();

export const RawPullRequestSchema = z.object({
  id: z.number().int(),
  number: z.number().int().positive(),
  title: z.string(),
  html_url: z.string().url(),
  merged_at: OptionalText,
  base: z.object({ ref: z.string() }).nullable().optional(),
  body: OptionalText,
});

export const RawReleaseSchema = z.object({
  id: z.number().int(),
  tag_name: OptionalText,
  name: OptionalText,
  html_url: OptionalText,
  published_at: OptionalText,
  body: OptionalText,
  draft: z.boolean().nullable().optional(),
  prerelease: z.boolean().nullable().optional(),
});

export type RawPullRequest = z.infer<typeof RawPullRequestSchema>;
export type RawRelease = z.infer<typeof RawReleaseSchema>;

/** Trimmed text, or null for missing / blank values */
export function optionalText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const normalized = value.trim();
  return normalized || null;
}

export function mapPullRequest(raw: RawPullRequest, mergedAt: string): PullRequest {
  return {
    kind: 'pullRequest',
    id: raw.id,
    number: raw.number,
    title: raw.title,
    url: raw.html_url,
    timestamp: parseInstant(mergedAt),
  };
}

export function mapPullRequestDetail(raw: RawPullRequest, mergedAt: string): PullRequestDetail {
  return {
    ...mapPullRequest(raw, mergedAt),
    body: optionalText(raw.body),
  };
}

export function mapRelease(
  raw: RawRelease,
  fields: { tagName: string; htmlUrl: string; publishedAt: string }
): Release {
  const name = optionalText(raw.name) ?? fields.tagName;
  return {
    kind: 'release',
    id: raw.id,
    tagName: fields.tagName,
    name,
    title: name,
    url: fields.htmlUrl,
    timestamp: parseInstant(fields.publishedAt),
    body: optionalText(raw.body),
    prerelease: raw.prerelease ?? false,
  };
}
