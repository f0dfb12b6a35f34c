// src/connectors/github/GitHubSource.ts

import type { CoreDeps, ItemSource, PageParams } from '../types';
import type { PullRequest, PullRequestDetail, Release } from '../../core/normalizer/types';
import type { HttpResponse } from '../../core/http/types';

export interface GitHubSourceOptions {
  /** `owner/name` */
  repo: string;
  baseBranch: string;
  apiUrl: string;
  token?: string;
  perPage: number;
}

/**
 * Merged pull requests and published releases of one repository, via the
 * GitHub REST API.
 */
export class GitHubSource implements ItemSource {
  constructor(
    private deps: CoreDeps,
    private options: GitHubSourceOptions
  ) {}

  async fetchMergedPullRequests(params?: Partial<PageParams>): Promise<PullRequest[]> {
    const { perPage, page } = this.pageParams(params);

    const response = await this.get(`/pulls`, {
      query: {
        state: 'closed',
        base: this.options.baseBranch,
        sort: 'updated',
        direction: 'desc',
        per_page: perPage,
        page,
      },
      resource: `pulls_${this.options.baseBranch}_p${page}_n${perPage}`,
    });

    // Cached responses hold the raw payload, so always normalize
    const items = this.deps.normalizer.pullRequests(response.data, this.options.baseBranch);
    this.deps.logger.debug('Fetched merged pull requests', {
      repo: this.options.repo,
      count: items.length,
      cached: response.cached ?? false,
    });
    return items;
  }

  async fetchPullRequestDetail(number: number): Promise<PullRequestDetail> {
    if (!Number.isInteger(number) || number <= 0) {
      throw new RangeError(`Pull request number must be a positive integer, got ${number}`);
    }
    const response = await this.get(`/pulls/${number}`);
    return this.deps.normalizer.pullRequestDetail(response.data);
  }

  async fetchReleases(params?: Partial<PageParams>): Promise<Release[]> {
    const { perPage, page } = this.pageParams(params);

    const response = await this.get(`/releases`, {
      query: { per_page: perPage, page },
      resource: `releases_p${page}_n${perPage}`,
    });

    const items = this.deps.normalizer.releases(response.data);
    this.deps.logger.debug('Fetched releases', {
      repo: this.options.repo,
      count: items.length,
      cached: response.cached ?? false,
    });
    return items;
  }

  async fetchReleaseByTag(tag: string): Promise<Release> {
    const normalized = tag.trim();
    if (!normalized) {
      throw new RangeError('Release tag must not be empty');
    }
    const response = await this.get(`/releases/tags/${encodeURIComponent(normalized)}`);
    return this.deps.normalizer.release(response.data);
  }

  private async get(
    path: string,
    options: { query?: Record<string, string | number>; resource?: string } = {}
  ): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    return this.deps.http.get(`${this.repoUrl()}${path}`, {
      provider: 'github',
      headers,
      query: options.query,
      etagKey: options.resource
        ? { provider: 'github', resource: `${this.options.repo}:${options.resource}` }
        : undefined,
    });
  }

  private repoUrl(): string {
    return `${this.options.apiUrl.replace(/\/+$/, '')}/repos/${this.options.repo}`;
  }

  private pageParams(params?: Partial<PageParams>): PageParams {
    const perPage = params?.perPage ?? this.options.perPage;
    const page = params?.page ?? 1;
    if (!Number.isInteger(perPage) || perPage <= 0) {
      throw new RangeError(`perPage must be a positive integer, got ${perPage}`);
    }
    if (!Number.isInteger(page) || page <= 0) {
      throw new RangeError(`page must be a positive integer, got ${page}`);
    }
    return { perPage, page };
  }
}
