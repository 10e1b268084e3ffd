import { consoleLogger, type CacheStats, type CacheStore, type KeyPart, type Logger } from '@repolens/core';
import {
  languageBreakdown,
  languageUsage,
  normalizeRepositories,
  normalizeRepository,
  summarize,
  userStatistics,
  type RepositoryPayload,
  type RepositoryRecord,
  type UserPayload,
} from '@repolens/aggregation';
import type {
  CacheEvent,
  CacheTtls,
  CommitPayload,
  EventPayload,
  InsightsServiceOptions,
  IssuePayload,
  IssueState,
  PullRequestPayload,
  RepositoryLanguagesResult,
  RepositorySummaryResult,
  SearchPayload,
  UpstreamFetch,
  UserLanguagesResult,
  UserStatisticsResult,
} from './types';

export const DEFAULT_TTLS: CacheTtls = {
  user: 300,
  repositories: 600,
  summary: 900,
  languages: 600,
  activity: 120,
  search: 300,
};

// Largest page the upstream provider serves
const FULL_PAGE = 100;

/**
 * Reads from the upstream provider through the cache and shapes the
 * results with the aggregation functions.
 *
 * Every cached read derives its key from a namespace plus the call
 * arguments and goes through CacheStore.getOrCompute(). Upstream errors
 * reach the caller unchanged and nothing is cached for them.
 */
export class InsightsService {
  private readonly cache: CacheStore;
  private readonly fetch: UpstreamFetch;
  private readonly logger: Logger;
  private readonly ttl: CacheTtls;
  private readonly emit?: (event: CacheEvent) => void;

  constructor(options: InsightsServiceOptions) {
    this.cache = options.cache;
    this.fetch = options.fetch;
    this.logger = options.logger ?? consoleLogger;
    this.ttl = { ...DEFAULT_TTLS, ...options.ttl };
    this.emit = options.events?.emit;
  }

  async getUser(username: string): Promise<UserPayload> {
    return this.cached('user', [username], this.ttl.user, () =>
      this.fetch<UserPayload>(`/users/${encodeURIComponent(username)}`)
    );
  }

  async getUserRepositories(username: string, page = 1, perPage = 30): Promise<RepositoryRecord[]> {
    const payloads = await this.cached('user_repos', [username, page, perPage], this.ttl.repositories, () =>
      this.fetch<RepositoryPayload[]>(`/users/${encodeURIComponent(username)}/repos`, {
        page,
        per_page: perPage,
        sort: 'updated',
      })
    );
    return normalizeRepositories(payloads);
  }

  async getRepositorySummary(username: string): Promise<RepositorySummaryResult> {
    const summary = await this.cached('repo_summary', [username], this.ttl.summary, async () =>
      summarize(await this.getUserRepositories(username, 1, FULL_PAGE))
    );
    return { username, summary };
  }

  async getUserStatistics(username: string): Promise<UserStatisticsResult> {
    const [user, repositories] = await Promise.all([
      this.getUser(username),
      this.getUserRepositories(username, 1, FULL_PAGE),
    ]);
    return { username, user, ...userStatistics(repositories) };
  }

  async getUserLanguages(username: string): Promise<UserLanguagesResult> {
    const repositories = await this.getUserRepositories(username, 1, FULL_PAGE);
    const languages = languageUsage(repositories);
    return { username, languages, totalLanguages: Object.keys(languages).length };
  }

  async getRepositoryLanguages(owner: string, repo: string): Promise<RepositoryLanguagesResult> {
    const bytes = await this.cached('repo_languages', [owner, repo], this.ttl.languages, () =>
      this.fetch<Record<string, number>>(`${repoPath(owner, repo)}/languages`)
    );
    const languages = languageBreakdown(bytes);
    return { fullName: `${owner}/${repo}`, languages, totalLanguages: Object.keys(languages).length };
  }

  async getRepository(owner: string, repo: string): Promise<RepositoryRecord> {
    const payload = await this.cached('repo', [owner, repo], this.ttl.repositories, () =>
      this.fetch<RepositoryPayload>(repoPath(owner, repo))
    );
    return normalizeRepository(payload);
  }

  async getRepositoryEvents(owner: string, repo: string, page = 1, perPage = 30): Promise<EventPayload[]> {
    return this.cached('repo_events', [owner, repo, page, perPage], this.ttl.activity, () =>
      this.fetch<EventPayload[]>(`${repoPath(owner, repo)}/events`, { page, per_page: perPage })
    );
  }

  async getRepositoryCommits(owner: string, repo: string, page = 1, perPage = 30): Promise<CommitPayload[]> {
    return this.cached('repo_commits', [owner, repo, page, perPage], this.ttl.activity, () =>
      this.fetch<CommitPayload[]>(`${repoPath(owner, repo)}/commits`, { page, per_page: perPage })
    );
  }

  async getRepositoryIssues(
    owner: string,
    repo: string,
    state: IssueState = 'open',
    page = 1,
    perPage = 30
  ): Promise<IssuePayload[]> {
    return this.cached('repo_issues', [owner, repo, state, page, perPage], this.ttl.activity, () =>
      this.fetch<IssuePayload[]>(`${repoPath(owner, repo)}/issues`, { state, page, per_page: perPage })
    );
  }

  async getRepositoryPullRequests(
    owner: string,
    repo: string,
    state: IssueState = 'open',
    page = 1,
    perPage = 30
  ): Promise<PullRequestPayload[]> {
    return this.cached('repo_pulls', [owner, repo, state, page, perPage], this.ttl.activity, () =>
      this.fetch<PullRequestPayload[]>(`${repoPath(owner, repo)}/pulls`, { state, page, per_page: perPage })
    );
  }

  /**
   * Repositories matching an upstream search query, most starred first
   */
  async searchRepositories(query: string, page = 1, perPage = 30): Promise<RepositoryRecord[]> {
    const result = await this.cached('search_repos', [query, page, perPage], this.ttl.search, () =>
      this.fetch<SearchPayload<RepositoryPayload>>('/search/repositories', {
        q: query,
        page,
        per_page: perPage,
        sort: 'stars',
      })
    );
    return normalizeRepositories(result.items ?? []);
  }

  async searchUsers(query: string, page = 1, perPage = 30): Promise<UserPayload[]> {
    const result = await this.cached('search_users', [query, page, perPage], this.ttl.search, () =>
      this.fetch<SearchPayload<UserPayload>>('/search/users', { q: query, page, per_page: perPage })
    );
    return result.items ?? [];
  }

  async cacheStats(): Promise<CacheStats> {
    return this.cache.stats();
  }

  async clearCache(): Promise<boolean> {
    const cleared = await this.cache.clear();
    this.logger.info?.(`Cache cleared (remote tier ${cleared ? 'cleared' : 'not cleared'})`);
    return cleared;
  }

  private async cached<T>(namespace: string, args: KeyPart[], ttlSeconds: number, producer: () => Promise<T>): Promise<T> {
    const key = this.cache.deriveKey(namespace, args);
    let computed = false;

    const value = await this.cache.getOrCompute<T>(
      key,
      () => {
        computed = true;
        return producer();
      },
      ttlSeconds
    );

    if (computed) {
      this.logger.debug?.(`Cache miss for ${namespace} (${key})`);
    }
    this.emit?.({ key, namespace, eventType: computed ? 'miss' : 'hit', timestamp: Date.now() });
    return value;
  }
}

function repoPath(owner: string, repo: string): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}
