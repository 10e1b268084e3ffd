import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CacheStore, resolveConfig, silentLogger } from '@repolens/core';
import type { RepositoryPayload, UserPayload } from '@repolens/aggregation';
import { InsightsService } from './service';
import type { CacheEvent, CommitPayload, EventPayload, IssuePayload, PullRequestPayload, UpstreamFetch } from './types';

const user: UserPayload = { id: 1, login: 'octocat', name: 'The Octocat', public_repos: 3 };

const repositories: RepositoryPayload[] = [
  { id: 10, name: 'spoon-knife', full_name: 'octocat/spoon-knife', language: 'Python', stargazers_count: 10, updated_at: '2024-01-05T00:00:00Z' },
  { id: 11, name: 'linguist', full_name: 'octocat/linguist', language: 'JavaScript', stargazers_count: 5, private: true, updated_at: '2024-04-01T00:00:00Z' },
  { id: 12, name: 'hello-world', full_name: 'octocat/hello-world', language: 'Python', stargazers_count: 15, fork: true },
];

const events: EventPayload[] = [
  { id: '9001', type: 'PushEvent', actor: { id: 1, login: 'octocat' }, created_at: '2024-04-02T10:00:00Z' },
];

const commits: CommitPayload[] = [{ sha: 'abc123', commit: { message: 'Initial commit' } }];

const issues: IssuePayload[] = [{ id: 501, number: 7, title: 'Typo in README', state: 'closed' }];

const pulls: PullRequestPayload[] = [
  {
    id: 601,
    number: 8,
    title: 'Fix typo',
    state: 'open',
    head: { ref: 'fix-typo', sha: 'def456' },
    base: { ref: 'main', sha: 'abc123' },
  },
];

const responses: Record<string, unknown> = {
  '/users/octocat': user,
  '/users/octocat/repos': repositories,
  '/repos/octocat/hello-world': repositories[2],
  '/repos/octocat/hello-world/languages': { Python: 3000, Shell: 1000 },
  '/repos/octocat/hello-world/events': events,
  '/repos/octocat/hello-world/commits': commits,
  '/repos/octocat/hello-world/issues': issues,
  '/repos/octocat/hello-world/pulls': pulls,
  '/search/repositories': { total_count: 1, incomplete_results: false, items: [repositories[0]] },
  '/search/users': { total_count: 1, incomplete_results: false, items: [user] },
};

describe('InsightsService', () => {
  let now: number;
  let cache: CacheStore;
  let calls: Array<{ path: string; query?: Record<string, string | number> }>;
  let cacheEvents: CacheEvent[];
  let service: InsightsService;

  const fetch: UpstreamFetch = async <T>(path: string, query?: Record<string, string | number>): Promise<T> => {
    calls.push({ path, query });
    if (!(path in responses)) {
      throw new Error(`404 Not Found: ${path}`);
    }
    // Test double standing in for a JSON response body
    return structuredClone(responses[path]) as T;
  };

  beforeEach(async () => {
    now = 0;
    calls = [];
    cacheEvents = [];
    cache = await CacheStore.create(resolveConfig({}), {
      logger: silentLogger,
      clock: () => now,
      enableBackgroundCleanup: false,
    });
    service = new InsightsService({
      cache,
      fetch,
      logger: silentLogger,
      events: { emit: (event) => cacheEvents.push(event) },
    });
  });

  afterEach(() => {
    cache.destroy();
  });

  it('serves the user from the cache after the first fetch', async () => {
    expect(await service.getUser('octocat')).toEqual(user);
    expect(await service.getUser('octocat')).toEqual(user);

    expect(calls).toEqual([{ path: '/users/octocat', query: undefined }]);
    expect(cacheEvents.map((e) => [e.namespace, e.eventType])).toEqual([
      ['user', 'miss'],
      ['user', 'hit'],
    ]);
    expect(cacheEvents[0].key).toBe(cache.deriveKey('user', ['octocat']));
  });

  it('refetches once the ttl has elapsed', async () => {
    await service.getUser('octocat');
    now = 300_000;
    await service.getUser('octocat');
    expect(calls).toHaveLength(2);
  });

  it('normalizes repositories and caches them per page', async () => {
    const records = await service.getUserRepositories('octocat', 2, 50);

    expect(calls).toEqual([{ path: '/users/octocat/repos', query: { page: 2, per_page: 50, sort: 'updated' } }]);
    expect(records[2]).toEqual({
      id: 12,
      name: 'hello-world',
      fullName: 'octocat/hello-world',
      description: null,
      language: 'Python',
      stargazersCount: 15,
      forksCount: 0,
      watchersCount: 0,
      openIssuesCount: 0,
      size: 0,
      private: false,
      fork: true,
      updatedAt: null,
    });

    await service.getUserRepositories('octocat', 2, 50);
    await service.getUserRepositories('octocat', 1, 50);
    expect(calls).toHaveLength(2);
  });

  it('summarizes the first full page of repositories', async () => {
    const result = await service.getRepositorySummary('octocat');

    expect(calls).toEqual([{ path: '/users/octocat/repos', query: { page: 1, per_page: 100, sort: 'updated' } }]);
    expect(result.username).toBe('octocat');
    expect(result.summary.totalStars).toBe(30);
    expect(result.summary.languages).toEqual({
      Python: { name: 'Python', count: 2, percentage: 66.67 },
      JavaScript: { name: 'JavaScript', count: 1, percentage: 33.33 },
    });
    expect(result.summary.topRepositories.map((r) => r.stargazersCount)).toEqual([15, 10, 5]);
    expect(result.summary.recentActivity.map((r) => r.name)).toEqual(['linguist', 'spoon-knife', 'hello-world']);

    await service.getRepositorySummary('octocat');
    expect(cacheEvents.map((e) => `${e.namespace}:${e.eventType}`)).toEqual([
      'user_repos:miss',
      'repo_summary:miss',
      'repo_summary:hit',
    ]);
  });

  it('combines the user with repository statistics', async () => {
    const stats = await service.getUserStatistics('octocat');

    expect(stats.username).toBe('octocat');
    expect(stats.user).toEqual(user);
    expect(stats.repositories).toEqual({ total: 3, public: 2, private: 1, forked: 1, original: 2 });
    expect(stats.languages.topLanguages).toEqual([
      { language: 'Python', count: 2 },
      { language: 'JavaScript', count: 1 },
    ]);
    expect(stats.topRepositories.map((r) => r.name)).toEqual(['hello-world', 'spoon-knife', 'linguist']);
  });

  it('reports language usage by repository count', async () => {
    expect(await service.getUserLanguages('octocat')).toEqual({
      username: 'octocat',
      languages: {
        Python: { name: 'Python', bytes: 0, percentage: 2, repositoryCount: 2, totalStars: 25 },
        JavaScript: { name: 'JavaScript', bytes: 0, percentage: 1, repositoryCount: 1, totalStars: 5 },
      },
      totalLanguages: 2,
    });
  });

  it('splits a repository by language bytes', async () => {
    expect(await service.getRepositoryLanguages('octocat', 'hello-world')).toEqual({
      fullName: 'octocat/hello-world',
      languages: {
        Python: { name: 'Python', bytes: 3000, percentage: 75 },
        Shell: { name: 'Shell', bytes: 1000, percentage: 25 },
      },
      totalLanguages: 2,
    });
  });

  it('normalizes a single repository', async () => {
    const record = await service.getRepository('octocat', 'hello-world');

    expect(calls).toEqual([{ path: '/repos/octocat/hello-world', query: undefined }]);
    expect(record).toMatchObject({ id: 12, fullName: 'octocat/hello-world', fork: true, updatedAt: null });
  });

  it('pages through repository events and commits', async () => {
    expect(await service.getRepositoryEvents('octocat', 'hello-world', 2, 10)).toEqual(events);
    expect(await service.getRepositoryCommits('octocat', 'hello-world')).toEqual(commits);

    expect(calls).toEqual([
      { path: '/repos/octocat/hello-world/events', query: { page: 2, per_page: 10 } },
      { path: '/repos/octocat/hello-world/commits', query: { page: 1, per_page: 30 } },
    ]);
    expect(cacheEvents.map((e) => e.key)).toEqual([
      cache.deriveKey('repo_events', ['octocat', 'hello-world', 2, 10]),
      cache.deriveKey('repo_commits', ['octocat', 'hello-world', 1, 30]),
    ]);
  });

  it('filters issues and pull requests by state', async () => {
    expect(await service.getRepositoryIssues('octocat', 'hello-world', 'closed')).toEqual(issues);
    expect(await service.getRepositoryPullRequests('octocat', 'hello-world')).toEqual(pulls);

    expect(calls).toEqual([
      { path: '/repos/octocat/hello-world/issues', query: { state: 'closed', page: 1, per_page: 30 } },
      { path: '/repos/octocat/hello-world/pulls', query: { state: 'open', page: 1, per_page: 30 } },
    ]);
  });

  it('caches issues separately for each state', async () => {
    await service.getRepositoryIssues('octocat', 'hello-world', 'open');
    await service.getRepositoryIssues('octocat', 'hello-world', 'open');
    await service.getRepositoryIssues('octocat', 'hello-world', 'all');

    expect(calls.map((c) => c.query?.state)).toEqual(['open', 'all']);
  });

  it('expires activity sooner than repositories', async () => {
    await service.getRepositoryCommits('octocat', 'hello-world');
    await service.getRepository('octocat', 'hello-world');

    now = 120_000;
    await service.getRepositoryCommits('octocat', 'hello-world');
    await service.getRepository('octocat', 'hello-world');

    expect(calls.map((c) => c.path)).toEqual([
      '/repos/octocat/hello-world/commits',
      '/repos/octocat/hello-world',
      '/repos/octocat/hello-world/commits',
    ]);
  });

  it('returns the items of a repository search, most starred first', async () => {
    const records = await service.searchRepositories('language:python', 1, 5);

    expect(calls).toEqual([
      { path: '/search/repositories', query: { q: 'language:python', page: 1, per_page: 5, sort: 'stars' } },
    ]);
    expect(records.map((r) => r.fullName)).toEqual(['octocat/spoon-knife']);
  });

  it('returns the items of a user search', async () => {
    expect(await service.searchUsers('octo')).toEqual([user]);
    expect(await service.searchUsers('octo')).toEqual([user]);

    expect(calls).toEqual([{ path: '/search/users', query: { q: 'octo', page: 1, per_page: 30 } }]);
  });

  it('treats a search reply without items as empty', async () => {
    const emptyFetch: UpstreamFetch = async <T>(): Promise<T> => {
      const body: unknown = { total_count: 0 };
      return body as T;
    };
    const empty = new InsightsService({ cache, fetch: emptyFetch, logger: silentLogger });

    expect(await empty.searchUsers('nobody')).toEqual([]);
    expect(await empty.searchRepositories('nothing')).toEqual([]);
  });

  it('hands out copies that callers cannot corrupt', async () => {
    const first = await service.getUser('octocat');
    first.login = 'changed';

    expect(await service.getUser('octocat')).toEqual(user);
  });

  it('passes upstream errors through without caching them', async () => {
    await expect(service.getUser('ghost')).rejects.toThrow('404 Not Found: /users/ghost');
    await expect(service.getUser('ghost')).rejects.toThrow('404 Not Found: /users/ghost');
    expect(calls).toHaveLength(2);
    expect(cacheEvents).toEqual([]);
  });

  it('clears the cache and exposes its stats', async () => {
    await service.getUser('octocat');
    expect((await service.cacheStats()).localSize).toBe(1);

    expect(await service.clearCache()).toBe(true);
    expect((await service.cacheStats()).localSize).toBe(0);

    await service.getUser('octocat');
    expect(calls).toHaveLength(2);
  });

  it('uses ttl overrides', async () => {
    const shortLived = new InsightsService({ cache, fetch, logger: silentLogger, ttl: { user: 5 } });

    await shortLived.getUser('octocat');
    now = 5_000;
    await shortLived.getUser('octocat');
    expect(calls).toHaveLength(2);
  });

  it('logs misses at debug level', async () => {
    const logger = { warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const logged = new InsightsService({ cache, fetch, logger });

    await logged.getUser('octocat');
    await logged.getUser('octocat');

    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith(`Cache miss for user (${cache.deriveKey('user', ['octocat'])})`);
  });
});
