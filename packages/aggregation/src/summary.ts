import { distinctLanguages, languageHistogram, languageLeaderboard } from './languages';
import { round2 } from './records';
import { TOP_SIZE, mostRecentlyUpdated, topByStars } from './rankings';
import type { RepositoryRecord, RepositorySummary, UserStatistics } from './types';

interface Totals {
  total: number;
  public: number;
  private: number;
  forked: number;
  stars: number;
  forks: number;
  watchers: number;
  size: number;
  openIssues: number;
}

function totalsOf(repositories: readonly RepositoryRecord[]): Totals {
  const totals: Totals = {
    total: repositories.length,
    public: 0,
    private: 0,
    forked: 0,
    stars: 0,
    forks: 0,
    watchers: 0,
    size: 0,
    openIssues: 0,
  };

  for (const repo of repositories) {
    if (repo.private) totals.private++;
    else totals.public++;
    if (repo.fork) totals.forked++;
    totals.stars += repo.stargazersCount;
    totals.forks += repo.forksCount;
    totals.watchers += repo.watchersCount;
    totals.size += repo.size;
    totals.openIssues += repo.openIssuesCount;
  }

  return totals;
}

function share(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

/**
 * Totals, visibility split, language histogram and the top and most
 * recent repositories of a set. An empty set yields zeros and empty
 * lists.
 */
export function summarize(repositories: readonly RepositoryRecord[]): RepositorySummary {
  const totals = totalsOf(repositories);

  return {
    totalRepositories: totals.total,
    publicRepositories: totals.public,
    privateRepositories: totals.private,
    publicPercentage: share(totals.public, totals.total),
    privatePercentage: share(totals.private, totals.total),
    forkedRepositories: totals.forked,
    originalRepositories: totals.total - totals.forked,
    totalStars: totals.stars,
    totalForks: totals.forks,
    totalWatchers: totals.watchers,
    totalSize: totals.size,
    totalOpenIssues: totals.openIssues,
    averageStarsPerRepo: totals.total > 0 ? round2(totals.stars / totals.total) : 0,
    languages: languageHistogram(repositories),
    topRepositories: topByStars(repositories, TOP_SIZE),
    recentActivity: mostRecentlyUpdated(repositories, TOP_SIZE),
  };
}

/**
 * Per-user statistics: repository counts by kind, activity totals,
 * the language leaderboard and the most starred repositories
 */
export function userStatistics(repositories: readonly RepositoryRecord[]): UserStatistics {
  const totals = totalsOf(repositories);

  return {
    repositories: {
      total: totals.total,
      public: totals.public,
      private: totals.private,
      forked: totals.forked,
      original: totals.total - totals.forked,
    },
    activity: {
      totalStars: totals.stars,
      totalForks: totals.forks,
      totalIssues: totals.openIssues,
      averageStarsPerRepo: totals.total > 0 ? round2(totals.stars / totals.total) : 0,
    },
    languages: {
      topLanguages: languageLeaderboard(repositories),
      totalLanguages: distinctLanguages(repositories),
    },
    topRepositories: topByStars(repositories, TOP_SIZE),
  };
}
