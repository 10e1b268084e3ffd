import { round2 } from './records';
import { TOP_SIZE, rankDescending } from './rankings';
import type { LanguageCount, LanguageShare, LanguageSummary, LanguageUsage, RepositoryRecord } from './types';

type WithLanguage = Pick<RepositoryRecord, 'language'>;

/**
 * Language name → occurrence count and share of the whole set.
 *
 * Repositories without a language are not counted under any key but
 * still count toward the total the share is taken from, so the shares
 * may sum to less than 100. Keys appear in first-seen order.
 */
export function languageHistogram(repositories: readonly WithLanguage[]): Record<string, LanguageSummary> {
  const counts = countBy(repositories, () => 1);
  const total = repositories.length;

  return Object.fromEntries(
    Array.from(counts, ([name, count]): [string, LanguageSummary] => [
      name,
      { name, count, percentage: round2((count / total) * 100) },
    ])
  );
}

/**
 * Top languages as (language, count) pairs.
 *
 * By default the count is the number of repositories using the
 * language. With `byRepoCount` false it is the summed star count of
 * those repositories. Ties keep first-seen order.
 */
export function languageLeaderboard(
  repositories: readonly Pick<RepositoryRecord, 'language' | 'stargazersCount'>[],
  byRepoCount = true
): LanguageCount[] {
  const counts = countBy(repositories, (repo) => (byRepoCount ? 1 : repo.stargazersCount));
  const pairs = Array.from(counts, ([language, count]) => ({ language, count }));
  return rankDescending(pairs, (pair) => pair.count, TOP_SIZE);
}

/**
 * Per-user language usage.
 *
 * `percentage` holds the number of repositories using the language.
 * Per-repository language bytes are never fetched here, so `bytes`
 * stays 0.
 */
export function languageUsage(
  repositories: readonly Pick<RepositoryRecord, 'language' | 'stargazersCount'>[]
): Record<string, LanguageUsage> {
  const seen = new Map<string, LanguageUsage>();

  for (const repo of repositories) {
    if (!repo.language) continue;
    let entry = seen.get(repo.language);
    if (!entry) {
      entry = { name: repo.language, bytes: 0, percentage: 0, repositoryCount: 0, totalStars: 0 };
      seen.set(repo.language, entry);
    }
    entry.repositoryCount += 1;
    entry.percentage = entry.repositoryCount;
    entry.totalStars += repo.stargazersCount;
  }

  return Object.fromEntries(seen);
}

/**
 * Byte-weighted language split of one repository
 */
export function languageBreakdown(bytesByLanguage: Readonly<Record<string, number>>): Record<string, LanguageShare> {
  const entries = Object.entries(bytesByLanguage).map(
    ([name, bytes]): [string, number] => [name, Number.isFinite(bytes) && bytes > 0 ? bytes : 0]
  );
  const total = entries.reduce((sum, [, bytes]) => sum + bytes, 0);

  return Object.fromEntries(
    entries.map(([name, bytes]): [string, LanguageShare] => [
      name,
      { name, bytes, percentage: total > 0 ? round2((bytes / total) * 100) : 0 },
    ])
  );
}

/**
 * Number of distinct languages in the set
 */
export function distinctLanguages(repositories: readonly WithLanguage[]): number {
  return countBy(repositories, () => 1).size;
}

function countBy<T extends WithLanguage>(repositories: readonly T[], weight: (repo: T) => number): Map<string, number> {
  const counts = new Map<string, number>();
  for (const repo of repositories) {
    if (!repo.language) continue;
    counts.set(repo.language, (counts.get(repo.language) ?? 0) + weight(repo));
  }
  return counts;
}
