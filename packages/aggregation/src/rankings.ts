import { timestampOf } from './records';
import type { RepositoryRecord } from './types';

export const TOP_SIZE = 5;

type Starred = Pick<RepositoryRecord, 'stargazersCount'>;
type Updated = Pick<RepositoryRecord, 'updatedAt'>;

/**
 * Highest star counts first. Equal counts keep their input order.
 */
export function topByStars<T extends Starred>(repositories: readonly T[], n: number): T[] {
  return rankDescending(repositories, (repo) => repo.stargazersCount, n);
}

/**
 * Latest `updatedAt` first. Records without a usable timestamp rank
 * below every record that has one.
 */
export function mostRecentlyUpdated<T extends Updated>(repositories: readonly T[], n: number): T[] {
  return rankDescending(repositories, timestampOf, n);
}

/**
 * Stable descending sort on a numeric metric, truncated to n. The input
 * array is left untouched.
 */
export function rankDescending<T>(items: readonly T[], metric: (item: T) => number, n: number): T[] {
  const limit = Math.max(0, Math.floor(n));
  if (limit === 0 || items.length === 0) return [];

  return items
    .map((item, index) => ({ item, index, value: metric(item) }))
    .sort((a, b) => compareDescending(a.value, b.value) || a.index - b.index)
    .slice(0, limit)
    .map((ranked) => ranked.item);
}

function compareDescending(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}
