import type { RepositoryPayload, RepositoryRecord } from './types';

/**
 * Map an upstream repository payload to a RepositoryRecord.
 * Missing fields fall back to zero, false or null.
 */
export function normalizeRepository(payload: RepositoryPayload): RepositoryRecord {
  const name = payload.name ?? '';
  return {
    id: payload.id ?? 0,
    name,
    fullName: payload.full_name ?? name,
    description: payload.description ?? null,
    language: payload.language ? payload.language : null,
    stargazersCount: count(payload.stargazers_count),
    forksCount: count(payload.forks_count),
    watchersCount: count(payload.watchers_count),
    openIssuesCount: count(payload.open_issues_count),
    size: count(payload.size),
    private: payload.private ?? false,
    fork: payload.fork ?? false,
    updatedAt: payload.updated_at ?? null,
  };
}

export function normalizeRepositories(payloads: readonly RepositoryPayload[]): RepositoryRecord[] {
  return payloads.map(normalizeRepository);
}

function count(value: number | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Round to two decimal places
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Milliseconds since the epoch, or -Infinity when the timestamp is
 * missing or unparseable
 */
export function timestampOf(record: Pick<RepositoryRecord, 'updatedAt'>): number {
  if (!record.updatedAt) return Number.NEGATIVE_INFINITY;
  const parsed = Date.parse(record.updatedAt);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}
