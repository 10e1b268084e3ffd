import type { RepositoryRecord } from './types';

/**
 * Build a record for tests, filling every field not given
 */
export function repo(overrides: Partial<RepositoryRecord> = {}): RepositoryRecord {
  const name = overrides.name ?? 'sample';
  return {
    id: 1,
    name,
    fullName: `tester/${name}`,
    description: null,
    language: null,
    stargazersCount: 0,
    forksCount: 0,
    watchersCount: 0,
    openIssuesCount: 0,
    size: 0,
    private: false,
    fork: false,
    updatedAt: null,
    ...overrides,
  };
}
