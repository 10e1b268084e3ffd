import type { CacheStore, Logger } from '@repolens/core';
import type { LanguageShare, LanguageUsage, RepositorySummary, UserPayload, UserStatistics } from '@repolens/aggregation';

/**
 * Outbound call to the upstream provider. Rejects on a non-success
 * status, a network failure or a malformed body.
 */
export type UpstreamFetch = <T>(path: string, query?: Record<string, string | number>) => Promise<T>;

/**
 * Seconds each family of values stays cached
 */
export interface CacheTtls {
  user: number;
  repositories: number;
  summary: number;
  languages: number;
  activity: number; // events, commits, issues, pull requests
  search: number;
}

export type IssueState = 'open' | 'closed' | 'all';

/**
 * Activity payloads as the upstream provider returns them. Only the
 * fields callers commonly read are listed; the rest pass through.
 */
export interface EventPayload {
  id: string;
  type: string;
  actor?: { id: number; login: string } | null;
  repo?: { id: number; name: string } | null;
  payload?: Record<string, unknown> | null;
  public?: boolean;
  created_at?: string | null;
}

export interface CommitPayload {
  sha: string;
  node_id?: string;
  commit: {
    message: string;
    author?: { name?: string; email?: string; date?: string } | null;
    committer?: { name?: string; email?: string; date?: string } | null;
  };
  html_url?: string;
  author?: { id: number; login: string } | null;
  committer?: { id: number; login: string } | null;
  parents?: Array<{ sha: string }>;
}

export interface IssuePayload {
  id: number;
  number: number;
  title: string;
  body?: string | null;
  state: string;
  locked?: boolean;
  comments?: number;
  user?: { id: number; login: string } | null;
  labels?: Array<{ name: string }>;
  created_at?: string | null;
  updated_at?: string | null;
  closed_at?: string | null;
}

export interface PullRequestPayload extends IssuePayload {
  draft?: boolean;
  merged_at?: string | null;
  head: { ref: string; sha: string };
  base: { ref: string; sha: string };
}

/**
 * Envelope of the upstream search endpoints
 */
export interface SearchPayload<T> {
  total_count?: number;
  incomplete_results?: boolean;
  items?: T[];
}

export interface CacheEvent {
  key: string;
  namespace: string;
  eventType: 'hit' | 'miss';
  timestamp: number;
}

export interface InsightsServiceOptions {
  cache: CacheStore;
  fetch: UpstreamFetch;
  logger?: Logger; // Default: consoleLogger
  ttl?: Partial<CacheTtls>;
  events?: {
    emit?: (event: CacheEvent) => void;
  };
}

export interface RepositorySummaryResult {
  username: string;
  summary: RepositorySummary;
}

export interface UserStatisticsResult extends UserStatistics {
  username: string;
  user: UserPayload;
}

export interface UserLanguagesResult {
  username: string;
  languages: Record<string, LanguageUsage>;
  totalLanguages: number;
}

export interface RepositoryLanguagesResult {
  fullName: string;
  languages: Record<string, LanguageShare>;
  totalLanguages: number;
}

