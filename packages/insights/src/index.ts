/**
 * @repolens/insights
 *
 * Cached reads from the upstream provider, shaped into summaries
 */

export { InsightsService, DEFAULT_TTLS } from './service';
export type {
  UpstreamFetch,
  CacheTtls,
  CacheEvent,
  InsightsServiceOptions,
  RepositorySummaryResult,
  UserStatisticsResult,
  UserLanguagesResult,
  RepositoryLanguagesResult,
  IssueState,
  EventPayload,
  CommitPayload,
  IssuePayload,
  PullRequestPayload,
  SearchPayload,
} from './types';
