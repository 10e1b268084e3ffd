/**
 * @repolens/aggregation
 *
 * Pure summaries over already-fetched repository collections
 */

export * from './types';

export { normalizeRepository, normalizeRepositories, round2, timestampOf } from './records';
export { TOP_SIZE, topByStars, mostRecentlyUpdated, rankDescending } from './rankings';
export {
  languageHistogram,
  languageLeaderboard,
  languageUsage,
  languageBreakdown,
  distinctLanguages,
} from './languages';
export { summarize, userStatistics } from './summary';
