/**
 * Repository payload as the upstream provider returns it.
 * Only the fields the aggregation reads are listed.
 */
export interface RepositoryPayload {
  id?: number;
  name?: string;
  full_name?: string;
  description?: string | null;
  language?: string | null;
  stargazers_count?: number;
  forks_count?: number;
  watchers_count?: number;
  open_issues_count?: number;
  size?: number;
  private?: boolean;
  fork?: boolean;
  updated_at?: string | null;
}

/**
 * User payload as the upstream provider returns it
 */
export interface UserPayload {
  id: number;
  login: string;
  name?: string | null;
  avatar_url?: string | null;
  bio?: string | null;
  public_repos?: number;
  followers?: number;
  following?: number;
  created_at?: string | null;
  updated_at?: string | null;
}

export interface RepositoryRecord {
  id: number;
  name: string;
  fullName: string;
  description: string | null;
  language: string | null;
  stargazersCount: number;
  forksCount: number;
  watchersCount: number;
  openIssuesCount: number;
  size: number;
  private: boolean;
  fork: boolean;
  updatedAt: string | null; // ISO-8601
}

export interface LanguageSummary {
  name: string;
  count: number;
  percentage: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

/**
 * Per-user language usage. `percentage` carries the repository count,
 * not a share of anything, and `bytes` is always 0.
 */
export interface LanguageUsage {
  name: string;
  bytes: number;
  percentage: number;
  repositoryCount: number;
  totalStars: number;
}

/**
 * Byte-weighted share of one language inside a single repository
 */
export interface LanguageShare {
  name: string;
  bytes: number;
  percentage: number;
}

export interface RepositorySummary {
  totalRepositories: number;
  publicRepositories: number;
  privateRepositories: number;
  publicPercentage: number;
  privatePercentage: number;
  forkedRepositories: number;
  originalRepositories: number;
  totalStars: number;
  totalForks: number;
  totalWatchers: number;
  totalSize: number;
  totalOpenIssues: number;
  averageStarsPerRepo: number;
  languages: Record<string, LanguageSummary>;
  topRepositories: RepositoryRecord[];
  recentActivity: RepositoryRecord[];
}

export interface UserStatistics {
  repositories: {
    total: number;
    public: number;
    private: number;
    forked: number;
    original: number;
  };
  activity: {
    totalStars: number;
    totalForks: number;
    totalIssues: number;
    averageStarsPerRepo: number;
  };
  languages: {
    topLanguages: LanguageCount[];
    totalLanguages: number;
  };
  topRepositories: RepositoryRecord[];
}
