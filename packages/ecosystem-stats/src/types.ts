export interface SummaryCounts {
  /** Present only when enterprises were collected in the same run. */
  enterprises?: number;
  organizations: number;
  repositories: number;
  followers: number;
  following: number;
  starred_repos: number;
  gists: number;
}

export interface EcosystemSummary {
  timestamp: string;
  user: string | null;
  counts: SummaryCounts;
}

export interface RepositoryStats {
  public: number;
  private: number;
  forks: number;
  original: number;
  archived: number;
  languages: Map<string, number>;
  byOwner: Map<string, number>;
}

export interface LanguageShare {
  language: string;
  count: number;
  percentage: string;
}

export interface EnterpriseRef {
  enterpriseName: string;
  enterpriseSlug: string;
}
