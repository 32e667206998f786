export type UserProfile = {
  readonly name: string | null;
  readonly bio: string | null;
  readonly company: string | null;
  readonly website: string | null;
  readonly twitter: string | null; // full profile URL, not the bare handle
  readonly location: string | null;
  readonly email: string | null;
  readonly publicRepos: number;
  readonly followers: number;
  readonly following: number;
  readonly profileReadme: string | null;
  readonly avatarUrl: string | null;
  readonly login: string;
};

export type LanguageBytes = Record<string, number>;

export type Repository = {
  readonly name: string;
  // about and description share the upstream `description` field
  readonly about: string | null;
  readonly description: string | null;
  readonly readmeContent: string | null;
  readonly languages: LanguageBytes;
  readonly url: string;
  readonly stars: number;
  readonly forks: number;
  readonly isFork: boolean;
  readonly defaultBranch: string;
};

export type ScrapingStatistics = {
  readonly totalRepositories: number;
  readonly repositoriesWithReadme: number;
  readonly totalStars: number;
  readonly totalForks: number;
  readonly uniqueLanguages: string[]; // first-seen order
  readonly languageDistribution: LanguageBytes;
};

export type ScrapingMetadata = {
  readonly scrapedAt: string; // ISO-8601
  readonly scraperVersion: string;
  readonly totalApiRequests: number;
  savedToFile: string | null;
  saveError: string | null;
};

export type CompleteUserData = {
  readonly profile: UserProfile;
  readonly repositories: Repository[];
  readonly statistics: ScrapingStatistics;
  readonly metadata: ScrapingMetadata;
};

export type RateLimitInfo = {
  limit: number;
  remaining: number;
  used: number;
  reset: number; // epoch seconds
};

export type RepositorySort = "created" | "updated" | "pushed" | "full_name";

export type SortDirection = "asc" | "desc";

export type PaginationOptions = {
  perPage: number;
  sort: RepositorySort;
  direction: SortDirection;
};
