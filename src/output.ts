import { mkdir, readdir, readFile, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { z } from "zod";
import type { Logger } from "./logger";
import type {
  CompleteUserData,
  Repository,
  ScrapingMetadata,
  ScrapingStatistics,
  UserProfile,
} from "./Types";

// Persisted shape: snake_case keys, absent values as null

const nullableText = z.string().nullable();
const languageBytes = z.record(z.number().int().nonnegative());

export const ProfileDocumentSchema = z.object({
  name: nullableText,
  bio: nullableText,
  company: nullableText,
  website: nullableText,
  twitter: nullableText,
  location: nullableText,
  email: nullableText,
  public_repos: z.number().int().nonnegative(),
  followers: z.number().int().nonnegative(),
  following: z.number().int().nonnegative(),
  profile_readme: nullableText,
  avatar_url: nullableText,
  login: z.string(),
});

export const RepositoryDocumentSchema = z.object({
  name: z.string(),
  about: nullableText,
  description: nullableText,
  readme_content: nullableText,
  languages: languageBytes,
  url: z.string(),
  stars: z.number().int().nonnegative(),
  forks: z.number().int().nonnegative(),
  is_fork: z.boolean(),
  default_branch: z.string(),
});

export const StatisticsDocumentSchema = z.object({
  total_repositories: z.number().int().nonnegative(),
  repositories_with_readme: z.number().int().nonnegative(),
  total_stars: z.number().int().nonnegative(),
  total_forks: z.number().int().nonnegative(),
  unique_languages: z.array(z.string()),
  language_distribution: languageBytes,
});

export const MetadataDocumentSchema = z.object({
  scraped_at: z.string(),
  scraper_version: z.string(),
  total_api_requests: z.number().int().nonnegative(),
  saved_to_file: nullableText,
  save_error: nullableText,
});

export const UserDataDocumentSchema = z.object({
  profile: ProfileDocumentSchema,
  repositories: z.array(RepositoryDocumentSchema),
  statistics: StatisticsDocumentSchema,
  metadata: MetadataDocumentSchema,
});

export type ProfileDocument = z.infer<typeof ProfileDocumentSchema>;
export type RepositoryDocument = z.infer<typeof RepositoryDocumentSchema>;
export type StatisticsDocument = z.infer<typeof StatisticsDocumentSchema>;
export type MetadataDocument = z.infer<typeof MetadataDocumentSchema>;
export type UserDataDocument = z.infer<typeof UserDataDocumentSchema>;

export function serializeProfile(profile: UserProfile): ProfileDocument {
  return {
    name: profile.name,
    bio: profile.bio,
    company: profile.company,
    website: profile.website,
    twitter: profile.twitter,
    location: profile.location,
    email: profile.email,
    public_repos: profile.publicRepos,
    followers: profile.followers,
    following: profile.following,
    profile_readme: profile.profileReadme,
    avatar_url: profile.avatarUrl,
    login: profile.login,
  };
}

export function serializeRepository(repo: Repository): RepositoryDocument {
  return {
    name: repo.name,
    about: repo.about,
    description: repo.description,
    readme_content: repo.readmeContent,
    languages: { ...repo.languages },
    url: repo.url,
    stars: repo.stars,
    forks: repo.forks,
    is_fork: repo.isFork,
    default_branch: repo.defaultBranch,
  };
}

export function serializeStatistics(statistics: ScrapingStatistics): StatisticsDocument {
  return {
    total_repositories: statistics.totalRepositories,
    repositories_with_readme: statistics.repositoriesWithReadme,
    total_stars: statistics.totalStars,
    total_forks: statistics.totalForks,
    unique_languages: [...statistics.uniqueLanguages],
    language_distribution: { ...statistics.languageDistribution },
  };
}

export function serializeMetadata(metadata: ScrapingMetadata): MetadataDocument {
  return {
    scraped_at: metadata.scrapedAt,
    scraper_version: metadata.scraperVersion,
    total_api_requests: metadata.totalApiRequests,
    saved_to_file: metadata.savedToFile,
    save_error: metadata.saveError,
  };
}

export function toDocument(data: CompleteUserData): UserDataDocument {
  return {
    profile: serializeProfile(data.profile),
    repositories: data.repositories.map(serializeRepository),
    statistics: serializeStatistics(data.statistics),
    metadata: serializeMetadata(data.metadata),
  };
}

export function fromDocument(document: UserDataDocument): CompleteUserData {
  const { profile, statistics, metadata } = document;
  return {
    profile: {
      name: profile.name,
      bio: profile.bio,
      company: profile.company,
      website: profile.website,
      twitter: profile.twitter,
      location: profile.location,
      email: profile.email,
      publicRepos: profile.public_repos,
      followers: profile.followers,
      following: profile.following,
      profileReadme: profile.profile_readme,
      avatarUrl: profile.avatar_url,
      login: profile.login,
    },
    repositories: document.repositories.map((repo) => ({
      name: repo.name,
      about: repo.about,
      description: repo.description,
      readmeContent: repo.readme_content,
      languages: repo.languages,
      url: repo.url,
      stars: repo.stars,
      forks: repo.forks,
      isFork: repo.is_fork,
      defaultBranch: repo.default_branch,
    })),
    statistics: {
      totalRepositories: statistics.total_repositories,
      repositoriesWithReadme: statistics.repositories_with_readme,
      totalStars: statistics.total_stars,
      totalForks: statistics.total_forks,
      uniqueLanguages: statistics.unique_languages,
      languageDistribution: statistics.language_distribution,
    },
    metadata: {
      scrapedAt: metadata.scraped_at,
      scraperVersion: metadata.scraper_version,
      totalApiRequests: metadata.total_api_requests,
      savedToFile: metadata.saved_to_file,
      saveError: metadata.save_error,
    },
  };
}

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function profileFileName(username: string, date: Date): string {
  return `${username}_profile_${fileTimestamp(date)}.json`;
}

const PROFILE_FILE_PATTERN = /_profile_(\d{8}_\d{6})\.json$/;

/** Where scrape results go */
export interface ProfileStore {
  save(data: CompleteUserData, username: string): Promise<string>;
}

/**
 * Writes one timestamped JSON document per scrape into `outputDir`
 */
export class JsonFileStore implements ProfileStore {
  readonly outputDirectory: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(outputDir: string, logger: Logger, clock: () => Date = () => new Date()) {
    this.outputDirectory = resolve(outputDir);
    this.logger = logger;
    this.clock = clock;
  }

  async save(data: CompleteUserData, username: string): Promise<string> {
    await mkdir(this.outputDirectory, { recursive: true });

    const filepath = join(this.outputDirectory, profileFileName(username, this.clock()));
    try {
      await writeFile(filepath, `${JSON.stringify(toDocument(data), null, 2)}\n`, "utf8");
    } catch (error) {
      this.logger.error(
        `Failed to save data to JSON: ${error instanceof Error ? error.message : String(error)}`
      );
      throw error;
    }

    this.logger.info(`Data saved to: ${filepath}`);
    return filepath;
  }

  async load(filepath: string): Promise<CompleteUserData> {
    const text = await readFile(filepath, "utf8");
    const document = UserDataDocumentSchema.parse(JSON.parse(text));
    this.logger.info(`Data loaded from: ${filepath}`);
    return fromDocument(document);
  }

  /**
   * Saved profile filenames, most recent first
   */
  async listSaved(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.outputDirectory);
    } catch (error) {
      this.logger.error(
        `Failed to list saved profiles: ${error instanceof Error ? error.message : String(error)}`
      );
      return [];
    }

    const stamp = (file: string) => PROFILE_FILE_PATTERN.exec(file)?.[1] ?? "";
    return entries
      .filter((file) => PROFILE_FILE_PATTERN.test(file))
      .sort((a, b) => stamp(b).localeCompare(stamp(a)) || a.localeCompare(b));
  }
}
