import type { GitHubApiClient } from "./client";
import { SCRAPER_VERSION } from "./config";
import type { Logger } from "./logger";
import type { ProfileStore } from "./output";
import { getUserProfile } from "./profile";
import { getUserRepositories, type RepositoryFetchOptions } from "./repositories";
import { calculateStatistics } from "./statistics";
import type { CompleteUserData, ScrapingMetadata } from "./Types";

/**
 * The user record could not be fetched; nothing else is worth returning.
 */
export class ProfileFetchError extends Error {
  readonly username: string;

  constructor(username: string) {
    super(`Failed to fetch profile for: ${username}`);
    this.name = "ProfileFetchError";
    this.username = username;
  }
}

export type ScrapeDependencies = {
  client: GitHubApiClient;
  logger: Logger;
  store?: ProfileStore;
  clock?: () => Date;
};

export type ScrapeOptions = RepositoryFetchOptions & {
  saveToFile?: boolean;
};

/**
 * Scrape a user's profile and repositories, aggregate statistics, and
 * optionally persist the result. A failed save is recorded in the metadata.
 */
export async function scrapeUser(
  username: string,
  deps: ScrapeDependencies,
  options: ScrapeOptions = {}
): Promise<CompleteUserData> {
  const { client, logger, store } = deps;
  const startedAt = (deps.clock ?? (() => new Date()))();
  // The client may outlive a single scrape
  const requestsBefore = client.totalRequests;

  logger.info(`Starting complete scrape for user: ${username}`);

  const profile = await getUserProfile(client, username, logger);
  if (!profile) {
    throw new ProfileFetchError(username);
  }

  const repositories = await getUserRepositories(client, username, logger, options);
  const statistics = calculateStatistics(repositories);

  const metadata: ScrapingMetadata = {
    scrapedAt: startedAt.toISOString(),
    scraperVersion: SCRAPER_VERSION,
    totalApiRequests: client.totalRequests - requestsBefore,
    savedToFile: null,
    saveError: null,
  };

  const result: CompleteUserData = { profile, repositories, statistics, metadata };

  if (store && (options.saveToFile ?? true)) {
    try {
      metadata.savedToFile = await store.save(result, username);
      logger.info(`Results saved to: ${metadata.savedToFile}`);
    } catch (error) {
      metadata.saveError = error instanceof Error ? error.message : String(error);
      logger.error(`Failed to save results to file: ${metadata.saveError}`);
    }
  }

  logger.info(`Complete scrape finished for: ${username}`);
  logger.info(
    `Summary: ${statistics.totalRepositories} repos, ` +
      `${statistics.repositoriesWithReadme} with README, ` +
      `${statistics.uniqueLanguages.length} languages, ` +
      `${statistics.totalStars} total stars`
  );

  return result;
}
