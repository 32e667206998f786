import { z } from "zod";
import { sleep as defaultSleep, type GitHubApiClient, type Sleep } from "./client";
import type { Logger } from "./logger";
import { getReadmeContent } from "./readme";
import type { LanguageBytes, PaginationOptions, Repository } from "./Types";

export const DEFAULT_PAGINATION: PaginationOptions = {
  perPage: 100,
  sort: "updated",
  direction: "desc",
};

export const GitHubRepoSchema = z.object({
  name: z.string().min(1),
  description: z.string().nullable().optional(),
  html_url: z.string().optional(),
  stargazers_count: z.number().int().nonnegative().optional(),
  forks_count: z.number().int().nonnegative().optional(),
  fork: z.boolean().optional(),
  default_branch: z.string().optional(),
});

export type GitHubRepo = z.infer<typeof GitHubRepoSchema>;

const LanguagesSchema = z.record(z.number().int().nonnegative());

export type RepositoryFetchOptions = {
  pagination?: PaginationOptions;
  /** Pause after each repository, in milliseconds */
  delayMs?: number;
  /** Repositories processed at once; 1 keeps the fetch strictly sequential */
  concurrency?: number;
  sleep?: Sleep;
};

export type BatchOptions = {
  concurrency: number;
  delayMs: number;
  pause: Sleep;
  logger: Logger;
};

/**
 * Enrich listing entries `concurrency` at a time, in listing order. Every
 * enriched entry is followed by a `delayMs` pause; entries whose enrichment
 * throws are logged and left out.
 */
export async function enrichInBatches(
  repos: readonly GitHubRepo[],
  enrich: (repo: GitHubRepo) => Promise<Repository>,
  { concurrency, delayMs, pause, logger }: BatchOptions
): Promise<Repository[]> {
  const enriched: Repository[] = [];

  for (let start = 0; start < repos.length; start += concurrency) {
    const batch = repos.slice(start, start + concurrency);
    const outcomes = await Promise.allSettled(
      batch.map(async (repo) => {
        const repository = await enrich(repo);
        await pause(delayMs);
        return repository;
      })
    );

    outcomes.forEach((outcome, offset) => {
      if (outcome.status === "fulfilled") {
        enriched.push(outcome.value);
      } else {
        logger.error(`Failed to process repository ${batch[offset]?.name}: ${String(outcome.reason)}`);
      }
    });
  }

  return enriched;
}

/**
 * Get programming languages used in a repository, as bytes per language
 */
export async function getRepositoryLanguages(
  client: GitHubApiClient,
  owner: string,
  repo: string
): Promise<LanguageBytes> {
  const data = await client.request("/repos/{owner}/{repo}/languages", { owner, repo });
  const parsed = LanguagesSchema.safeParse(data);
  return parsed.success ? parsed.data : {};
}

export function toRepository(
  repo: GitHubRepo,
  readmeContent: string | null,
  languages: LanguageBytes
): Repository {
  return {
    name: repo.name,
    about: repo.description ?? null,
    description: repo.description ?? null,
    readmeContent,
    languages,
    url: repo.html_url ?? "",
    stars: repo.stargazers_count ?? 0,
    forks: repo.forks_count ?? 0,
    isFork: repo.fork ?? false,
    defaultBranch: repo.default_branch ?? "main",
  };
}

/**
 * Fetch one page of the user's repository listing. Null when the page is unavailable.
 */
export async function getRepositoryPage(
  client: GitHubApiClient,
  username: string,
  page: number,
  pagination: PaginationOptions
): Promise<unknown[] | null> {
  const data = await client.request("/users/{username}/repos", {
    username,
    page,
    per_page: pagination.perPage,
    sort: pagination.sort,
    direction: pagination.direction,
  });
  return Array.isArray(data) ? data : null;
}

/**
 * Fetch all repositories for a user, each with README content and languages
 */
export async function getUserRepositories(
  client: GitHubApiClient,
  username: string,
  logger: Logger,
  options: RepositoryFetchOptions = {}
): Promise<Repository[]> {
  const pagination = options.pagination ?? DEFAULT_PAGINATION;
  const delayMs = options.delayMs ?? 100;
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const pause = options.sleep ?? defaultSleep;

  logger.info(`Fetching repositories for user: ${username}`);

  const processRepository = async (repo: GitHubRepo): Promise<Repository> => {
    logger.debug(`Processing repository: ${repo.name}`);

    const readmeContent = await getReadmeContent(client, username, repo.name, logger);
    const languages = await getRepositoryLanguages(client, username, repo.name);
    return toRepository(repo, readmeContent, languages);
  };

  const repositories: Repository[] = [];

  for (let page = 1; ; page++) {
    const items = await getRepositoryPage(client, username, page, pagination);
    if (!items || items.length === 0) break;

    const repos: GitHubRepo[] = [];
    for (const item of items) {
      const parsed = GitHubRepoSchema.safeParse(item);
      if (parsed.success) {
        repos.push(parsed.data);
      } else {
        logger.warn(`Skipping malformed repository entry on page ${page}`);
      }
    }

    const enriched = await enrichInBatches(repos, processRepository, {
      concurrency,
      delayMs,
      pause,
      logger,
    });
    repositories.push(...enriched);

    // A short page is the last one
    if (items.length < pagination.perPage) break;
  }

  logger.info(`Successfully fetched ${repositories.length} repositories for: ${username}`);
  return repositories;
}
