import { describe, expect, test, vi } from "vitest";
import { GitHubApiClient } from "./client";
import type { ProfileStore } from "./output";
import { ProfileFetchError, scrapeUser } from "./scraper";
import {
  createFakeFetch,
  createRecordingLogger,
  encodeBase64,
  jsonResponse,
  noSleep,
} from "./test-utils";

const STARTED_AT = new Date("2026-03-01T09:30:00.000Z");

function setup(options: { userAvailable?: boolean } = {}) {
  const fake = createFakeFetch((url) => {
    switch (url.pathname) {
      case "/users/alice":
        return options.userAvailable === false
          ? jsonResponse({ message: "Server Error" }, 500)
          : jsonResponse({ login: "alice", name: "Alice Example", followers: 5 });
      case "/users/alice/repos":
        return jsonResponse([
          { name: "api", description: "HTTP API", stargazers_count: 4, forks_count: 1 },
          { name: "notes", description: null, stargazers_count: 1, forks_count: 0 },
        ]);
      case "/repos/alice/api/contents/README.md":
        return jsonResponse({ content: encodeBase64("# API") });
      case "/repos/alice/api/languages":
        return jsonResponse({ TypeScript: 800 });
      case "/repos/alice/notes/languages":
        return jsonResponse({ Markdown: 50, TypeScript: 20 });
      default:
        return undefined;
    }
  });
  const logger = createRecordingLogger();
  const client = new GitHubApiClient({ logger, fetch: fake.fetch });
  return { client, fake, logger };
}

describe("scrapeUser", () => {
  test("assembles profile, repositories, statistics and metadata", async () => {
    const { client, fake, logger } = setup();

    const data = await scrapeUser(
      "alice",
      { client, logger, clock: () => STARTED_AT },
      { sleep: noSleep }
    );

    expect(data.profile.login).toBe("alice");
    expect(data.repositories.map((repo) => repo.name)).toEqual(["api", "notes"]);
    expect(data.statistics).toEqual({
      totalRepositories: 2,
      repositoriesWithReadme: 1,
      totalStars: 5,
      totalForks: 1,
      uniqueLanguages: ["TypeScript", "Markdown"],
      languageDistribution: { TypeScript: 820, Markdown: 50 },
    });
    expect(data.metadata).toEqual({
      scrapedAt: "2026-03-01T09:30:00.000Z",
      scraperVersion: "1.0.0",
      totalApiRequests: fake.calls.length,
      savedToFile: null,
      saveError: null,
    });
  });

  test("counts every dispatched request", async () => {
    const { client, logger } = setup();

    const data = await scrapeUser("alice", { client, logger }, { sleep: noSleep });

    // user + 5 profile README lookups + 1 listing + (1 + 1) for api + (5 + 1) for notes
    expect(data.metadata.totalApiRequests).toBe(15);
  });

  test("counts only the current run's requests on a reused client", async () => {
    const { client, logger } = setup();

    const first = await scrapeUser("alice", { client, logger }, { sleep: noSleep });
    const second = await scrapeUser("alice", { client, logger }, { sleep: noSleep });

    expect(first.metadata.totalApiRequests).toBe(15);
    expect(second.metadata.totalApiRequests).toBe(15);
    expect(client.totalRequests).toBe(30);
  });

  test("records where the result was saved", async () => {
    const { client, logger } = setup();
    const store: ProfileStore = {
      save: vi.fn(async (_data: unknown, username: string) => `/tmp/out/${username}_profile.json`),
    };

    const data = await scrapeUser("alice", { client, logger, store }, { sleep: noSleep });

    expect(store.save).toHaveBeenCalledTimes(1);
    expect(data.metadata.savedToFile).toBe("/tmp/out/alice_profile.json");
    expect(data.metadata.saveError).toBeNull();
  });

  test("a failed save is recorded without touching the rest of the result", async () => {
    const { client: okClient, logger: okLogger } = setup();
    const expected = await scrapeUser(
      "alice",
      { client: okClient, logger: okLogger, clock: () => STARTED_AT },
      { sleep: noSleep }
    );

    const { client, logger } = setup();
    const store: ProfileStore = {
      save: async () => {
        throw new Error("EACCES: permission denied");
      },
    };

    const data = await scrapeUser(
      "alice",
      { client, logger, store, clock: () => STARTED_AT },
      { sleep: noSleep }
    );

    expect(data.metadata.saveError).toBe("EACCES: permission denied");
    expect(data.metadata.savedToFile).toBeNull();
    expect(data.profile).toEqual(expected.profile);
    expect(data.repositories).toEqual(expected.repositories);
    expect(data.statistics).toEqual(expected.statistics);
    expect(data.metadata.scrapedAt).toBe(expected.metadata.scrapedAt);
    expect(data.metadata.totalApiRequests).toBe(expected.metadata.totalApiRequests);
    expect(logger.lines).toContain(
      "error: Failed to save results to file: EACCES: permission denied"
    );
  });

  test("does not save when saving is disabled", async () => {
    const { client, logger } = setup();
    const save = vi.fn(async () => "unused");

    const data = await scrapeUser(
      "alice",
      { client, logger, store: { save } },
      { sleep: noSleep, saveToFile: false }
    );

    expect(save).not.toHaveBeenCalled();
    expect(data.metadata.savedToFile).toBeNull();
  });

  test("fails when the profile cannot be fetched", async () => {
    const { client, fake, logger } = setup({ userAvailable: false });

    await expect(scrapeUser("alice", { client, logger }, { sleep: noSleep })).rejects.toThrow(
      ProfileFetchError
    );
    expect(fake.calls.map((url) => url.pathname)).toEqual(["/users/alice"]);
  });
});
