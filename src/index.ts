import core from "@actions/core";
import { resolve } from "path";
import { fileURLToPath } from "url";
import { parseCliArgs, summaryRows, USAGE } from "./cli";
import { GitHubApiClient } from "./client";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { JsonFileStore } from "./output";
import { scrapeUser } from "./scraper";

export { GitHubApiClient } from "./client";
export { loadConfig, ScraperConfigSchema, type ScraperConfig } from "./config";
export { createLogger, type Logger } from "./logger";
export { JsonFileStore, toDocument, fromDocument, type ProfileStore } from "./output";
export { getUserProfile } from "./profile";
export { getReadmeContent, README_CANDIDATES } from "./readme";
export { getRepositoryLanguages, getUserRepositories } from "./repositories";
export { ProfileFetchError, scrapeUser } from "./scraper";
export { calculateStatistics, formatBytes, formatNumber } from "./statistics";
export type * from "./Types";

const inWorkflow = () => Boolean(process.env["GITHUB_WORKFLOW"]);

/**
 * Main function
 */
async function main() {
  const setup1 = performance.now();
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const username =
    args.username ||
    (inWorkflow() ? core.getInput("username") : "") ||
    process.env["GITHUB_USERNAME"];
  if (!username) {
    throw new Error(`No username given. ${USAGE}`);
  }

  const config = loadConfig(process.env, args.overrides);
  const logger = createLogger({
    name: "github_scraper",
    level: config.logLevel,
    logFile: config.logFile,
    console: config.consoleOutput,
  });

  try {
    const client = new GitHubApiClient({
      logger: logger.child("github_scraper.client"),
      token: config.token,
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
      timeoutMs: config.timeoutMs,
      maxRateLimitRetries: config.maxRateLimitRetries,
    });
    const store = new JsonFileStore(config.outputDir, logger.child("github_scraper.output"));
    logger.info(`Output directory: ${store.outputDirectory}`);

    const setup2 = performance.now();
    logger.debug(`Setup time: ${(setup2 - setup1).toFixed(2)}ms`);

    const data = await scrapeUser(
      username,
      { client, logger, store },
      {
        saveToFile: config.saveToFile,
        concurrency: config.concurrency,
        delayMs: config.repoDelayMs,
        pagination: {
          perPage: config.perPage,
          sort: config.sort,
          direction: config.direction,
        },
      }
    );

    const tableData = summaryRows(data);
    console.table(tableData.map(([Name, Value]) => ({ Name, Value })));

    // Write GitHub Actions summary
    if (inWorkflow()) {
      if (data.metadata.savedToFile) core.setOutput("file", data.metadata.savedToFile);
      await core.summary
        .addHeading(`GitHub Profile: ${data.profile.login}`)
        .addTable([
          [
            { data: "Metric", header: true },
            { data: "Value", header: true },
          ],
          ...tableData,
        ])
        .write();
    }

    logger.info(`Total execution time: ${(performance.now() - setup1).toFixed(2)}ms`);
  } finally {
    await logger.close();
  }
}

// Run main function only when this file is the entry point
const entry = process.argv[1];
const isMainModule = entry !== undefined && resolve(entry) === fileURLToPath(import.meta.url);
if (isMainModule) {
  main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error("Fatal error:", message);
    process.exitCode = 1;
    if (inWorkflow()) core.setFailed(message);
  });
}
