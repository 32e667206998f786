import { parseArgs } from "util";
import type { ScraperConfigInput } from "./config";
import { formatBytes, formatNumber, topLanguages, totalCodeBytes } from "./statistics";
import type { CompleteUserData } from "./Types";

export const USAGE =
  "Usage: github-profile-scraper <username> [--output-dir <dir>] [--no-save] " +
  "[--concurrency <n>] [--log-level <debug|info|warning|error>]";

export type CliArgs = {
  username: string | undefined;
  overrides: ScraperConfigInput;
  help: boolean;
};

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "output-dir": { type: "string", short: "o" },
      "no-save": { type: "boolean" },
      concurrency: { type: "string" },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const overrides: ScraperConfigInput = {};
  if (values["output-dir"] !== undefined) overrides.outputDir = values["output-dir"];
  if (values["no-save"]) overrides.saveToFile = false;
  if (values.concurrency !== undefined) overrides.concurrency = Number(values.concurrency);

  const logLevel = values["log-level"];
  if (logLevel !== undefined) {
    if (logLevel !== "debug" && logLevel !== "info" && logLevel !== "warning" && logLevel !== "error") {
      throw new Error(`Unknown log level: ${logLevel}`);
    }
    overrides.logLevel = logLevel;
  }

  return {
    username: positionals[0],
    overrides,
    help: values.help ?? false,
  };
}

/**
 * Name/value rows for the console table and the job summary
 */
export function summaryRows(data: CompleteUserData): [string, string][] {
  const { profile, statistics, metadata } = data;
  return [
    ["Name", profile.name ?? ""],
    ["Username", profile.login],
    ["Followers", formatNumber(profile.followers)],
    ["Public Repos", formatNumber(profile.publicRepos)],
    ["Profile README", profile.profileReadme ? "Yes" : "No"],
    ["Repositories Scraped", String(statistics.totalRepositories)],
    ["Repositories with README", String(statistics.repositoriesWithReadme)],
    ["Star Count", formatNumber(statistics.totalStars)],
    ["Fork Count", formatNumber(statistics.totalForks)],
    ["Code Bytes Total", formatBytes(totalCodeBytes(statistics))],
    ["Top Languages", topLanguages(statistics).join(", ")],
    ["API Requests", String(metadata.totalApiRequests)],
    ["Saved To", metadata.savedToFile ?? metadata.saveError ?? "not saved"],
    ["Scraped At", metadata.scrapedAt],
  ];
}
