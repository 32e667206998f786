import dotenv from "dotenv";
import { z } from "zod";

export const DEFAULT_BASE_URL = "https://api.github.com";
export const DEFAULT_USER_AGENT = "GitHub-Profile-Scraper/1.0";
export const SCRAPER_VERSION = "1.0.0";

const booleanFlag = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((value) => value === "true" || value === "1"),
]);

export const ScraperConfigSchema = z.object({
  token: z.string().min(1).optional(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  perPage: z.coerce.number().int().min(1).max(100).default(100),
  sort: z.enum(["created", "updated", "pushed", "full_name"]).default("updated"),
  direction: z.enum(["asc", "desc"]).default("desc"),
  repoDelayMs: z.coerce.number().int().min(0).default(100),
  concurrency: z.coerce.number().int().min(1).max(10).default(1),
  maxRateLimitRetries: z.coerce.number().int().min(0).default(10),
  outputDir: z.string().min(1).default("output"),
  logFile: z.string().min(1).default("logs/scraper.log"),
  logLevel: z.enum(["debug", "info", "warning", "error"]).default("info"),
  consoleOutput: booleanFlag.default(true),
  saveToFile: booleanFlag.default(true),
});

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;
export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;

type Env = Record<string, string | undefined>;

/** Empty strings count as unset. */
function pick(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Map environment variables onto config keys
 */
export function configFromEnv(env: Env): Record<string, string> {
  const raw = {
    token: pick(env, "GITHUB_TOKEN"),
    baseUrl: pick(env, "GITHUB_API_URL"),
    userAgent: pick(env, "SCRAPER_USER_AGENT"),
    timeoutMs: pick(env, "SCRAPER_TIMEOUT_MS"),
    perPage: pick(env, "SCRAPER_PER_PAGE"),
    sort: pick(env, "SCRAPER_SORT"),
    direction: pick(env, "SCRAPER_DIRECTION"),
    repoDelayMs: pick(env, "SCRAPER_REPO_DELAY_MS"),
    concurrency: pick(env, "SCRAPER_CONCURRENCY"),
    maxRateLimitRetries: pick(env, "SCRAPER_MAX_RATE_LIMIT_RETRIES"),
    outputDir: pick(env, "SCRAPER_OUTPUT_DIR"),
    logFile: pick(env, "SCRAPER_LOG_FILE"),
    logLevel: pick(env, "SCRAPER_LOG_LEVEL"),
    consoleOutput: pick(env, "SCRAPER_CONSOLE_LOG"),
    saveToFile: pick(env, "SCRAPER_SAVE"),
  };

  // Values are validated by the schema; undefined keys fall back to defaults.
  const entries: [string, string][] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined) entries.push([key, value]);
  }
  return Object.fromEntries(entries);
}

/**
 * Resolve configuration from the environment (and `.env`), then apply overrides
 */
export function loadConfig(
  env: Env = process.env,
  overrides: ScraperConfigInput = {},
  options: { dotenv?: boolean } = {}
): ScraperConfig {
  if (options.dotenv ?? env === process.env) {
    dotenv.config();
  }

  const result = ScraperConfigSchema.safeParse({ ...configFromEnv(env), ...overrides });
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return result.data;
}
