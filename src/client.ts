import { Octokit, RequestError } from "octokit";
import type { Logger } from "./logger";
import type { RateLimitInfo } from "./Types";

// Constants
export const RATE_LIMIT_MIN_WAIT_SECONDS = 60;
const RATE_LIMIT_PATTERN = "rate limit";

export type QueryParams = Record<string, string | number | boolean>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type ApiClientOptions = {
  logger: Logger;
  token?: string;
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
  maxRateLimitRetries?: number;
  /** Replaces the global fetch, used by tests to simulate the API. */
  fetch?: typeof fetch;
  sleep?: Sleep;
  now?: () => number;
};

/**
 * Seconds to wait before retrying a rate-limited request.
 * GitHub resets the limit at a fixed instant; the floor guards against clock skew.
 */
export function rateLimitWaitSeconds(
  resetEpochSeconds: number,
  nowEpochSeconds: number,
  floorSeconds = RATE_LIMIT_MIN_WAIT_SECONDS
): number {
  return Math.max(resetEpochSeconds - nowEpochSeconds, floorSeconds);
}

function headerNumber(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const parsed = typeof value === "number" ? value : parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Read rate limit headers, if the response carries them
 */
export function parseRateLimit(
  headers: Record<string, string | number | undefined>
): RateLimitInfo | undefined {
  if (headers["x-ratelimit-remaining"] === undefined) return undefined;
  return {
    limit: headerNumber(headers["x-ratelimit-limit"]),
    remaining: headerNumber(headers["x-ratelimit-remaining"]),
    used: headerNumber(headers["x-ratelimit-used"]),
    reset: headerNumber(headers["x-ratelimit-reset"]),
  };
}

/**
 * A 403 whose body mentions the rate limit
 */
export function isRateLimited(error: unknown): error is RequestError {
  if (!(error instanceof RequestError) || error.status !== 403) return false;

  const data: unknown = error.response?.data;
  const body = typeof data === "string" ? data : JSON.stringify(data ?? "");
  return `${error.message} ${body}`.toLowerCase().includes(RATE_LIMIT_PATTERN);
}

/**
 * Fill `{name}` placeholders for log output
 */
export function expandPath(path: string, params: QueryParams): string {
  return path.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
    const value = params[key];
    return value === undefined ? placeholder : String(value);
  });
}

function describeError(error: unknown): string {
  if (error instanceof RequestError) return `${error.status} ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}

/**
 * GET-only GitHub REST client. Failures come back as `null`; rate limits are
 * waited out and the request is re-issued.
 */
export class GitHubApiClient {
  readonly octokit: Octokit;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly maxRateLimitRetries: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private requestCount = 0;
  // Deadline shared by every request while the limit is in effect
  private backoff: Promise<void> | null = null;

  constructor(options: ApiClientOptions) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? 10;
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;

    const logger = this.logger;
    this.octokit = new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: options.userAgent,
      request: options.fetch ? { fetch: options.fetch } : undefined,
      // Rate limiting is handled here, not by the bundled plugins
      throttle: {
        enabled: false,
        onRateLimit: () => false,
        onSecondaryRateLimit: () => false,
      },
      retry: { enabled: false },
      log: {
        debug: (message: string) => logger.debug(message),
        info: (message: string) => logger.debug(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.error(message),
      },
    });

    this.octokit.hook.before("request", () => {
      this.requestCount += 1;
    });

    if (options.token) {
      this.logger.info("GitHub token provided - higher rate limits available");
    } else {
      this.logger.warn("No GitHub token provided - rate limits may apply");
    }
  }

  /** HTTP requests dispatched so far, rate-limit retries included */
  get totalRequests(): number {
    return this.requestCount;
  }

  /**
   * GET `path`. `{name}` segments are filled from `params`, the rest become the query string.
   */
  async request(path: string, params: QueryParams = {}): Promise<unknown> {
    const target = expandPath(path, params);
    for (let attempt = 0; ; attempt++) {
      if (this.backoff) await this.backoff;

      try {
        const response = await this.octokit.request(`GET ${path}`, {
          ...params,
          request: { signal: AbortSignal.timeout(this.timeoutMs) },
        });

        const rateLimit = parseRateLimit(response.headers);
        if (rateLimit) {
          this.logger.debug(`Rate limit remaining: ${rateLimit.remaining}/${rateLimit.limit}`);
        }

        const data: unknown = response.data;
        return data;
      } catch (error) {
        if (isRateLimited(error)) {
          if (attempt >= this.maxRateLimitRetries) {
            this.logger.error(
              `Rate limit still exceeded after ${attempt} retries, giving up on ${target}`
            );
            return null;
          }

          const reset = headerNumber(error.response?.headers["x-ratelimit-reset"]);
          const waitSeconds = rateLimitWaitSeconds(reset, Math.floor(this.now() / 1000));
          this.logger.warn(`Rate limit exceeded. Waiting ${waitSeconds} seconds...`);
          await this.waitOut(waitSeconds * 1000);
          continue;
        }

        if (error instanceof RequestError && error.status === 404) {
          this.logger.debug(`Not found: ${target}`);
        } else {
          this.logger.error(`API request failed for ${target}: ${describeError(error)}`);
        }
        return null;
      }
    }
  }

  private async waitOut(ms: number) {
    // Requests that hit the limit during an active wait reuse it
    if (!this.backoff) {
      this.backoff = this.sleep(ms).finally(() => {
        this.backoff = null;
      });
    }
    await this.backoff;
  }
}
