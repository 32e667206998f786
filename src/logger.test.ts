import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createLogger, formatLogLine, formatLogTimestamp } from "./logger";

const LINE_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - /;

describe("formatLogLine", () => {
  test("formats timestamp, name, level and message", () => {
    const date = new Date(2026, 0, 2, 3, 4, 5);
    expect(formatLogTimestamp(date)).toBe("2026-01-02 03:04:05");
    expect(formatLogLine(date, "github_scraper", "warning", "slow down")).toBe(
      "2026-01-02 03:04:05 - github_scraper - WARNING - slow down"
    );
  });
});

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "scraper-log-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test("appends lines at or above the level to the log file", async () => {
    const logFile = join(dir, "logs", "scraper.log");
    const logger = createLogger({ name: "github_scraper", logFile, console: false });

    logger.debug("hidden");
    logger.info("started");
    logger.child("github_scraper.client").error("request failed");
    await logger.close();

    const lines = (await readFile(logFile, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(LINE_PATTERN);
    expect(lines[0].replace(LINE_PATTERN, "")).toBe("github_scraper - INFO - started");
    expect(lines[1].replace(LINE_PATTERN, "")).toBe(
      "github_scraper.client - ERROR - request failed"
    );
  });

  test("writes to the console outside of workflows", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger({ name: "cli", level: "debug", actions: false });

    logger.debug("details");
    logger.warn("careful");

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0]).replace(LINE_PATTERN, "")).toBe("cli - DEBUG - details");
    expect(String(error.mock.calls[0][0]).replace(LINE_PATTERN, "")).toBe("cli - WARNING - careful");
  });

  test("keeps logging to the console when the log file cannot be opened", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    // The temp directory itself is not a writable file
    const logger = createLogger({ name: "cli", logFile: dir, actions: false });

    logger.info("before");
    await vi.waitFor(() => expect(error).toHaveBeenCalledTimes(1));
    logger.info("after");

    expect(String(error.mock.calls[0][0])).toMatch(/^Log file disabled: EISDIR/);
    expect(log).toHaveBeenCalledTimes(2);
    expect(String(log.mock.calls[1][0]).replace(LINE_PATTERN, "")).toBe("cli - INFO - after");
    await expect(logger.close()).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledTimes(1);
  });

  test("close without a log file resolves", async () => {
    const logger = createLogger({ name: "quiet", console: false });
    await expect(logger.close()).resolves.toBeUndefined();
  });
});
