import core from "@actions/core";
import { createWriteStream, mkdirSync, type WriteStream } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

export interface Logger {
  readonly name: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger sharing this one's sinks under another name. */
  child(name: string): Logger;
  /** Flush and close the log file. Call once, at exit. */
  close(): Promise<void>;
}

export type LoggerOptions = {
  name: string;
  level?: LogLevel;
  /** Append-only log file; omitted means no file output. */
  logFile?: string;
  console?: boolean;
  /** Route console output through @actions/core. Defaults to GITHUB_ACTIONS=true. */
  actions?: boolean;
};

type Sinks = {
  threshold: number;
  stream: WriteStream | null;
  console: boolean;
  actions: boolean;
};

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLogLine(
  date: Date,
  name: string,
  level: LogLevel,
  message: string
): string {
  return `${formatLogTimestamp(date)} - ${name} - ${level.toUpperCase()} - ${message}`;
}

function writeConsole(sinks: Sinks, level: LogLevel, line: string, message: string) {
  if (sinks.actions) {
    switch (level) {
      case "debug":
        core.debug(message);
        return;
      case "info":
        core.info(message);
        return;
      case "warning":
        core.warning(message);
        return;
      case "error":
        core.error(message);
        return;
    }
  }

  if (level === "error" || level === "warning") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function buildLogger(name: string, sinks: Sinks): Logger {
  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < sinks.threshold) return;

    const line = formatLogLine(new Date(), name, level, message);
    sinks.stream?.write(`${line}\n`);
    if (sinks.console) writeConsole(sinks, level, line, message);
  };

  return {
    name,
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warning", message),
    error: (message) => write("error", message),
    child: (childName) => buildLogger(childName, sinks),
    close: () => {
      const stream = sinks.stream;
      if (!stream) return Promise.resolve();
      sinks.stream = null;

      // An unwritable file was already reported; closing still succeeds
      return new Promise<void>((resolve) => {
        stream.once("error", () => resolve());
        stream.end(() => resolve());
      });
    },
  };
}

/**
 * Create the process logger. Components receive it (or a child) explicitly.
 */
export function createLogger(options: LoggerOptions): Logger {
  const sinks: Sinks = {
    threshold: LEVEL_ORDER[options.level ?? "info"],
    stream: null,
    console: options.console ?? true,
    actions: options.actions ?? process.env["GITHUB_ACTIONS"] === "true",
  };

  if (options.logFile) {
    mkdirSync(dirname(options.logFile), { recursive: true });
    const stream = createWriteStream(options.logFile, { flags: "a", encoding: "utf8" });
    let reported = false;
    stream.on("error", (error) => {
      // File logging stops; the run and console output carry on
      if (sinks.stream === stream) sinks.stream = null;
      if (reported) return;
      reported = true;
      const message = `Log file disabled: ${error.message}`;
      if (sinks.actions) {
        core.warning(message);
      } else {
        console.error(message);
      }
    });
    sinks.stream = stream;
  }

  return buildLogger(options.name, sinks);
}
