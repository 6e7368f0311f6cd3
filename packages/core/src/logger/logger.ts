import * as fs from "fs";
import * as path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
  protected level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  protected shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LEVELS.indexOf(this.level);
    const messageLevelIndex = LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

/**
 * Logger for a pipeline run. Every line goes to the console and is
 * appended to a per-run log file, formatted as
 * `[YYYY-MM-DD HH:MM:SS] [LEVEL] message`.
 */
export class RunLogger extends ConsoleLogger {
  readonly logFile: string;
  private readonly echo: boolean;

  /**
   * @param echo - also print to the console (off for machine-readable output)
   */
  constructor(logFile: string, level: LogLevel = "info", echo: boolean = true) {
    super("", level);
    this.logFile = logFile;
    this.echo = echo;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.echo) super.debug(message, ...args);
    this.append("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.echo) super.info(message, ...args);
    this.append("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.echo) super.warn(message, ...args);
    this.append("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.echo) super.error(message, ...args);
    this.append("error", message, args);
  }

  private append(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    const extra = args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
    const line = `[${formatTimestamp(new Date())}] [${level.toUpperCase()}] ${message}${extra}\n`;
    // Synchronous so lines are on disk before the process exits
    fs.appendFileSync(this.logFile, line, "utf-8");
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "string") return arg;
  return JSON.stringify(arg);
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** `pipeline_YYYYMMDD_HHMMSS.log` */
export function runLogFileName(date: Date): string {
  return (
    `pipeline_${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}.log`
  );
}

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const envLevel = process.env["LOG_LEVEL"];
  const logLevel = level ||
    (process.env["NODE_ENV"] === "test" ? "silent" : undefined) ||
    (envLevel && isLogLevel(envLevel) ? envLevel : undefined) ||
    "info";

  return new ConsoleLogger(prefix, logLevel);
}

/**
 * Creates the log directory if needed and returns a logger writing to a
 * fresh timestamped file inside it.
 */
export function createRunLogger(options: {
  logDir: string;
  level?: LogLevel;
  now?: Date;
  console?: boolean;
}): RunLogger {
  fs.mkdirSync(options.logDir, { recursive: true });
  const logFile = path.join(options.logDir, runLogFileName(options.now ?? new Date()));
  return new RunLogger(logFile, options.level ?? "info", options.console ?? true);
}
