import chalk from "chalk";
import debug from "debug";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  useColors?: boolean;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  child(prefix: string): Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVELS;
}

export function formatLogArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack || arg.message;
  }
  if (arg instanceof Uint8Array) {
    return `0x${Buffer.from(arg).toString("hex")}`;
  }
  if (typeof arg === "bigint") {
    return arg.toString();
  }
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg, (_, v) => (typeof v === "bigint" ? v.toString() : v), 2);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export class ConsoleLogger implements Logger {
  private readonly levelName: LogLevel;
  private readonly level: number;
  private readonly prefix: string;
  private readonly useColors: boolean;
  private readonly debugLogger: debug.Debugger;

  constructor(options: LoggerOptions = {}) {
    this.levelName = options.level || "info";
    this.level = LOG_LEVELS[this.levelName];
    this.prefix = options.prefix || "";
    this.useColors = options.useColors ?? true;
    this.debugLogger = debug(`stem-state${this.prefix ? `:${this.prefix}` : ""}`);
  }

  private format(level: LogLevel, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const prefix = this.prefix ? ` [${this.prefix}]` : "";
    const levelStr = `[${level.toUpperCase()}]`;
    const message = args.map(formatLogArg).join(" ");

    return `${timestamp}${prefix} ${levelStr} ${message}`;
  }

  private log(level: LogLevel, ...args: unknown[]): void {
    if (LOG_LEVELS[level] < this.level) {
      return;
    }

    if (level === "debug") {
      // debug() output is still gated by DEBUG=stem-state:*
      this.debugLogger(args.map(formatLogArg).join(" "));
      return;
    }

    const formatted = this.format(level, args);

    if (!this.useColors) {
      if (level === "info") {
        console.log(formatted);
      } else {
        console.error(formatted);
      }
      return;
    }

    switch (level) {
      case "info":
        console.log(chalk.blue(formatted));
        break;
      case "warn":
        console.warn(chalk.yellow(formatted));
        break;
      case "error":
        console.error(chalk.red(formatted));
        break;
    }
  }

  debug(...args: unknown[]): void {
    this.log("debug", ...args);
  }

  info(...args: unknown[]): void {
    this.log("info", ...args);
  }

  warn(...args: unknown[]): void {
    this.log("warn", ...args);
  }

  error(...args: unknown[]): void {
    this.log("error", ...args);
  }

  child(prefix: string): Logger {
    return new ConsoleLogger({
      level: this.levelName,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      useColors: this.useColors,
    });
  }
}

/** Logger that drops everything, for library callers that don't care */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
