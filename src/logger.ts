import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export interface ConsoleLoggerConfig {
  level?: LogLevel;
  prefix?: string;
  // defaults to console.error so diagnostics never mix with command output
  write?: (line: string) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

export class ConsoleLogger implements Logger {
  private level: number;
  private prefix: string;
  private write: (line: string) => void;

  constructor(config: ConsoleLoggerConfig = {}) {
    this.level = LOG_LEVELS[config.level ?? "warn"];
    this.prefix = config.prefix ?? "[sayso]";
    this.write = config.write ?? ((line) => console.error(line));
  }

  private format(level: LogLevel, message: string, data?: unknown): string {
    const parts = [
      chalk.dim(this.prefix),
      LEVEL_COLORS[level](level.toUpperCase()),
      message,
    ];
    if (data !== undefined) {
      parts.push(chalk.dim(JSON.stringify(data)));
    }
    return parts.join(" ");
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] >= this.level) {
      this.write(this.format(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
