/**
 * Leveled console logger.
 * Writes one line per record to stderr so JSON reports on stdout stay clean.
 */

import { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Emit ANSI colors. Defaults to true. */
  color?: boolean;
  write?: (line: string) => void;
}

function paint(chalk: ChalkInstance, level: LogLevel, label: string): string {
  switch (level) {
    case "debug":
      return chalk.gray(label);
    case "info":
      return chalk.cyan(label);
    case "warn":
      return chalk.yellow(label);
    case "error":
      return chalk.red(label);
  }
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(opts.level ?? "info");
  const chalk = new Chalk({ level: opts.color === false ? 0 : 1 });
  const write = opts.write ?? ((line: string) => process.stderr.write(`${line}\n`));

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    const label = paint(chalk, level, level.toUpperCase().padEnd(5));
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    write(`${label} ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
  };
}
