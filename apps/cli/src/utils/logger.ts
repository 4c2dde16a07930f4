import chalk from "chalk";
import type { LogLevel } from "@passforge/shared";

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatLevel(level: LogLevel): string {
  switch (level) {
    case "debug":
      return chalk.gray("[debug]");
    case "info":
      return chalk.blue("[info]");
    case "warn":
      return chalk.yellow("[warn]");
    case "error":
      return chalk.red("[error]");
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a leveled logger. Everything goes to stderr by default so that
 * stdout only ever carries generated passwords.
 */
export function createLogger(level: LogLevel, stream: OutputStream = process.stderr): Logger {
  const threshold = LEVEL_WEIGHT[level];

  const log = (messageLevel: LogLevel, message: string): void => {
    if (LEVEL_WEIGHT[messageLevel] < threshold) {
      return;
    }
    stream.write(`${formatLevel(messageLevel)} ${message}\n`);
  };

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
