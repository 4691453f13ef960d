import chalk from "chalk";
import type { LogLevel } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function threshold(): number {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  switch (level) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return LEVEL_ORDER[level];
    default:
      return LEVEL_ORDER.info;
  }
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function timestamp(): string {
  return chalk.gray(new Date().toISOString().substring(11, 19));
}

/**
 * Levelled console logger. LOG_LEVEL is read on every call so tests and
 * the CLI can change it at runtime.
 */
export const logger = {
  debug(message: string): void {
    if (enabled("debug")) console.log(`${timestamp()} ${chalk.magenta("debug")} ${chalk.gray(message)}`);
  },

  info(message: string): void {
    if (enabled("info")) console.log(`${timestamp()} ${chalk.cyan("info ")} ${message}`);
  },

  success(message: string): void {
    if (enabled("info")) console.log(`${timestamp()} ${chalk.green("✓    ")} ${message}`);
  },

  warn(message: string): void {
    if (enabled("warn")) console.error(`${timestamp()} ${chalk.yellow("warn ")} ${chalk.yellow(message)}`);
  },

  error(message: string, error?: unknown): void {
    if (!enabled("error")) return;
    console.error(`${timestamp()} ${chalk.red("error")} ${chalk.red(message)}`);
    if (error instanceof Error && error.stack && enabled("debug")) {
      console.error(chalk.gray(error.stack));
    }
  },
};

export default logger;
