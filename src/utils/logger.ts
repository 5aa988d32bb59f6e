import chalk from "chalk";
import { readLogLevel } from "../config/environment.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 999,
};

let globalLogLevel: LogLevel | undefined;

export const setLogLevel = (level: LogLevel): void => {
  globalLogLevel = level;
};

const currentLogLevel = (): LogLevel => {
  if (globalLogLevel === undefined) {
    const { level, invalid } = readLogLevel();
    globalLogLevel = level;
    if (invalid !== undefined) {
      console.warn(chalk.yellow(`⚠️  Unknown NB_POST_LOG_LEVEL "${invalid}", using "${level}"`));
    }
  }
  return globalLogLevel;
};

const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel()];

export const logDebug = (message: string): void => {
  if (shouldLog("debug")) {
    console.log(chalk.gray(`[debug] ${message}`));
  }
};
