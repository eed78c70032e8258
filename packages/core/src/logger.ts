import { pino, type Logger } from "pino";
import { loadDotenv, resolveLogLevel, type LogLevel } from "./env.js";

export type { LogLevel };

export function createLogger(level: LogLevel): Logger {
  return pino({ name: "pagesim", level });
}

function createSharedLogger(): Logger {
  loadDotenv();
  const { level, rejected } = resolveLogLevel(process.env["LOG_LEVEL"]);
  const shared = createLogger(level);
  if (rejected !== null) {
    shared.warn({ LOG_LEVEL: rejected }, "unknown LOG_LEVEL, using info");
  }
  return shared;
}

/**
 * Shared logger. The level comes from LOG_LEVEL alone, so other malformed
 * variables never break an import.
 */
export const logger: Logger = createSharedLogger();
