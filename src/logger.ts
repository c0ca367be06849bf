import { Logger } from "@aws-lambda-powertools/logger";

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR" | "SILENT";

const SERVICE_NAME = "vector-query-client";

let logger: Logger | null = null;

/**
 * Shared structured logger. The level comes from `POWERTOOLS_LOG_LEVEL` until
 * a client configuration sets one explicitly.
 */
export function getLogger(): Logger {
  if (!logger) {
    logger = new Logger({ serviceName: SERVICE_NAME });
  }
  return logger;
}

export function setLogLevel(level: LogLevelName): void {
  getLogger().setLogLevel(level);
}
