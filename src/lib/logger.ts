import { ConsoleLogger, LogLevel, type Logger } from "@slack/logger";

export type { Logger };
export { LogLevel };

const LEVELS: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Map LOG_LEVEL to a LogLevel, falling back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return LogLevel.INFO;
  }
  return LEVELS[value.toLowerCase()] ?? LogLevel.INFO;
}

/**
 * Named console logger shared with the Slack client
 */
export function createLogger(
  name: string,
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  const logger = new ConsoleLogger();
  logger.setName(name);
  logger.setLevel(level);
  return logger;
}
