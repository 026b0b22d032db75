import pino from "pino";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Resolve the log level from the environment.
 * LOG_LEVEL wins; otherwise tests run silent and everything else logs at info.
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env["LOG_LEVEL"]?.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === requested);

  if (level) {
    return level;
  }

  return env["NODE_ENV"] === "test" ? "silent" : "info";
}

const loggerConfig: pino.LoggerOptions = {
  name: "modelver",
  level: getLogLevel(),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

/**
 * Main engine logger
 */
export const logger = pino(loggerConfig);

/**
 * Create child logger with additional context
 */
export const createChildLogger = (context: Record<string, unknown>) => {
  return logger.child(context);
};

export type { Logger } from "pino";
