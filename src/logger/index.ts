export { logger, createChildLogger, getLogLevel, type LogLevel, type Logger } from "./logger";
