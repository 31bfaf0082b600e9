export type { Logger, LogLevel } from "./logger";
export { ConsoleLogger, createLogger, isLogLevel, resolveLogLevel, logger } from "./logger";
