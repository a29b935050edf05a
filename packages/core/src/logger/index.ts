export { ConsoleLogger, createLogger, isLogLevel, logger } from "./logger";
export type { LogLevel, Logger } from "./logger";
