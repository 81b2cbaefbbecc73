/**
 * Logging and observability utilities.
 */

export { generateRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
