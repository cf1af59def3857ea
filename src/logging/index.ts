/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
