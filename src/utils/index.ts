/**
 * Utility modules
 */

export {
  DEFAULT_LOG_DIR,
  getLogger,
  Logger,
  type LoggerOptions,
  LogEventType,
  LogLevel,
  logger,
  parseLogLevel,
  type StructuredLogMetadata,
  serializeError,
} from './logger';
