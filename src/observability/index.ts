export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  createLogger,
  isLogLevel,
  logError,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logging.js';
