export { createLogger, isLogLevel } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
