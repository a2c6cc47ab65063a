export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

export interface LogEntry {
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: string;
}

/** Receives each serialized entry. Defaults to `console.log`. */
export type LogSink = (line: string) => void;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (always emitted, whatever the minimum level)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
  sink?: LogSink;
}
