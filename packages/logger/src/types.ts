export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/** Receives every entry that passes the level filter */
export type LogSink = (entry: LogEntry) => void;

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

  fatal(event_type: string, metadata?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
  /** Defaults to one JSON line per entry on console.log */
  sink?: LogSink;
}
