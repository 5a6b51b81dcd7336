export { createLogger } from './logger.js';
export { LoggerConfigError, loggerConfigFromEnv } from './config.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
