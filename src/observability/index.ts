export type { LogLevel, LogConfig, Logger } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  isLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_CONFIG,
} from './logging.js';
