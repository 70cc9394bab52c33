export {
  ObserveLogger,
  createLogger,
  defaultLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type ObserveLoggerConfig,
} from './logger.js';
