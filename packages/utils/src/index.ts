export { createLogger, formatMessage, type Logger, type LogLevel, type LogEntry } from './logger.js';
export {
  ThreadlineError,
  ThreadStoreUnavailableError,
  ConfigValidationError,
  ScreenNotFoundError,
} from './errors.js';
