/**
 * Utility exports
 * @module utils
 */

// Statistics
export { mean, rangeMean, variance, standardDeviation, rmssd, argMin, rangeMin } from './statistics';

export { RingBuffer } from './ring-buffer';
export { ListenerSet, type Unsubscribe } from './listeners';

// Validation utilities
export {
  ValidationError,
  validateSampleRate,
  validateCutoff,
  validatePositiveInteger,
  validatePeripheralTarget,
} from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  configureFromEnvironment,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  toError,
  type LogEntry,
  type LogContext,
  type LogTarget,
  type LoggerConfig,
  type LogLevelName,
} from './logger';
