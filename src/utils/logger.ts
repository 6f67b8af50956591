/**
 * Structured Logging Utility
 *
 * Module-scoped loggers shared by the connection engine and the DSP core.
 *
 * - Levels: DEBUG, INFO, WARN, ERROR (plus SILENT for tests)
 * - Plain or JSON line output with timestamps
 * - Level read from LOG_LEVEL / BIOSENSE_LOG_LEVEL
 * - Child loggers (`ble:discovery`) and fixed-context loggers (per peripheral)
 *
 * @module utils/logger
 */

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

/**
 * Log entry structure
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevelName;
  /** Module path, e.g. `ble:orchestrator` */
  module: string;
  message: string;
  context?: LogContext;
  error?: Error;
}

export interface LoggerConfig {
  /** Minimum level to output */
  minLevel: LogLevel;
  /** Emit one JSON object per line */
  jsonOutput?: boolean;
  includeTimestamp?: boolean;
  /** Replaces console output (tests, log shipping) */
  outputHandler?: (entry: LogEntry) => void;
}

/**
 * The surface components depend on. Both `Logger` and context-bound
 * loggers satisfy it.
 */
export interface LogTarget {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.SILENT]: 'silent',
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  trace: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
  none: LogLevel.SILENT,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Parse a level name; unknown or empty values fall back to INFO
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;
  return LEVEL_ALIASES[level.trim().toLowerCase()] ?? LogLevel.INFO;
}

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Apply LOG_LEVEL or BIOSENSE_LOG_LEVEL from the environment
 */
export function configureFromEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const envLevel = env.LOG_LEVEL || env.BIOSENSE_LOG_LEVEL;
  if (envLevel) {
    globalConfig.minLevel = parseLogLevel(envLevel);
  }
}

export function setLogLevel(level: LogLevel | LogLevelName): void {
  globalConfig.minLevel = typeof level === 'string' ? parseLogLevel(level) : level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

function formatLogEntry(entry: LogEntry, includeTimestamp: boolean): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(' ');
}

function writeToConsole(entry: LogEntry, config: LoggerConfig): void {
  const output = config.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, config.includeTimestamp ?? true);

  switch (entry.level) {
    case 'error':
      console.error(output);
      if (entry.error) {
        console.error(entry.error);
      }
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Module-specific logger instance.
 *
 * Loggers created without an explicit config follow the global level, so
 * `setLogLevel` after construction still applies.
 */
export class Logger implements LogTarget {
  private readonly module: string;
  private readonly overrides: Partial<LoggerConfig>;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = overrides;
  }

  get name(): string {
    return this.module;
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    const config = this.config;
    if (level < config.minLevel) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      module: this.module,
      message,
      context,
      error,
    };

    if (config.outputHandler) {
      config.outputHandler(entry);
    } else {
      writeToConsole(entry, config);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Child logger named `<module>:<subModule>` sharing this logger's overrides
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  /**
   * Logger that merges `fixedContext` into every entry
   */
  withContext(fixedContext: LogContext): LogTarget {
    return new ContextLogger(this, fixedContext);
  }
}

class ContextLogger implements LogTarget {
  constructor(
    private readonly target: LogTarget,
    private readonly fixedContext: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.target.debug(message, { ...this.fixedContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.target.info(message, { ...this.fixedContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.target.warn(message, { ...this.fixedContext, ...context });
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.target.error(message, error, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string): Logger {
  return new Logger(module);
}

/**
 * Logger that never outputs (for tests)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}

/**
 * Normalise an unknown thrown value for `Logger.error`
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

configureFromEnvironment();
