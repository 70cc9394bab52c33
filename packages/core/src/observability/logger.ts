/**
 * Structured logging for kvobserve.
 *
 * A small structured logger with levels, module prefixes, JSON output and a
 * global debug toggle. Silent unless a handler is given, JSON output is
 * enabled, or debug mode is on.
 *
 * @module observability/logger
 */

import { ObserveError } from '../errors/observe-error.js';

/** Log level */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured log entry */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly code?: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface ObserveLoggerConfig {
  /** Minimum log level (default: 'info') */
  readonly level?: LogLevel;
  /** Enable debug mode (overrides level to 'debug') */
  readonly debug?: boolean;
  /** Module name prefix */
  readonly module?: string;
  /** Custom log handler (default: console when `json` is set) */
  readonly handler?: (entry: LogEntry) => void;
  /** Enable JSON output format */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalDebug = false;

/** Enable/disable global debug mode for all loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@kvobserve/core';
 *
 * const log = createLogger({ module: 'settings', level: 'debug', json: true });
 * const observerLog = log.child('theme');
 *
 * observerLog.debug('resumed', { key: 'theme' });
 * // {"level":"debug","message":"resumed","module":"settings:theme",...}
 * ```
 */
export class ObserveLogger {
  private readonly config: Required<Omit<ObserveLoggerConfig, 'handler' | 'json'>> &
    Pick<ObserveLoggerConfig, 'handler' | 'json'>;

  constructor(config: ObserveLoggerConfig = {}) {
    this.config = {
      level: config.debug ? 'debug' : (config.level ?? 'info'),
      debug: config.debug ?? false,
      module: config.module ?? 'kvobserve',
      handler: config.handler,
      json: config.json,
    };
  }

  /** Module name this logger writes under */
  get module(): string {
    return this.config.module;
  }

  /** Create a child logger with a sub-module prefix */
  child(subModule: string): ObserveLogger {
    return new ObserveLogger({
      ...this.config,
      module: `${this.config.module}:${subModule}`,
    });
  }

  /** Whether an entry at `level` would be emitted */
  isEnabled(level: LogLevel): boolean {
    const effectiveLevel = globalDebug ? 'debug' : this.config.level;
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[effectiveLevel];
  }

  /** Whether entries are dropped because no handler or console output is set */
  get isSilent(): boolean {
    return !this.config.handler && !this.config.json && !globalDebug;
  }

  /** Log at debug level */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /** Log at info level */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /** Log at warn level */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level. An {@link ObserveError} contributes its code to the
   * entry.
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(
      'error',
      message,
      {
        ...context,
        ...(error ? { error: { message: error.message, stack: error.stack } } : {}),
      },
      ObserveError.isObserveError(error) ? error.code : undefined
    );
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    code?: string
  ): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.config.module,
      ...(code ? { code } : {}),
      ...(context ? { context } : {}),
    };

    if (this.config.handler) {
      this.config.handler(entry);
      return;
    }

    if (this.config.json || globalDebug) {
      const consoleFn =
        level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
      consoleFn(JSON.stringify(entry));
    }
  }
}

/** Factory function to create an ObserveLogger */
export function createLogger(config?: ObserveLoggerConfig): ObserveLogger {
  return new ObserveLogger(config);
}

/** Shared default logger used when no logger is configured */
export const defaultLogger: ObserveLogger = createLogger();
