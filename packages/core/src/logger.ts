/**
 * Structured logging adapter.
 *
 * The engine and the HTTP middleware accept one of these instead of writing
 * to the console directly, so applications can route limiter logs into
 * whatever logging stack they already run.
 *
 * @example
 * ```typescript
 * const engine = new RateLimitEngine({
 *   limits: '60,1',
 *   store,
 *   logger: createLogger({
 *     minLevel: 'info',
 *     log: (level, context, message, data) =>
 *       appLogger[level]({ context, ...toFields(data) }, message),
 *   }),
 * });
 * ```
 */
export interface LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /**
   * Custom sink. When omitted, messages go to the matching `console` method
   * prefixed with `[context]`.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;
  /** Minimum level to emit (default: `"info"`). */
  minLevel?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVEL_ORDER[options.minLevel ?? 'info'];

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVEL_ORDER[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
      return;
    }
    const line = `[${context}] ${message}`;
    if (data === undefined) {
      console[level](line);
    } else {
      console[level](line, data);
    }
  };

  return {
    debug: (context, message, data) => emit('debug', context, message, data),
    info: (context, message, data) => emit('info', context, message, data),
    warn: (context, message, data) => emit('warn', context, message, data),
    error: (context, message, data) => emit('error', context, message, data),
  };
}

/** Discards everything. */
export const silentLogger: LoggerAdapter = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export const LOG_CONTEXT = {
  ENGINE: 'engine',
  STORE: 'store',
  MIDDLEWARE: 'middleware',
} as const;

export function isLoggerAdapter(value: unknown): value is LoggerAdapter {
  if (value == null || typeof value !== 'object') return false;
  return (['debug', 'info', 'warn', 'error'] as const).every(
    (level) => level in value && typeof Reflect.get(value, level) === 'function',
  );
}

/** Reduces an unknown thrown value to something safe to put in a log line. */
export function describeError(error: unknown): {
  name: string;
  message: string;
} {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'UnknownError', message: String(error) };
}
