/**
 * Structured logger for inkpost.
 *
 * Every component logs through the {@link Logger} interface. The process-wide
 * default can be replaced to route output into another logging backend.
 *
 * @example
 * ```ts
 * import { setLogger, createConsoleLogger } from 'inkpost';
 *
 * setLogger(createConsoleLogger({ level: 'debug' }));
 *
 * // Or forward to pino
 * setLogger({
 *   debug(msg, ctx) { pino.debug(ctx, msg); },
 *   info(msg, ctx) { pino.info(ctx, msg); },
 *   warn(msg, ctx) { pino.warn(ctx, msg); },
 *   error(msg, ctx) { pino.error(ctx, msg); },
 * });
 * ```
 */

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

/** Minimum severity a logger emits. `silent` emits nothing. */
export type LogLevel = (typeof LOG_LEVELS)[number];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** @default 'info' */
  level?: LogLevel;
  /** Prefix shown in brackets before each message. @default 'inkpost' */
  scope?: string;
}

/**
 * Whether a message at `messageLevel` passes a logger configured at `threshold`.
 */
export function isLevelEnabled(threshold: LogLevel, messageLevel: Exclude<LogLevel, 'silent'>): boolean {
  return SEVERITY[messageLevel] >= SEVERITY[threshold];
}

/**
 * Creates a console-backed logger that drops messages below `level`.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', scope = 'inkpost' } = options;

  const write = (
    messageLevel: Exclude<LogLevel, 'silent'>,
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (!isLevelEnabled(level, messageLevel)) return;
    if (context && Object.keys(context).length > 0) {
      sink(`[${scope}] ${message}`, context);
    } else {
      sink(`[${scope}] ${message}`);
    }
  };

  return {
    debug: (message, context) => write('debug', console.debug, message, context),
    info: (message, context) => write('info', console.info, message, context),
    warn: (message, context) => write('warn', console.warn, message, context),
    error: (message, context) => write('error', console.error, message, context),
  };
}

/**
 * Returns a logger whose messages carry `scope` as an extra prefix,
 * e.g. `Database: Adding tag 'news'`.
 */
export function withScope(logger: Logger, scope: string): Logger {
  return {
    debug: (message, context) => logger.debug(`${scope}: ${message}`, context),
    info: (message, context) => logger.info(`${scope}: ${message}`, context),
    warn: (message, context) => logger.warn(`${scope}: ${message}`, context),
    error: (message, context) => logger.error(`${scope}: ${message}`, context),
  };
}

let currentLogger: Logger = createConsoleLogger();

/** Replace the default logger with a custom implementation. */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** Get the current logger instance. */
export function getLogger(): Logger {
  return currentLogger;
}
