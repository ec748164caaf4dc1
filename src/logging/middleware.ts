import type { Env, MiddlewareHandler } from 'hono';
import { getLogger, type Logger } from '../core/logger';
import { setContextVar } from '../core/context-helpers';

export type RequestLogLevel = 'info' | 'warn' | 'error';

export interface RequestLoggerConfig {
  /** Defaults to the global logger at the time of each request. */
  logger?: Logger;
  /**
   * Paths that are never logged. A trailing `*` matches any suffix.
   * @default ['/health', '/ready', '/favicon.ico']
   */
  excludePaths?: string[];
  generateRequestId?: () => string;
  /** Picks the log level for a finished request. */
  levelResolver?: (statusCode: number, error?: Error) => RequestLogLevel;
}

const DEFAULT_EXCLUDE_PATHS = ['/health', '/ready', '/favicon.ico'];

/** 5xx logs at error, 4xx at warn, the rest at info unless something threw. */
export function defaultLevelResolver(statusCode: number, error?: Error): RequestLogLevel {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return error ? 'error' : 'info';
}

export function shouldExcludePath(path: string, excludePaths: string[]): boolean {
  return excludePaths.some((pattern) =>
    pattern.endsWith('*') ? path.startsWith(pattern.slice(0, -1)) : path === pattern
  );
}

/**
 * Logs one line per request and tags the request with an id, echoed back in
 * the `X-Request-ID` response header.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.use('*', createRequestLogger({ excludePaths: ['/health', '/static/*'] }));
 * ```
 */
export function createRequestLogger<E extends Env = Env>(
  config: RequestLoggerConfig = {}
): MiddlewareHandler<E> {
  const excludePaths = config.excludePaths ?? DEFAULT_EXCLUDE_PATHS;
  const generateRequestId = config.generateRequestId ?? (() => crypto.randomUUID());
  const levelResolver = config.levelResolver ?? defaultLevelResolver;

  return async (ctx, next) => {
    const path = ctx.req.path;
    if (shouldExcludePath(path, excludePaths)) {
      return next();
    }

    const requestId = generateRequestId();
    const startTime = Date.now();
    setContextVar(ctx, 'requestId', requestId);
    ctx.header('X-Request-ID', requestId);

    let error: Error | undefined;
    try {
      await next();
    } catch (e) {
      error = e instanceof Error ? e : new Error(String(e));
      throw e;
    } finally {
      // Hono's compose hands thrown errors to onError before we get here,
      // so ctx.res already carries the final status.
      error ??= ctx.error;
      const statusCode = ctx.res.status;
      const responseTimeMs = Date.now() - startTime;
      const level = levelResolver(statusCode, error);
      const logger = config.logger ?? getLogger();

      logger[level](`${ctx.req.method} ${path} ${statusCode} ${responseTimeMs}ms`, {
        requestId,
        method: ctx.req.method,
        path,
        statusCode,
        responseTimeMs,
        ...(error ? { error: error.message } : {}),
      });
    }
  };
}
