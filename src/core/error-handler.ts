import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, InputValidationException } from './exceptions';
import { getRequestId } from './context-helpers';
import { getLogger, type Logger } from './logger';
import { translateStoreError } from '../database/errors';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before the response is sent.
 * Hooks are fire-and-forget; their failures go to `onHookError`.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers, tried in order before the built-in ones */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks */
  hooks?: ErrorHook<E>[];
  /** Include requestId in error response if available (default: true) */
  includeRequestId?: boolean;
  /** Include stack trace in error response (default: false, never enable in production!) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error message for unmapped errors (default: 'An internal error occurred') */
  defaultErrorMessage?: string;
  /** Log unmapped errors (default: true) */
  logUnmappedErrors?: boolean;
  /** Where unmapped errors are logged. Defaults to the global logger. */
  logger?: Logger;
  /** Called when a hook throws an error */
  onHookError?: (hookError: Error, originalError: Error, ctx: Context<E>) => void;
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export function zodErrorMapper(error: Error): ApiException | undefined {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
}

/**
 * Built-in mapper for raw store driver failures (constraint violations,
 * I/O errors) that escaped the persistence service untranslated.
 */
export function storeErrorMapper(error: Error): ApiException | undefined {
  const translated = translateStoreError(error);
  return translated instanceof ApiException ? translated : undefined;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Creates the global error handler for the app. Every error, mapped or not,
 * leaves as `{ success: false, error: { code, message, ... } }`.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.onError(createErrorHandler({
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) reportToPager(error);
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeRequestId = true,
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;

  const builtInMappers = [zodErrorMapper, storeErrorMapper];

  const resolve = async (err: Error, ctx: Context<E>): Promise<ApiException> => {
    if (err instanceof ApiException) {
      return err;
    }
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }

    for (const mapper of mappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) return mapped;
      } catch (mapperError) {
        (config.logger ?? getLogger()).warn('Error mapper failed', { error: toError(mapperError).message });
      }
    }
    for (const mapper of builtInMappers) {
      const mapped = mapper(err);
      if (mapped) return mapped;
    }

    if (logUnmappedErrors) {
      (config.logger ?? getLogger()).error('Unmapped error', {
        name: err.name,
        message: err.message,
        stack: err.stack,
      });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  };

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    const apiException = await resolve(err, ctx);

    for (const hook of hooks) {
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch((hookErr: unknown) => {
            onHookError?.(toError(hookErr), err, ctx);
          });
        }
      } catch (hookErr) {
        onHookError?.(toError(hookErr), err, ctx);
      }
    }

    const responseBody = apiException.toJSON();
    const errorBody: Record<string, unknown> = { ...responseBody.error };

    if (includeRequestId) {
      const requestId = getRequestId(ctx);
      if (requestId) {
        errorBody.requestId = requestId;
      }
    }

    if (includeStackTrace && err.stack) {
      errorBody.stack = err.stack;
    }

    return ctx.json({ success: false, error: errorBody }, apiException.status);
  };
}
