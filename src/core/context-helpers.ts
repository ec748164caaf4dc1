import type { Context, Env } from 'hono';

/**
 * Type-safe context variable accessors for middleware that runs under an
 * arbitrary Env, where the variable keys are not part of the type.
 */

/**
 * Safely retrieves a variable from the Hono context.
 * Returns undefined if the variable doesn't exist or context is invalid.
 *
 * @example
 * ```ts
 * const requestId = getContextVar<string>(ctx, 'requestId');
 * ```
 */
export function getContextVar<T>(ctx: unknown, key: string): T | undefined {
  const ctxObj = ctx as { var?: Record<string, unknown> };
  return ctxObj?.var?.[key] as T | undefined;
}

/**
 * Sets a context variable from middleware whose Env may not declare `key`.
 */
export function setContextVar<E extends Env>(ctx: Context<E>, key: string, value: unknown): void {
  (ctx as unknown as { set: (key: string, value: unknown) => void }).set(key, value);
}

/**
 * Retrieves the request ID set by the request logger.
 */
export function getRequestId<E extends Env>(ctx: Context<E>): string | undefined {
  return getContextVar<string>(ctx, 'requestId');
}
