import { describe, it, expect, vi } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { z, ZodError } from 'zod';
import {
  createErrorHandler,
  createRequestLogger,
  zodErrorMapper,
  storeErrorMapper,
  ApiException,
  InputValidationException,
  NotFoundException,
  ConstraintViolationException,
  type ErrorHook,
  type Logger,
} from '../src/index.js';

function createMockLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

// ============================================================================
// Built-in Mapper Tests
// ============================================================================

describe('zodErrorMapper', () => {
  it('should map ZodError to InputValidationException', () => {
    const result = z.object({ email: z.email() }).safeParse({ email: 'invalid' });
    expect(result.success).toBe(false);
    const zodError = result.error;
    expect(zodError).toBeInstanceOf(ZodError);
    if (!zodError) return;

    const mapped = zodErrorMapper(zodError);

    expect(mapped).toBeInstanceOf(InputValidationException);
    expect(mapped?.status).toBe(400);
    expect(mapped?.code).toBe('VALIDATION_ERROR');
  });

  it('should return undefined for non-ZodError', () => {
    expect(zodErrorMapper(new Error('Regular error'))).toBeUndefined();
  });
});

describe('storeErrorMapper', () => {
  it('should map a driver constraint failure', () => {
    const raw = Object.assign(new Error('UNIQUE constraint failed: users.email'), {
      code: 'SQLITE_CONSTRAINT_UNIQUE',
    });

    const mapped = storeErrorMapper(raw);

    expect(mapped).toBeInstanceOf(ConstraintViolationException);
    expect(mapped?.status).toBe(409);
  });

  it('should return undefined for unrelated errors', () => {
    expect(storeErrorMapper(new Error('boom'))).toBeUndefined();
  });
});

// ============================================================================
// Error Handler Factory Tests
// ============================================================================

describe('createErrorHandler', () => {
  describe('basic error handling', () => {
    it('should pass through ApiException directly', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new NotFoundException('User', 123);
      });

      const res = await app.request('/test');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: "User with id '123' not found" },
      });
    });

    it('should wrap a plain HTTPException', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw new HTTPException(403, { message: 'Forbidden here' });
      });

      const res = await app.request('/test');

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'HTTP_ERROR', message: 'Forbidden here' },
      });
    });

    it('should map ZodError thrown in a route', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        z.object({ name: z.string() }).parse({});
        return new Response('unreachable');
      });

      const res = await app.request('/test');
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toBe('Validation failed');
      expect(body.error.details).toEqual([expect.objectContaining({ path: 'name', code: 'invalid_type' })]);
    });

    it('should map a raw store failure to 409', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.get('/test', () => {
        throw Object.assign(new Error('FOREIGN KEY constraint failed'), { code: 'SQLITE_CONSTRAINT_FOREIGNKEY' });
      });

      const res = await app.request('/test');

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        success: false,
        error: {
          code: 'CONSTRAINT_VIOLATION',
          message: 'FOREIGN KEY constraint failed',
          details: { constraint: 'foreign_key' },
        },
      });
    });

    it('should hide unmapped errors behind a generic 500 and log them', async () => {
      const logger = createMockLogger();
      const app = new Hono();
      app.onError(createErrorHandler({ logger }));
      app.get('/test', () => {
        throw new Error('secret internals');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        success: false,
        error: { code: 'INTERNAL_ERROR', message: 'An internal error occurred' },
      });
      expect(logger.error).toHaveBeenCalledWith(
        'Unmapped error',
        expect.objectContaining({ name: 'Error', message: 'secret internals' })
      );
    });

    it('should use custom default code and message', async () => {
      const app = new Hono();
      app.onError(
        createErrorHandler({
          defaultErrorCode: 'UNKNOWN',
          defaultErrorMessage: 'Try again later',
          logUnmappedErrors: false,
        })
      );
      app.get('/test', () => {
        throw new Error('boom');
      });

      const body = await (await app.request('/test')).json();

      expect(body.error).toEqual({ code: 'UNKNOWN', message: 'Try again later' });
    });
  });

  describe('custom mappers', () => {
    it('should try custom mappers before the built-in ones', async () => {
      class TeapotError extends Error {}
      const app = new Hono();
      app.onError(
        createErrorHandler({
          mappers: [(error) => (error instanceof TeapotError ? new ApiException('Short and stout', 418, 'TEAPOT') : undefined)],
        })
      );
      app.get('/test', () => {
        throw new TeapotError('tip me over');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(418);
      expect((await res.json()).error).toEqual({ code: 'TEAPOT', message: 'Short and stout' });
    });

    it('should skip a mapper that throws and warn about it', async () => {
      const logger = createMockLogger();
      const app = new Hono();
      app.onError(
        createErrorHandler({
          logger,
          logUnmappedErrors: false,
          mappers: [
            () => {
              throw new Error('mapper broke');
            },
          ],
        })
      );
      app.get('/test', () => {
        throw new Error('boom');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(500);
      expect(logger.warn).toHaveBeenCalledWith('Error mapper failed', { error: 'mapper broke' });
    });
  });

  describe('hooks', () => {
    it('should call hooks with the mapped exception', async () => {
      const hook = vi.fn<ErrorHook>();
      const app = new Hono();
      app.onError(createErrorHandler({ hooks: [hook] }));
      app.get('/test', () => {
        throw new NotFoundException('Tag');
      });

      await app.request('/test');

      expect(hook).toHaveBeenCalledTimes(1);
      const apiException = hook.mock.calls[0]?.[2];
      expect(apiException?.message).toBe('Tag not found');
    });

    it('should report hook failures without changing the response', async () => {
      const onHookError = vi.fn();
      const app = new Hono();
      app.onError(
        createErrorHandler({
          hooks: [
            () => {
              throw new Error('hook broke');
            },
          ],
          onHookError,
        })
      );
      app.get('/test', () => {
        throw new NotFoundException('Tag');
      });

      const res = await app.request('/test');

      expect(res.status).toBe(404);
      expect(onHookError).toHaveBeenCalledTimes(1);
      expect(onHookError.mock.calls[0]?.[0]).toBeInstanceOf(Error);
      expect(onHookError.mock.calls[0]?.[0].message).toBe('hook broke');
    });
  });

  describe('response extras', () => {
    it('should include the request id set by the request logger', async () => {
      const app = new Hono();
      app.onError(createErrorHandler());
      app.use('*', createRequestLogger({ logger: createMockLogger(), generateRequestId: () => 'req-1' }));
      app.get('/test', () => {
        throw new NotFoundException('Post', 9);
      });

      const body = await (await app.request('/test')).json();

      expect(body.error).toEqual({
        code: 'NOT_FOUND',
        message: "Post with id '9' not found",
        requestId: 'req-1',
      });
    });

    it('should leave the request id out when disabled', async () => {
      const app = new Hono();
      app.onError(createErrorHandler({ includeRequestId: false }));
      app.use('*', createRequestLogger({ logger: createMockLogger(), generateRequestId: () => 'req-1' }));
      app.get('/test', () => {
        throw new NotFoundException('Post', 9);
      });

      const body = await (await app.request('/test')).json();

      expect(body.error.requestId).toBeUndefined();
    });

    it('should include the stack trace only when asked', async () => {
      const app = new Hono();
      app.onError(createErrorHandler({ includeStackTrace: true, logUnmappedErrors: false }));
      app.get('/test', () => {
        throw new Error('boom');
      });

      const body = await (await app.request('/test')).json();

      expect(typeof body.error.stack).toBe('string');
      expect(body.error.stack).toContain('boom');
    });
  });
});
