import { Hono, type Context } from 'hono';
import type { z } from 'zod';
import { createErrorHandler } from '../core/error-handler';
import {
  ConstraintViolationException,
  InputValidationException,
  NotFoundException,
  UnauthorizedException,
} from '../core/exceptions';
import { getLogger, type Logger } from '../core/logger';
import type { BlogDatabase } from '../database/service';
import { createRequestLogger } from '../logging/middleware';
import { createHealthEndpoints } from './health';
import { IdParamSchema, LoginSchema, RegisterSchema } from './schemas';
import type { AppEnv } from './types';

export const APP_NAME = 'inkpost';

export interface AppOptions {
  store: BlogDatabase;
  /** Defaults to the global logger. */
  logger?: Logger;
  version?: string;
}

async function readJson<S extends z.ZodType>(c: Context<AppEnv>, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new InputValidationException('Request body must be valid JSON');
  }
  return schema.parse(body);
}

function readId(c: Context<AppEnv>): number {
  return IdParamSchema.parse({ id: c.req.param('id') }).id;
}

/**
 * Builds the HTTP front of the blog on top of an open store.
 *
 * @example
 * ```ts
 * const store = await BlogDatabase.open({ path: config.database.path });
 * serve({ fetch: createApp({ store }).fetch, port: config.server.port });
 * ```
 */
export function createApp(options: AppOptions): Hono<AppEnv> {
  const { store, version } = options;
  const logger = options.logger ?? getLogger();
  const app = new Hono<AppEnv>();

  app.onError(createErrorHandler<AppEnv>({ logger }));
  app.use('*', createRequestLogger<AppEnv>({ logger }));
  app.use('*', async (c, next) => {
    c.set('store', store);
    await next();
  });

  createHealthEndpoints(app, {
    version,
    checks: [{ name: 'database', check: () => store.ping() }],
  });

  app.get('/', (c) => c.json({ success: true, data: { name: APP_NAME, ...(version ? { version } : {}) } }));

  app.post('/register', async (c) => {
    const input = await readJson(c, RegisterSchema);

    let id: number;
    try {
      id = await c.var.store.addUser(input.firstName, input.lastName, input.email, input.password);
    } catch (error) {
      if (error instanceof ConstraintViolationException && error.constraint === 'unique') {
        throw new ConstraintViolationException('Email already in use', 'unique', error);
      }
      throw error;
    }

    return c.json({ success: true, data: { id } }, 201);
  });

  app.post('/login', async (c) => {
    const input = await readJson(c, LoginSchema);
    const store = c.var.store;

    if (!(await store.attemptLogin(input.email, input.password))) {
      throw new UnauthorizedException('Invalid email or password');
    }
    const id = await store.getUserIdByEmail(input.email);
    return c.json({ success: true, data: { id } });
  });

  app.get('/users/:id', async (c) => {
    const id = readId(c);
    const user = await c.var.store.getUser(id);
    if (!user) throw new NotFoundException('User', id);
    return c.json({ success: true, data: user });
  });

  app.get('/posts/:id', async (c) => {
    const id = readId(c);
    const store = c.var.store;
    const post = await store.getPost(id);
    if (!post) throw new NotFoundException('Post', id);

    const tags = await store.getPostTags(id);
    const comments = await store.getPostComments(id);
    return c.json({ success: true, data: { ...post, tags, comments } });
  });

  app.get('/tags/:id', async (c) => {
    const id = readId(c);
    const tag = await c.var.store.getTag(id);
    if (!tag) throw new NotFoundException('Tag', id);
    return c.json({ success: true, data: tag });
  });

  return app;
}
