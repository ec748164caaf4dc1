import type { BlogDatabase } from '../database/service';

/**
 * Hono environment for the web app. The store is injected per request by
 * middleware, so handlers never reach for a module-level instance.
 */
export type AppEnv = {
  Variables: {
    store: BlogDatabase;
    requestId: string;
  };
};
