import { serve } from '@hono/node-server';
import { createApp } from './app/index';
import { loadConfig, resolveConfigPath } from './config/index';
import { createConsoleLogger, setLogger } from './core/logger';
import { BlogDatabase } from './database/service';

async function main(): Promise<void> {
  const config = await loadConfig(resolveConfigPath());
  const logger = createConsoleLogger({ level: config.logging.level });
  setLogger(logger);

  const store = await BlogDatabase.open({
    path: config.database.path,
    passwordRounds: config.security.passwordRounds,
    logger,
  });

  const app = createApp({ store, logger });
  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, (info) => {
    logger.info(`Listening on http://${info.address}:${info.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      store.close();
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  createConsoleLogger().error('Failed to start', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
