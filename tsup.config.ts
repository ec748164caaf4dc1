import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/server.ts'],
  format: ['esm'],
  target: 'node20',
  dts: { entry: 'src/index.ts' },
  clean: true,
  sourcemap: false,
  splitting: true,
  treeshake: true,
  external: [
    '@hono/node-server',
    '@libsql/client',
    'bcryptjs',
    'drizzle-orm',
    'hono',
    'zod',
  ],
});
