import { describe, it, expect, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createClient, type Client } from '@libsql/client';
import {
  BlogDatabase,
  ensureSchema,
  listTables,
  TABLE_DDL,
  TABLE_NAMES,
  createConsoleLogger,
  type Logger,
} from '../src/index.js';

function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe('ensureSchema', () => {
  let client: Client | undefined;

  afterEach(() => {
    client?.close();
    client = undefined;
  });

  it('should create every table in an empty store', async () => {
    client = createClient({ url: ':memory:' });
    const logger = createMockLogger();

    const created = await ensureSchema(client, logger);

    expect(created).toEqual(['users', 'posts', 'tags', 'comments', 'post_tags']);
    expect((await listTables(client)).sort()).toEqual([...TABLE_NAMES].sort());
    expect(logger.info).toHaveBeenCalledWith('Database is empty, creating all tables');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should create nothing when every table is present', async () => {
    client = createClient({ url: ':memory:' });
    await ensureSchema(client, createMockLogger());
    const logger = createMockLogger();

    expect(await ensureSchema(client, logger)).toEqual([]);
    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should recreate only the missing tables and warn about each', async () => {
    client = createClient({ url: ':memory:' });
    await client.execute(TABLE_DDL.users);
    await client.execute(TABLE_DDL.tags);
    const logger = createMockLogger();

    const created = await ensureSchema(client, logger);

    expect(created).toEqual(['posts', 'comments', 'post_tags']);
    expect(logger.warn.mock.calls).toEqual([
      ["Table 'posts' does not exist in the database, recreating it"],
      ["Table 'comments' does not exist in the database, recreating it"],
      ["Table 'post_tags' does not exist in the database, recreating it"],
    ]);
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should turn foreign key enforcement on', async () => {
    client = createClient({ url: ':memory:' });
    await ensureSchema(client, createMockLogger());

    const result = await client.execute('PRAGMA foreign_keys');

    expect(Number(result.rows[0]?.foreign_keys)).toBe(1);
  });
});

describe('file-backed store', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should create the parent directory and keep data across reopen', async () => {
    dir = mkdtempSync(join(tmpdir(), 'inkpost-'));
    const path = join(dir, 'nested', 'blog.db');
    const logger = createConsoleLogger({ level: 'silent' });

    const first = await BlogDatabase.open({ path, logger, passwordRounds: 4 });
    await first.addUser('Ada', 'Lovelace', 'ada@example.com', 'analytical-engine');
    first.close();

    const second = await BlogDatabase.open({ path, logger, passwordRounds: 4 });
    try {
      expect(await second.getUserEmail(1)).toBe('ada@example.com');
      expect(await second.attemptLogin('ada@example.com', 'analytical-engine')).toBe(true);
    } finally {
      second.close();
    }
  });

  it('should restore a dropped table without touching the others', async () => {
    dir = mkdtempSync(join(tmpdir(), 'inkpost-'));
    const path = join(dir, 'blog.db');
    const silent = createConsoleLogger({ level: 'silent' });

    const first = await BlogDatabase.open({ path, logger: silent, passwordRounds: 4 });
    await first.addUser('Ada', 'Lovelace', 'ada@example.com', 'analytical-engine');
    first.close();

    const raw = createClient({ url: `file:${path}` });
    await raw.execute('DROP TABLE comments');
    raw.close();

    const logger = createMockLogger();
    const second = await BlogDatabase.open({ path, logger, passwordRounds: 4 });
    try {
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        "Database: Table 'comments' does not exist in the database, recreating it",
        undefined
      );
      expect(await second.getUserFirstName(1)).toBe('Ada');
      const postId = await second.addPost(1, 'Back', 'Comments work again');
      expect(await second.addComment(postId, 1, 'Hello')).toBe(1);
    } finally {
      second.close();
    }
  });
});
