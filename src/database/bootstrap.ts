import type { Client } from '@libsql/client';
import type { Logger } from '../core/logger';
import { TABLE_DDL, TABLE_NAMES, type TableName } from './ddl';

/**
 * Lists the user tables currently present in the store.
 */
export async function listTables(client: Client): Promise<string[]> {
  const result = await client.execute(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%'"
  );
  return result.rows.map((row) => String(row.name));
}

/**
 * Enables foreign keys on the connection and creates every expected table
 * that is missing. Tables are checked one by one, so a store with a single
 * dropped table gets just that table back.
 *
 * @returns The tables created by this call, in creation order.
 */
export async function ensureSchema(client: Client, logger: Logger): Promise<TableName[]> {
  // Per-connection setting; cascades depend on it.
  await client.execute('PRAGMA foreign_keys = ON');

  logger.debug('Checking that the tables exist in the database');
  const existing = new Set(await listTables(client));

  if (existing.size === 0) {
    logger.info('Database is empty, creating all tables');
  }

  const created: TableName[] = [];
  for (const table of TABLE_NAMES) {
    if (existing.has(table)) continue;

    if (existing.size > 0) {
      logger.warn(`Table '${table}' does not exist in the database, recreating it`);
    }
    await client.execute(TABLE_DDL[table]);
    created.push(table);
  }

  return created;
}
