/**
 * Configuration file for inkpost.
 *
 * The file is JSON; every section is optional and falls back to the defaults
 * below.
 *
 * @example
 * ```json
 * {
 *   "logging": { "level": "debug" },
 *   "server": { "host": "0.0.0.0", "port": 8080 },
 *   "database": { "path": "ServerData/database.db" },
 *   "security": { "passwordRounds": 12 }
 * }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LOG_LEVELS } from '../core/logger';
import { ConfigurationException } from '../core/exceptions';
import { DEFAULT_PASSWORD_ROUNDS, MAX_PASSWORD_ROUNDS, MIN_PASSWORD_ROUNDS } from '../database/credentials';

export const DEFAULT_CONFIG_PATH = 'ServerData/config.json';
export const CONFIG_PATH_ENV = 'INKPOST_CONFIG';

// ============================================================================
// Schema
// ============================================================================

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

const ServerSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(5000),
});

const DatabaseSchema = z.object({
  path: z.string().min(1).default('ServerData/database.db'),
});

const SecuritySchema = z.object({
  passwordRounds: z
    .number()
    .int()
    .min(MIN_PASSWORD_ROUNDS)
    .max(MAX_PASSWORD_ROUNDS)
    .default(DEFAULT_PASSWORD_ROUNDS),
});

export const ConfigSchema = z.object({
  logging: LoggingSchema.prefault({}),
  server: ServerSchema.prefault({}),
  database: DatabaseSchema.prefault({}),
  security: SecuritySchema.prefault({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Shape accepted before defaults are applied. */
export type ConfigInput = z.input<typeof ConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Validates a configuration object and fills in defaults.
 *
 * @throws ConfigurationException listing every invalid field.
 */
export function parseConfig(input: unknown): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationException('Invalid configuration', issues, result.error);
  }
  return result.data;
}

/**
 * Reads and validates the JSON configuration file at `filePath`.
 */
export async function loadConfig(filePath: string): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationException(`Cannot read configuration file '${filePath}'`, undefined, error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationException(`Configuration file '${filePath}' is not valid JSON`, undefined, error);
  }

  return parseConfig(parsed);
}

/**
 * Where the server looks for its configuration file.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH;
}
