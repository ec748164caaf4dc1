import {
  ApiException,
  ConstraintViolationException,
  StoreUnavailableException,
  type ConstraintKind,
} from '../core/exceptions';

const UNAVAILABLE_CODES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'SQLITE_READONLY',
  'SQLITE_FULL',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'CLIENT_CLOSED',
];

const CONSTRAINT_MESSAGES: Array<[string, ConstraintKind]> = [
  ['UNIQUE constraint failed', 'unique'],
  ['FOREIGN KEY constraint failed', 'foreign_key'],
  ['NOT NULL constraint failed', 'not_null'],
  ['CHECK constraint failed', 'check'],
];

const CONSTRAINT_CODE_SUFFIXES: Array<[string, ConstraintKind]> = [
  ['_UNIQUE', 'unique'],
  ['_FOREIGNKEY', 'foreign_key'],
  ['_NOTNULL', 'not_null'],
  ['_PRIMARYKEY', 'primary_key'],
  ['_CHECK', 'check'],
];

/**
 * Yields the error and every `cause` beneath it. Drizzle wraps driver
 * errors, so the SQLite code is usually one or two levels down.
 */
function* causeChain(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function constraintKind(code: string | undefined, message: string): ConstraintKind | undefined {
  for (const [fragment, kind] of CONSTRAINT_MESSAGES) {
    if (message.includes(fragment)) {
      // SQLite reports composite primary key clashes as UNIQUE failures.
      if (kind === 'unique' && code?.endsWith('_PRIMARYKEY')) return 'primary_key';
      return kind;
    }
  }
  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    for (const [suffix, kind] of CONSTRAINT_CODE_SUFFIXES) {
      if (code.endsWith(suffix)) return kind;
    }
    return 'unknown';
  }
  return undefined;
}

/**
 * Maps a failure raised by the store driver to an inkpost exception.
 *
 * - constraint failures become {@link ConstraintViolationException}
 * - open/IO/lock failures and a closed client become {@link StoreUnavailableException}
 * - anything else, including exceptions inkpost already raised, comes back unchanged
 */
export function translateStoreError(error: unknown): unknown {
  if (error instanceof ApiException) return error;

  for (const link of causeChain(error)) {
    const code = readCode(link);
    const message = link instanceof Error ? link.message : '';

    const kind = constraintKind(code, message);
    if (kind) {
      return new ConstraintViolationException(message || 'Constraint violation', kind, error);
    }

    if (code && UNAVAILABLE_CODES.some((prefix) => code.startsWith(prefix))) {
      return new StoreUnavailableException(message || 'Store unavailable', error);
    }
  }

  return error;
}

/**
 * Runs a store call and rethrows its failure through {@link translateStoreError}.
 */
export async function withStoreErrors<T>(operation: () => PromiseLike<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateStoreError(error);
  }
}
