import bcrypt from 'bcryptjs';
import { InputValidationException } from '../core/exceptions';

/**
 * Password hashing for stored credentials. Kept apart from the rest of the
 * store so the security-sensitive code can be audited on its own.
 *
 * Hashes are bcrypt strings (`$2b$<cost>$<salt+digest>`); the salt travels
 * inside the hash, so verification needs nothing else.
 */

export const DEFAULT_PASSWORD_ROUNDS = 12;
export const MIN_PASSWORD_ROUNDS = 4;
export const MAX_PASSWORD_ROUNDS = 15;

/** bcrypt ignores everything past this many UTF-8 bytes. */
export const MAX_PASSWORD_BYTES = 72;

/**
 * Whether bcrypt would hash `plaintext` in full.
 */
export function fitsPasswordLimit(plaintext: string): boolean {
  return !bcrypt.truncates(plaintext);
}

export async function hashPassword(
  plaintext: string,
  rounds: number = DEFAULT_PASSWORD_ROUNDS
): Promise<string> {
  if (!Number.isInteger(rounds) || rounds < MIN_PASSWORD_ROUNDS || rounds > MAX_PASSWORD_ROUNDS) {
    throw new RangeError(
      `Password rounds must be an integer between ${MIN_PASSWORD_ROUNDS} and ${MAX_PASSWORD_ROUNDS}`
    );
  }
  if (!fitsPasswordLimit(plaintext)) {
    throw new InputValidationException(`Password must be at most ${MAX_PASSWORD_BYTES} bytes`, [
      { path: 'password', message: `Password must be at most ${MAX_PASSWORD_BYTES} bytes` },
    ]);
  }
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(plaintext, salt);
}

/**
 * Checks a plaintext password against a stored hash.
 * A malformed stored hash never matches, and neither does a password too
 * long to have been hashed in full.
 */
export async function verifyPassword(plaintext: string, storedHash: string): Promise<boolean> {
  if (!storedHash.startsWith('$2') || !fitsPasswordLimit(plaintext)) return false;
  return bcrypt.compare(plaintext, storedHash);
}
