import crypto from 'crypto';

/**
 * Cryptographically strong random string of `length` base64url characters.
 * Used for OAuth state tokens.
 */
export function randomString(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(`randomString: invalid length ${length}`);
  }
  const bytes = crypto.randomBytes(Math.ceil((length * 3) / 4));
  return bytes.toString('base64url').slice(0, length);
}
