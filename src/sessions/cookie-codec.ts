/**
 * Session Cookie Codec
 *
 * The cookie carries only the session id, signed then encrypted:
 * - inner: HS256 JWT `{ sid }` signed with the session auth key
 * - outer: compact JWE (`dir` + `A256GCM`) keyed by the session crypt key
 *
 * Both keys are configured as strings and stretched to 256 bits with SHA-256.
 * A cookie that fails decryption, signature or expiry checks decodes to
 * undefined and the caller starts a fresh session.
 */

import crypto from 'crypto';
import { CompactEncrypt, SignJWT, compactDecrypt, jwtVerify } from 'jose';

export interface SessionCookieCodecConfig {
  authKey: string;
  cryptKey: string;
  /** Lifetime of the signed token in seconds */
  maxAgeSeconds: number;
}

function deriveKey(secret: string): Uint8Array {
  return new Uint8Array(crypto.createHash('sha256').update(secret, 'utf-8').digest());
}

export class SessionCookieCodec {
  private readonly authKey: Uint8Array;
  private readonly cryptKey: Uint8Array;
  private readonly maxAgeSeconds: number;

  constructor(config: SessionCookieCodecConfig) {
    this.authKey = deriveKey(config.authKey);
    this.cryptKey = deriveKey(config.cryptKey);
    this.maxAgeSeconds = config.maxAgeSeconds;
  }

  async encode(sessionId: string): Promise<string> {
    const signed = await new SignJWT({ sid: sessionId })
      .setProtectedHeader({ alg: 'HS256' })
      .setIssuedAt()
      .setExpirationTime(`${this.maxAgeSeconds}s`)
      .sign(this.authKey);

    return new CompactEncrypt(new TextEncoder().encode(signed))
      .setProtectedHeader({ alg: 'dir', enc: 'A256GCM', cty: 'JWT' })
      .encrypt(this.cryptKey);
  }

  /**
   * @returns the session id, or undefined for a forged, stale or garbled cookie
   */
  async decode(cookie: string): Promise<string | undefined> {
    try {
      const { plaintext } = await compactDecrypt(cookie, this.cryptKey);
      const { payload } = await jwtVerify(new TextDecoder().decode(plaintext), this.authKey, {
        algorithms: ['HS256'],
      });
      return typeof payload.sid === 'string' && payload.sid.length > 0 ? payload.sid : undefined;
    } catch (error) {
      console.debug(
        '[SessionCookieCodec] rejecting session cookie:',
        error instanceof Error ? error.message : String(error)
      );
      return undefined;
    }
  }
}
