/**
 * Webhook signature verification
 *
 * GitHub signs every delivery with an HMAC of the raw body keyed by the
 * webhook secret, sent as `<algorithm>=<hex digest>`:
 * - X-Hub-Signature-256: sha256=...
 * - X-Hub-Signature:     sha1=... (legacy)
 *
 * The SHA-256 header is checked when present; the SHA-1 header is only
 * consulted when it is absent.
 */

import crypto from 'crypto';

export const SIGNATURE_256_HEADER = 'x-hub-signature-256';
export const SIGNATURE_HEADER = 'x-hub-signature';

const SUPPORTED_ALGORITHMS = ['sha256', 'sha1'] as const;
export type SignatureAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export interface SignatureHeaders {
  sha256?: string;
  sha1?: string;
}

export type SignatureCheck =
  | { valid: true; algorithm: SignatureAlgorithm }
  | { valid: false; reason: 'missing' | 'unsupported' | 'mismatch' };

function isSupported(algorithm: string): algorithm is SignatureAlgorithm {
  return SUPPORTED_ALGORITHMS.some((supported) => supported === algorithm);
}

/**
 * Compute the signature header value GitHub would send for `body`
 */
export function signPayload(body: Buffer | string, secret: string, algorithm: SignatureAlgorithm = 'sha256'): string {
  return `${algorithm}=${crypto.createHmac(algorithm, secret).update(body).digest('hex')}`;
}

export function verifySignature(body: Buffer, headers: SignatureHeaders, secret: string): SignatureCheck {
  const signature = headers.sha256 || headers.sha1;
  if (!signature) {
    return { valid: false, reason: 'missing' };
  }

  const separator = signature.indexOf('=');
  const algorithm = separator > 0 ? signature.slice(0, separator).toLowerCase() : '';
  if (!isSupported(algorithm)) {
    return { valid: false, reason: 'unsupported' };
  }

  const received = Buffer.from(signature.slice(separator + 1), 'utf-8');
  const expected = Buffer.from(crypto.createHmac(algorithm, secret).update(body).digest('hex'), 'utf-8');

  if (received.length !== expected.length || !crypto.timingSafeEqual(received, expected)) {
    return { valid: false, reason: 'mismatch' };
  }
  return { valid: true, algorithm };
}
