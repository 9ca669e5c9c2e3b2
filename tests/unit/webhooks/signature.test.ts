import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { signPayload, verifySignature } from '../../../src/webhooks/signature.js';

const secret = 'test-webhook-secret';
const body = Buffer.from('{"action":"revoked","sender":{"login":"alice"}}');

function hmac(algorithm: string, data: Buffer): string {
  return crypto.createHmac(algorithm, secret).update(data).digest('hex');
}

describe('Webhook signatures', () => {
  describe('signPayload', () => {
    it('should prefix the hex digest with the algorithm', () => {
      expect(signPayload(body, secret)).toBe(`sha256=${hmac('sha256', body)}`);
      expect(signPayload(body, secret, 'sha1')).toBe(`sha1=${hmac('sha1', body)}`);
    });
  });

  describe('verifySignature', () => {
    it('should accept a valid sha256 signature', () => {
      expect(verifySignature(body, { sha256: `sha256=${hmac('sha256', body)}` }, secret)).toEqual({
        valid: true,
        algorithm: 'sha256',
      });
    });

    it('should accept a valid legacy sha1 signature', () => {
      expect(verifySignature(body, { sha1: `sha1=${hmac('sha1', body)}` }, secret)).toEqual({
        valid: true,
        algorithm: 'sha1',
      });
    });

    it('should check sha256 and ignore sha1 when both are sent', () => {
      const check = verifySignature(
        body,
        { sha256: 'sha256=0000', sha1: `sha1=${hmac('sha1', body)}` },
        secret
      );

      expect(check).toEqual({ valid: false, reason: 'mismatch' });
    });

    it('should report a missing signature', () => {
      expect(verifySignature(body, {}, secret)).toEqual({ valid: false, reason: 'missing' });
      expect(verifySignature(body, { sha256: '' }, secret)).toEqual({ valid: false, reason: 'missing' });
    });

    it('should report an unknown algorithm', () => {
      expect(verifySignature(body, { sha256: `md5=${hmac('md5', body)}` }, secret)).toEqual({
        valid: false,
        reason: 'unsupported',
      });
      expect(verifySignature(body, { sha256: hmac('sha256', body) }, secret)).toEqual({
        valid: false,
        reason: 'unsupported',
      });
    });

    it('should reject a signature made with another secret', () => {
      const forged = crypto.createHmac('sha256', 'other-secret').update(body).digest('hex');

      expect(verifySignature(body, { sha256: `sha256=${forged}` }, secret)).toEqual({
        valid: false,
        reason: 'mismatch',
      });
    });

    it('should reject a signature over a different body', () => {
      const tampered = Buffer.from('{"action":"revoked","sender":{"login":"bob"}}');

      expect(verifySignature(tampered, { sha256: signPayload(body, secret) }, secret)).toEqual({
        valid: false,
        reason: 'mismatch',
      });
    });

    it('should treat a truncated digest as a mismatch', () => {
      const truncated = `sha256=${hmac('sha256', body).slice(0, 20)}`;

      expect(verifySignature(body, { sha256: truncated }, secret)).toEqual({ valid: false, reason: 'mismatch' });
    });
  });
});
