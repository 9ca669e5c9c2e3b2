/**
 * Unit Tests for SecretResolver
 *
 * Descriptor replacement across nested objects and arrays, provider
 * precedence, failure modes and the audit trail.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SecretResolver } from '../../../../src/config/secrets/SecretResolver.js';
import type { ISecretProvider } from '../../../../src/config/secrets/ISecretProvider.js';
import { AuditService, InMemoryAuditStorage } from '../../../../src/core/audit-service.js';

class MapProvider implements ISecretProvider {
  constructor(private readonly values: Record<string, string>) {}

  async resolve(name: string): Promise<string | undefined> {
    return this.values[name];
  }
}

class BrokenProvider implements ISecretProvider {
  async resolve(): Promise<string | undefined> {
    throw new Error('vault sealed');
  }
}

describe('SecretResolver', () => {
  let resolver: SecretResolver;

  beforeEach(() => {
    resolver = new SecretResolver();
  });

  describe('resolveSecrets', () => {
    it('should replace nested descriptors and leave everything else alone', async () => {
      resolver.addProvider(new MapProvider({ CLIENT_SECRET: 'test-client-secret', KEY: 'test-key' }));
      const config = {
        github: { oauthClientSecret: { $secret: 'CLIENT_SECRET' }, readWriteTeams: ['acme/infra'] },
        keys: [{ $secret: 'KEY' }, 'literal'],
        port: 8000,
      };

      const resolved = await resolver.resolveSecrets(config);

      expect(resolved).toEqual({
        github: { oauthClientSecret: 'test-client-secret', readWriteTeams: ['acme/infra'] },
        keys: ['test-key', 'literal'],
        port: 8000,
      });
      expect(config.github.oauthClientSecret).toEqual({ $secret: 'CLIENT_SECRET' });
    });

    it('should not treat objects with extra keys as descriptors', async () => {
      resolver.addProvider(new MapProvider({ KEY: 'test-key' }));
      const config = { value: { $secret: 'KEY', note: 'kept' } };

      expect(await resolver.resolveSecrets(config)).toEqual(config);
    });

    it('should let earlier providers win', async () => {
      resolver.addProvider(new MapProvider({ KEY: 'from-file' }));
      resolver.addProvider(new MapProvider({ KEY: 'from-env' }));

      expect(await resolver.resolveSecrets({ $secret: 'KEY' })).toBe('from-file');
    });

    it('should fall through a provider that throws', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      resolver.addProvider(new BrokenProvider());
      resolver.addProvider(new MapProvider({ KEY: 'test-key' }));

      expect(await resolver.resolveSecrets({ $secret: 'KEY' })).toBe('test-key');
    });

    it('should name the secret and its path when nothing resolves it', async () => {
      resolver.addProvider(new MapProvider({}));

      await expect(resolver.resolveSecrets({ sessions: { authKey: { $secret: 'AUTH_KEY' } } })).rejects.toThrow(
        '[SecretResolver] Secret "AUTH_KEY" at "config.sessions.authKey" could not be resolved by any provider'
      );
    });

    it('should keep the descriptor when failFast is off', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const lenient = new SecretResolver({ failFast: false });

      expect(await lenient.resolveSecrets({ key: { $secret: 'MISSING' } })).toEqual({
        key: { $secret: 'MISSING' },
      });
    });
  });

  describe('providers', () => {
    it('should list and clear providers', () => {
      resolver.addProvider(new MapProvider({}));
      expect(resolver.getProviders()).toHaveLength(1);

      resolver.clearProviders();
      expect(resolver.getProviders()).toEqual([]);
    });
  });

  describe('audit', () => {
    it('should record the provider that answered, never the value', async () => {
      const storage = new InMemoryAuditStorage();
      const audited = new SecretResolver({ auditService: new AuditService({ enabled: true, storage }) });
      audited.addProvider(new MapProvider({ KEY: 'test-key' }));

      await audited.resolveSecrets({ session: { $secret: 'KEY' } });

      expect(storage.getEntries()).toHaveLength(1);
      expect(storage.getEntries()[0]).toMatchObject({
        source: 'secret:resolution',
        userId: 'system',
        action: 'resolve:KEY',
        success: true,
        metadata: { secretName: 'KEY', provider: 'MapProvider', configPath: 'config.session' },
      });
      expect(JSON.stringify(storage.getEntries())).not.toContain('test-key');
    });
  });
});
