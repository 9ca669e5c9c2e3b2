/**
 * Gate Orchestrator Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { buildGateContext } from '../../../src/http/orchestrator.js';
import { InMemorySessionStore } from '../../../src/sessions/memory-store.js';
import { createTestConfig } from '../../../src/testing/index.js';

describe('buildGateContext', () => {
  it('should share one index and one store between login and webhooks', async () => {
    const context = buildGateContext(createTestConfig());
    const session = await context.store.create();
    await session.save();
    context.index.insert('alice', session.id, { org: 'acme', team: 'infra' });

    context.dispatcher.invalidate({ type: 'app-authorization-revoked', username: 'alice' });

    expect(context.index.size().sessions).toBe(0);
  });

  it('should default to an in-memory store configured from the session section', () => {
    const context = buildGateContext(createTestConfig({ sessions: { cookieName: 'gate' } }));

    expect(context.store).toBeInstanceOf(InMemorySessionStore);
    expect(context.sessions).toMatchObject({ cookieName: 'gate', maxAgeSeconds: 3600, secureCookie: false });
  });

  it('should use an injected store', () => {
    const store = new InMemorySessionStore();

    expect(buildGateContext(createTestConfig(), { store }).store).toBe(store);
  });

  it('should disable auditing when configured off', () => {
    expect(buildGateContext(createTestConfig({ audit: { enabled: false } })).auditService.isEnabled()).toBe(false);
  });

  it('should bound the audit storage by audit.maxEntries', async () => {
    const overflows: number[] = [];
    const context = buildGateContext(createTestConfig({ audit: { maxEntries: 1 } }), {
      onAuditOverflow: (entries) => overflows.push(entries.length),
    });
    const entry = { timestamp: new Date(), source: 'test', action: 'login', success: true };

    await context.auditService.log(entry);
    await context.auditService.log(entry);

    const storage = context.auditService._getStorage();
    expect(storage).toBeInstanceOf(InMemoryAuditStorage);
    expect(storage instanceof InMemoryAuditStorage ? storage.getEntries() : []).toHaveLength(1);
    expect(overflows).toEqual([2]);
  });

  it('should point the OAuth flow at the enterprise instance', () => {
    const context = buildGateContext(createTestConfig({ github: { enterpriseUrl: 'https://ghe.example.com' } }));

    expect(context.oauth.buildAuthorizeUrl('test-state')).toMatch(
      /^https:\/\/ghe\.example\.com\/login\/oauth\/authorize\?/
    );
  });
});
