/**
 * LoginDance Tests
 *
 * From access token to authorized, indexed session, against an in-process
 * GitHub.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AuditService, InMemoryAuditStorage } from '../../../src/core/audit-service.js';
import { LoginDance } from '../../../src/core/login-dance.js';
import { SessionIndex } from '../../../src/core/session-index.js';
import { TeamMatcher } from '../../../src/core/team-matcher.js';
import { InMemorySessionStore } from '../../../src/sessions/memory-store.js';
import type { Session } from '../../../src/sessions/types.js';
import { FakeGitHub } from '../../../src/testing/index.js';

describe('LoginDance', () => {
  let github: FakeGitHub;
  let index: SessionIndex;
  let store: InMemorySessionStore;
  let storage: InMemoryAuditStorage;
  let dance: LoginDance;
  let session: Session;

  beforeEach(async () => {
    github = new FakeGitHub(2);
    index = new SessionIndex();
    store = new InMemorySessionStore();
    storage = new InMemoryAuditStorage();
    dance = new LoginDance({
      clientFactory: github.clientFactory,
      matcher: new TeamMatcher({ readWriteTeams: ['acme/infra'], readOnlyTeams: ['acme'] }),
      index,
      defaultTeamId: 'default-team',
      auditService: new AuditService({ enabled: true, storage }),
    });
    session = await store.create();
  });

  describe('Successful login', () => {
    it('should authorize, save and index a rw session', async () => {
      github.addUser('test-token', { login: 'alice', teams: [['acme', 'infra']] });

      const result = await dance.run(session, 'test-token');

      expect(result).toEqual({
        outcome: 'ok',
        username: 'alice',
        tier: 'rw',
        teamId: 'default-team',
        binding: { org: 'acme', team: 'infra' },
      });
      expect(session.get('accesslevel')).toBe('rw');
      expect(session.get('teamID')).toBe('default-team');
      expect(session.get('username')).toBe('alice');
      expect(store.has(session.id)).toBe(true);
      expect(index.sessionsOf('alice')).toEqual([{ sessionId: session.id, binding: { org: 'acme', team: 'infra' } }]);
    });

    it('should grant ro through organization membership', async () => {
      github.addUser('test-token', { login: 'bob', teams: [['globex', 'infra']], orgs: ['acme'] });

      const result = await dance.run(session, 'test-token');

      expect(result).toMatchObject({ outcome: 'ok', tier: 'ro', binding: { org: 'acme' } });
      expect(session.get('accesslevel')).toBe('ro');
      expect(index.snapshot().teams).toEqual({});
    });

    it('should not list organizations after a rw team', async () => {
      github.addUser('test-token', { login: 'alice', teams: [['acme', 'infra']], orgs: ['acme'] });

      await dance.run(session, 'test-token');

      expect(github.calls).toEqual({ user: 1, teamPages: 1, orgPages: 0 });
    });

    it('should audit the granted tier', async () => {
      github.addUser('test-token', { login: 'alice', teams: [['acme', 'infra']] });

      await dance.run(session, 'test-token');

      expect(storage.getEntries()).toHaveLength(1);
      expect(storage.getEntries()[0]).toMatchObject({
        source: 'auth:login-dance',
        userId: 'alice',
        action: 'login',
        success: true,
        reason: 'granted rw',
        metadata: { tier: 'rw', org: 'acme', team: 'infra' },
      });
    });
  });

  describe('Unauthorized', () => {
    it('should end unauthorized after paging through every non-matching membership (scenario E)', async () => {
      github.addUser('test-token', {
        login: 'mallory',
        teams: [
          ['globex', 'a'],
          ['globex', 'b'],
          ['globex', 'c'],
          ['initech', 'd'],
          ['initech', 'e'],
        ],
        orgs: ['globex', 'initech', 'umbrella'],
      });

      const result = await dance.run(session, 'test-token');

      expect(result).toEqual({
        outcome: 'unauthorized',
        reason: 'no matching team or organization',
        username: 'mallory',
      });
      expect(github.calls).toEqual({ user: 1, teamPages: 3, orgPages: 2 });
      expect(index.size()).toEqual({ users: 0, teams: 0, sessions: 0 });
      expect(session.has('teamID')).toBe(false);
      expect(store.has(session.id)).toBe(false);
    });

    it('should reject a user without a login', async () => {
      github.addUser('test-token', { teams: [['acme', 'infra']] });

      const result = await dance.run(session, 'test-token');

      expect(result).toEqual({ outcome: 'unauthorized', reason: 'user has no login' });
      expect(github.calls.teamPages).toBe(0);
    });

    it('should audit the failure', async () => {
      github.addUser('test-token', { login: 'mallory' });

      await dance.run(session, 'test-token');

      expect(storage.getEntries()[0]).toMatchObject({
        source: 'auth:login-dance',
        userId: 'mallory',
        success: false,
        reason: 'no matching team or organization',
      });
    });
  });

  describe('Internal failure', () => {
    it('should fail when the client cannot be built', async () => {
      const broken = new LoginDance({
        clientFactory: () => {
          throw new TypeError('Invalid URL');
        },
        matcher: new TeamMatcher({ readWriteTeams: ['acme/infra'], readOnlyTeams: [] }),
        index,
        defaultTeamId: 'default-team',
      });

      const result = await broken.run(session, 'test-token');

      expect(result).toMatchObject({ outcome: 'internal-failure', reason: 'client construction failed' });
    });

    it('should fail when the user lookup fails', async () => {
      const result = await dance.run(session, 'unknown-token');

      expect(result).toMatchObject({ outcome: 'internal-failure', reason: 'failed to get authenticated user' });
    });

    it('should abort on a page error without touching the index or the session', async () => {
      github.addUser('test-token', { login: 'alice', teams: [['globex', 'a']], orgs: ['acme'] });
      github.failOn = 'orgs';

      const result = await dance.run(session, 'test-token');

      expect(result).toMatchObject({ outcome: 'internal-failure', reason: 'failed to list memberships' });
      expect(index.size().sessions).toBe(0);
      expect(session.has('accesslevel')).toBe(false);
      expect(store.has(session.id)).toBe(false);
      expect(storage.getEntries()[0]).toMatchObject({
        success: false,
        error: 'GET /orgs failed: 502 Bad Gateway',
      });
    });

    it('should not index a session that could not be saved', async () => {
      github.addUser('test-token', { login: 'alice', teams: [['acme', 'infra']] });
      vi.spyOn(session, 'save').mockRejectedValue(new Error('store down'));

      const result = await dance.run(session, 'test-token');

      expect(result).toMatchObject({ outcome: 'internal-failure', reason: 'failed to save session' });
      expect(index.size().sessions).toBe(0);
    });
  });
});
