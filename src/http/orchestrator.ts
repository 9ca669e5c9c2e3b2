/**
 * Gate Orchestrator
 *
 * Builds every gate component from a validated configuration, wiring the
 * shared session index, session store and audit service into each consumer.
 */

import type { TeamGateConfig } from '../config/schema.js';
import { AuditService } from '../core/audit-service.js';
import { LoginDance } from '../core/login-dance.js';
import { SessionIndex } from '../core/session-index.js';
import { TeamMatcher } from '../core/team-matcher.js';
import type { AuditEntry } from '../core/types.js';
import { createGitHubClientFactory } from '../github/client.js';
import type { GitHubClientFactory } from '../github/client.js';
import { DEFAULT_OAUTH_SCOPES, GitHubOAuthFlow, oauthEndpoints } from '../github/oauth-flow.js';
import { SessionCookieCodec } from '../sessions/cookie-codec.js';
import { InMemorySessionStore } from '../sessions/memory-store.js';
import type { SessionMiddlewareOptions } from '../sessions/middleware.js';
import type { SessionStore } from '../sessions/types.js';
import { WebhookDispatcher } from '../webhooks/dispatcher.js';
import { RequestGate } from './gate.js';

export interface GateContext {
  config: TeamGateConfig;
  auditService: AuditService;
  index: SessionIndex;
  matcher: TeamMatcher;
  store: SessionStore;
  sessions: SessionMiddlewareOptions;
  oauth: GitHubOAuthFlow;
  loginDance: LoginDance;
  dispatcher: WebhookDispatcher;
  gate: RequestGate;
}

export interface GateContextOptions {
  /** Session store (default: InMemorySessionStore) */
  store?: SessionStore;
  /** GitHub API client factory (default: fetch-based client for the configured instance) */
  clientFactory?: GitHubClientFactory;
  /** fetch used for the OAuth code exchange (default: global fetch) */
  fetch?: typeof fetch;
  onAuditOverflow?: (entries: AuditEntry[]) => void;
}

export function buildGateContext(config: TeamGateConfig, options: GateContextOptions = {}): GateContext {
  const { github, sessions } = config;

  // Null object when disabled
  const auditService = config.audit.enabled
    ? new AuditService({ enabled: true, maxEntries: config.audit.maxEntries, onOverflow: options.onAuditOverflow })
    : new AuditService();

  const index = new SessionIndex();
  const matcher = new TeamMatcher({
    readWriteTeams: github.readWriteTeams,
    readOnlyTeams: github.readOnlyTeams,
  });
  const store = options.store ?? new InMemorySessionStore({ maxAgeSeconds: sessions.maxAgeSeconds });

  const oauth = new GitHubOAuthFlow({
    clientId: github.oauthClientId,
    clientSecret: github.oauthClientSecret,
    ...oauthEndpoints(github.enterpriseUrl),
    scopes: DEFAULT_OAUTH_SCOPES,
    callbackUrl: github.callbackUrl,
    fetch: options.fetch,
  });

  const loginDance = new LoginDance({
    clientFactory: options.clientFactory ?? createGitHubClientFactory(github.enterpriseUrl),
    matcher,
    index,
    defaultTeamId: github.defaultTeamId,
    auditService,
  });

  const dispatcher = new WebhookDispatcher({
    webhookSecret: github.webhookSecret,
    index,
    matcher,
    store,
    auditService,
  });

  const gate = new RequestGate({ oauth, loginDance, index, dispatcher });

  return {
    config,
    auditService,
    index,
    matcher,
    store,
    sessions: {
      store,
      codec: new SessionCookieCodec({
        authKey: sessions.authKey,
        cryptKey: sessions.cryptKey,
        maxAgeSeconds: sessions.maxAgeSeconds,
      }),
      cookieName: sessions.cookieName,
      maxAgeSeconds: sessions.maxAgeSeconds,
      secureCookie: sessions.secureCookie,
    },
    oauth,
    loginDance,
    dispatcher,
    gate,
  } satisfies GateContext;
}
