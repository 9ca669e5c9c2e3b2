// Main export file - re-exports the public API of every layer

export * from './core/index.js';

export { FetchGitHubClient, createGitHubClientFactory, apiBaseUrl, GITHUB_API_URL } from './github/client.js';
export type { GitHubClient, GitHubClientFactory, GitHubUser } from './github/client.js';
export { GitHubOAuthFlow, oauthEndpoints, DEFAULT_OAUTH_SCOPES } from './github/oauth-flow.js';
export type { GitHubOAuthConfig, OAuthTokenResult } from './github/oauth-flow.js';
export { GitHubApiError } from './github/errors.js';

export { InMemorySessionStore } from './sessions/memory-store.js';
export { SessionCookieCodec } from './sessions/cookie-codec.js';
export { sessionMiddleware, getSession, parseCookies } from './sessions/middleware.js';
export type { SessionMiddlewareOptions } from './sessions/middleware.js';
export type { Session, SessionStore } from './sessions/types.js';

export { WebhookDispatcher } from './webhooks/dispatcher.js';
export type { WebhookDelivery, WebhookOutcome } from './webhooks/dispatcher.js';
export { decodeWebhookEvent } from './webhooks/events.js';
export type { WebhookEvent } from './webhooks/events.js';
export { verifySignature, signPayload } from './webhooks/signature.js';

export { RequestGate, getAuth } from './http/gate.js';
export type { GateAuth } from './http/gate.js';
export { createGateServer, startHTTPServer } from './http/server.js';
export { buildGateContext } from './http/orchestrator.js';
export type { GateContext } from './http/orchestrator.js';
export { TeamGateServer } from './http/team-gate-server.js';

export { ConfigManager } from './config/index.js';
export type { TeamGateConfig } from './config/index.js';

export * from './utils/errors.js';
