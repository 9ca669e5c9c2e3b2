/**
 * Core Module Public API
 *
 * Authorization logic with no HTTP or webhook wire concerns.
 */

export { TeamMatcher } from './team-matcher.js';
export type { TeamMatcherConfig } from './team-matcher.js';

export { SessionIndex } from './session-index.js';
export type { IndexedSession, SessionIndexSnapshot } from './session-index.js';

export { ExclusiveLock } from './exclusive-lock.js';

export { LoginDance } from './login-dance.js';
export type { LoginDanceOptions, LoginDanceResult } from './login-dance.js';

export { AuditService, InMemoryAuditStorage } from './audit-service.js';
export type { AuditServiceConfig, AuditStorage } from './audit-service.js';

export {
  TIER_NONE,
  TIER_READ_ONLY,
  TIER_READ_WRITE,
  READ_ONLY_METHODS,
  SESSION_KEYS,
  makeTeamName,
  sameBinding,
} from './types.js';
export type {
  AccessTier,
  TeamBinding,
  ProviderTeam,
  ProviderOrg,
  TeamMatchResult,
  AuditEntry,
} from './types.js';
