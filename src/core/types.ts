/**
 * Core Authorization Types
 *
 * Type definitions shared by the matcher, the session index, the login dance
 * and the webhook dispatcher. Nothing in here performs I/O.
 *
 * Architectural Rule: src/core/ MUST NOT import from src/http/ or
 * src/webhooks/. It may use the GitHub client and session contracts.
 */

// ============================================================================
// Access Tiers
// ============================================================================

/**
 * Access tier granted to a session.
 *
 * The string values are what ends up in the session bag under `accesslevel`,
 * so they must stay stable across releases.
 */
export type AccessTier = 'none' | 'ro' | 'rw';

export const TIER_NONE = 'none';
export const TIER_READ_ONLY = 'ro';
export const TIER_READ_WRITE = 'rw';

/**
 * HTTP methods allowed for sessions below the read-write tier
 */
export const READ_ONLY_METHODS: readonly string[] = ['GET', 'HEAD'];

// ============================================================================
// Session Keys
// ============================================================================

/**
 * Keys the gate reads and writes in the session bag.
 *
 * `teamID` is only present once a login dance completed, so it doubles as the
 * "logged in" marker.
 */
export const SESSION_KEYS = {
  state: 'state',
  desiredUrl: 'desiredurl',
  accessLevel: 'accesslevel',
  teamId: 'teamID',
  username: 'username',
} as const;

// ============================================================================
// Team Bindings
// ============================================================================

/**
 * The membership that justified a session's tier.
 *
 * `team` is absent when the session was granted through organization
 * membership alone. Such bindings are never tracked in the team → users map.
 */
export interface TeamBinding {
  org: string;
  team?: string;
}

/**
 * Build the canonical `org/team` name used in configuration and as the key of
 * the team → users map.
 */
export function makeTeamName(org: string, team: string): string {
  return `${org}/${team}`;
}

/**
 * Two bindings are equal when they name the same org and the same team (or
 * both carry no team).
 */
export function sameBinding(a: TeamBinding, b: TeamBinding): boolean {
  return a.org === b.org && a.team === b.team;
}

// ============================================================================
// Team Matching
// ============================================================================

/**
 * A team membership as reported by the provider.
 *
 * Every field is optional because the provider may omit any of them; the
 * matcher skips incomplete entries.
 */
export interface ProviderTeam {
  name?: string | null;
  organization?: {
    login?: string | null;
  } | null;
}

/**
 * An organization membership as reported by the provider
 */
export interface ProviderOrg {
  login?: string | null;
}

/**
 * Outcome of matching a caller's memberships against the configured rules
 */
export type TeamMatchResult =
  | { tier: 'none' }
  | { tier: 'ro' | 'rw'; binding: TeamBinding };

// ============================================================================
// Audit Types
// ============================================================================

/**
 * AuditEntry represents a single audit log entry.
 *
 * All audit entries MUST include a source field (e.g. 'auth:login-dance',
 * 'auth:webhook') so the trail can be attributed.
 */
export interface AuditEntry {
  /** Timestamp when the event occurred */
  timestamp: Date;

  /** Origin of the audit entry */
  source: string;

  /** Provider username associated with the event (if known) */
  userId?: string;

  /** Action that was performed */
  action: string;

  /** Whether the action succeeded */
  success: boolean;

  /** Human-readable reason for the result */
  reason?: string;

  /** Error message if the action failed */
  error?: string;

  /** Additional metadata about the event */
  metadata?: Record<string, unknown>;
}
