/**
 * Login Dance - From Access Token to Authorized Session
 *
 * Coordinates one authentication attempt:
 * 1. Build a GitHub client for the access token
 * 2. Fetch the authenticated user (must have a login)
 * 3. Match teams, then organizations, against the configured rules
 * 4. Write username, tier and team id into the session and save it
 * 5. Record the session in the session index
 *
 * Outcomes:
 * - ok: the session is authorized and indexed
 * - unauthorized: no login or no matching rule; not an error
 * - internal-failure: any provider or session store error; aborts at once
 *
 * The index is only touched after every provider call succeeded and the
 * session was saved, so an aborted dance leaves no partial entry behind.
 */

import type { GitHubClient, GitHubClientFactory } from '../github/client.js';
import type { Session } from '../sessions/types.js';
import { AuditService } from './audit-service.js';
import type { SessionIndex } from './session-index.js';
import type { TeamMatcher } from './team-matcher.js';
import { SESSION_KEYS } from './types.js';
import type { TeamBinding, TeamMatchResult } from './types.js';

export interface LoginDanceOptions {
  clientFactory: GitHubClientFactory;
  matcher: TeamMatcher;
  index: SessionIndex;
  /** Team id stored in the session and handed to the caller on success */
  defaultTeamId: string;
  auditService?: AuditService;
}

export type LoginDanceResult =
  | { outcome: 'ok'; username: string; tier: 'ro' | 'rw'; teamId: string; binding: TeamBinding }
  | { outcome: 'unauthorized'; reason: string; username?: string }
  | { outcome: 'internal-failure'; reason: string; error?: unknown };

const AUDIT_SOURCE = 'auth:login-dance';

export class LoginDance {
  private readonly auditService: AuditService;

  constructor(private readonly options: LoginDanceOptions) {
    this.auditService = options.auditService ?? new AuditService();
  }

  async run(session: Session, accessToken: string): Promise<LoginDanceResult> {
    const result = await this.dance(session, accessToken);
    await this.audit(result);
    return result;
  }

  private async dance(session: Session, accessToken: string): Promise<LoginDanceResult> {
    let client: GitHubClient;
    try {
      client = this.options.clientFactory(accessToken);
    } catch (error) {
      console.error('[LoginDance] failed to create GitHub client:', errorMessage(error));
      return { outcome: 'internal-failure', reason: 'client construction failed', error };
    }

    let login: string | null | undefined;
    try {
      login = (await client.getAuthenticatedUser()).login;
    } catch (error) {
      console.error('[LoginDance] failed to get authenticated user:', errorMessage(error));
      return { outcome: 'internal-failure', reason: 'failed to get authenticated user', error };
    }
    if (!login) {
      console.error('[LoginDance] authenticated as a user without a login');
      return { outcome: 'unauthorized', reason: 'user has no login' };
    }

    let match: TeamMatchResult;
    try {
      match = await this.options.matcher.match(client.listUserTeams(), () => client.listUserOrgs());
    } catch (error) {
      console.error('[LoginDance] failed to list teams or organizations:', errorMessage(error));
      return { outcome: 'internal-failure', reason: 'failed to list memberships', error };
    }

    if (match.tier === 'none') {
      console.debug(`[LoginDance] ${login} is not authorized`);
      return { outcome: 'unauthorized', reason: 'no matching team or organization', username: login };
    }

    const teamId = this.options.defaultTeamId;
    session.set(SESSION_KEYS.accessLevel, match.tier);
    session.set(SESSION_KEYS.teamId, teamId);
    session.set(SESSION_KEYS.username, login);
    try {
      await session.save();
    } catch (error) {
      console.error('[LoginDance] failed to save the session:', errorMessage(error));
      return { outcome: 'internal-failure', reason: 'failed to save session', error };
    }

    this.options.index.insert(login, session.id, match.binding);
    console.log(`[LoginDance] ${login} logged in with ${match.tier} access`);

    return { outcome: 'ok', username: login, tier: match.tier, teamId, binding: match.binding };
  }

  private async audit(result: LoginDanceResult): Promise<void> {
    try {
      await this.auditService.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        userId: result.outcome === 'internal-failure' ? undefined : result.username,
        action: 'login',
        success: result.outcome === 'ok',
        reason: result.outcome === 'ok' ? `granted ${result.tier}` : result.reason,
        error: result.outcome === 'internal-failure' ? errorMessage(result.error) : undefined,
        metadata:
          result.outcome === 'ok'
            ? { tier: result.tier, org: result.binding.org, team: result.binding.team }
            : undefined,
      });
    } catch (error) {
      console.error('[LoginDance] failed to write audit entry:', errorMessage(error));
    }
  }
}

function errorMessage(error: unknown): string {
  if (error === undefined) {
    return '';
  }
  return error instanceof Error ? error.message : String(error);
}
