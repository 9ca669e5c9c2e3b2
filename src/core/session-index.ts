/**
 * Session Index - Bidirectional Session-to-Authorization Index
 *
 * Tracks which sessions each user holds and which binding justified each of
 * them, together with the reverse team → users map needed to invalidate a
 * whole team at once. Both maps are owned here and only ever change together,
 * inside one critical section of the index lock.
 *
 * Invariants (hold whenever the lock is not held):
 * - every indexed user has at least one session
 * - every team key has at least one user
 * - a session bound to org/team implies its user is in teamUsers[org/team],
 *   and a user in teamUsers[org/team] has at least one session bound to it
 * - org-only bindings never appear in the team map
 *
 * The index never talks to the session store: removal queries return the
 * affected session ids and the caller destroys them.
 */

import { ExclusiveLock } from './exclusive-lock.js';
import { makeTeamName, sameBinding } from './types.js';
import type { TeamBinding } from './types.js';

/**
 * A session entry as returned by the read-only queries
 */
export interface IndexedSession {
  sessionId: string;
  binding: TeamBinding;
}

/**
 * Deep copy of the index contents, used for diagnostics and tests
 */
export interface SessionIndexSnapshot {
  users: Record<string, Record<string, TeamBinding>>;
  teams: Record<string, string[]>;
}

export class SessionIndex {
  private readonly userSessions = new Map<string, Map<string, TeamBinding>>();
  private readonly teamUsers = new Map<string, Set<string>>();
  private readonly lock = new ExclusiveLock('session-index');

  /**
   * Record a freshly logged-in session.
   *
   * Re-inserting an existing session id replaces its binding.
   */
  insert(username: string, sessionId: string, binding: TeamBinding): void {
    const stored: TeamBinding = binding.team === undefined
      ? { org: binding.org }
      : { org: binding.org, team: binding.team };

    this.lock.run(() => {
      let sessions = this.userSessions.get(username);
      if (!sessions) {
        sessions = new Map();
        this.userSessions.set(username, sessions);
      }

      const previous = sessions.get(sessionId);
      sessions.set(sessionId, stored);
      if (previous && !sameBinding(previous, stored)) {
        this.detachFromTeam(username, sessions, previous);
      }

      if (stored.team !== undefined) {
        const teamName = makeTeamName(stored.org, stored.team);
        let users = this.teamUsers.get(teamName);
        if (!users) {
          users = new Set();
          this.teamUsers.set(teamName, users);
        }
        users.add(username);
      }
    });
  }

  /**
   * Drop one session of a user, typically on logout or failed re-login.
   */
  removeByUserAndSession(username: string, sessionId: string): string[] {
    return this.lock.run(() => {
      const sessions = this.userSessions.get(username);
      const binding = sessions?.get(sessionId);
      if (!sessions || !binding) {
        return [];
      }

      sessions.delete(sessionId);
      this.detachFromTeam(username, sessions, binding);
      this.pruneUser(username, sessions);
      return [sessionId];
    });
  }

  /**
   * Drop every session of a user (app authorization revoked, promotion).
   */
  removeAllForUser(username: string): string[] {
    return this.lock.run(() => {
      const sessions = this.userSessions.get(username);
      if (!sessions) {
        return [];
      }

      const removed: string[] = [];
      for (const [sessionId, binding] of sessions) {
        removed.push(sessionId);
        if (binding.team !== undefined) {
          this.removeUserFromTeam(makeTeamName(binding.org, binding.team), username);
        }
      }
      this.userSessions.delete(username);
      return removed;
    });
  }

  /**
   * Drop the org-only sessions a user holds for `org`.
   *
   * Team-bound sessions in the same org are left alone; team events take
   * care of those.
   */
  removeForUserInOrg(username: string, org: string): string[] {
    return this.lock.run(() => {
      const sessions = this.userSessions.get(username);
      if (!sessions) {
        return [];
      }

      const removed: string[] = [];
      for (const [sessionId, binding] of sessions) {
        if (binding.org === org && binding.team === undefined) {
          removed.push(sessionId);
        }
      }
      for (const sessionId of removed) {
        sessions.delete(sessionId);
      }
      this.pruneUser(username, sessions);
      return removed;
    });
  }

  /**
   * Drop the sessions a user holds through exactly `org/team`.
   */
  removeForUserInOrgTeam(username: string, org: string, team: string): string[] {
    return this.lock.run(() => {
      const sessions = this.userSessions.get(username);
      if (!sessions) {
        return [];
      }

      const removed = this.takeTeamSessions(sessions, org, team);
      if (removed.length > 0) {
        this.removeUserFromTeam(makeTeamName(org, team), username);
      }
      this.pruneUser(username, sessions);
      return removed;
    });
  }

  /**
   * Drop every session bound to `org/team` (team deleted or renamed).
   *
   * Only the team's members are visited, not every indexed user.
   */
  removeForOrgTeam(org: string, team: string): string[] {
    return this.lock.run(() => {
      const teamName = makeTeamName(org, team);
      const users = this.teamUsers.get(teamName);
      if (!users) {
        return [];
      }

      const removed: string[] = [];
      for (const username of users) {
        const sessions = this.userSessions.get(username);
        if (!sessions) {
          continue;
        }
        removed.push(...this.takeTeamSessions(sessions, org, team));
        this.pruneUser(username, sessions);
      }
      this.teamUsers.delete(teamName);
      return removed;
    });
  }

  // ==========================================================================
  // Read-only queries
  // ==========================================================================

  sessionsOf(username: string): IndexedSession[] {
    return this.lock.run(() => {
      const sessions = this.userSessions.get(username);
      if (!sessions) {
        return [];
      }
      return [...sessions].map(([sessionId, binding]) => ({ sessionId, binding: { ...binding } }));
    });
  }

  usersOfTeam(org: string, team: string): string[] {
    return this.lock.run(() => [...(this.teamUsers.get(makeTeamName(org, team)) ?? [])]);
  }

  size(): { users: number; teams: number; sessions: number } {
    return this.lock.run(() => {
      let sessions = 0;
      for (const perUser of this.userSessions.values()) {
        sessions += perUser.size;
      }
      return { users: this.userSessions.size, teams: this.teamUsers.size, sessions };
    });
  }

  snapshot(): SessionIndexSnapshot {
    return this.lock.run(() => {
      // fromEntries defines own keys, so a login like "__proto__" stays an entry
      const users: SessionIndexSnapshot['users'] = Object.fromEntries(
        [...this.userSessions].map(([username, sessions]): [string, Record<string, TeamBinding>] => [
          username,
          Object.fromEntries(
            [...sessions].map(([sessionId, binding]): [string, TeamBinding] => [sessionId, { ...binding }])
          ),
        ])
      );
      const teams: SessionIndexSnapshot['teams'] = Object.fromEntries(
        [...this.teamUsers].map(([teamName, members]): [string, string[]] => [teamName, [...members].sort()])
      );

      return { users, teams };
    });
  }

  // ==========================================================================
  // Helpers (must be called with the lock held)
  // ==========================================================================

  /**
   * Delete and return the ids of the sessions bound to exactly org/team
   */
  private takeTeamSessions(
    sessions: Map<string, TeamBinding>,
    org: string,
    team: string
  ): string[] {
    const taken: string[] = [];
    for (const [sessionId, binding] of sessions) {
      if (binding.org === org && binding.team === team) {
        taken.push(sessionId);
      }
    }
    for (const sessionId of taken) {
      sessions.delete(sessionId);
    }
    return taken;
  }

  /**
   * Remove the user from the binding's team set unless another of the user's
   * remaining sessions is still bound to that team.
   */
  private detachFromTeam(
    username: string,
    remaining: Map<string, TeamBinding>,
    binding: TeamBinding
  ): void {
    if (binding.team === undefined) {
      return;
    }
    for (const other of remaining.values()) {
      if (sameBinding(other, binding)) {
        return;
      }
    }
    this.removeUserFromTeam(makeTeamName(binding.org, binding.team), username);
  }

  private removeUserFromTeam(teamName: string, username: string): void {
    const users = this.teamUsers.get(teamName);
    if (!users) {
      return;
    }
    users.delete(username);
    if (users.size === 0) {
      this.teamUsers.delete(teamName);
    }
  }

  private pruneUser(username: string, sessions: Map<string, TeamBinding>): void {
    if (sessions.size === 0) {
      console.debug(`[SessionIndex] dropped all the sessions of user ${username}`);
      this.userSessions.delete(username);
    }
  }
}
