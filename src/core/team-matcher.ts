/**
 * Team Matcher - Access Tier Resolution from Provider Memberships
 *
 * Resolves the caller's access tier from their team and organization
 * memberships. Priority is read-write > read-only:
 * - the first read-write match ends the whole scan (no further page is read)
 * - the first read-only match is kept, later read-only matches are ignored
 * - organizations are only scanned when no team granted read-write
 *
 * CRITICAL: This module NEVER throws for membership data. Incomplete entries
 * are skipped. Errors raised by the page source (provider I/O) propagate to
 * the caller untouched.
 */

import { makeTeamName, TIER_NONE, TIER_READ_ONLY, TIER_READ_WRITE } from './types.js';
import type { ProviderOrg, ProviderTeam, TeamBinding, TeamMatchResult } from './types.js';

/**
 * Team rules, both lists in "org/team" form. A bare "org" entry grants the
 * tier through organization membership.
 */
export interface TeamMatcherConfig {
  readWriteTeams: string[];
  readOnlyTeams: string[];
}

/**
 * Running state of the fold: the best candidate seen so far
 */
interface MatchState {
  readOnly?: TeamBinding;
  readWrite?: TeamBinding;
}

export class TeamMatcher {
  private readonly readWrite: ReadonlySet<string>;
  private readonly readOnly: ReadonlySet<string>;

  constructor(config: TeamMatcherConfig) {
    this.readWrite = new Set(config.readWriteTeams);
    this.readOnly = new Set(config.readOnlyTeams);
  }

  /**
   * Whether "org/team" is configured as a read-write team
   */
  isReadWriteTeam(org: string, team: string): boolean {
    return this.readWrite.has(makeTeamName(org, team));
  }

  /**
   * Fold over paged memberships.
   *
   * @param teamPages - Pages of the caller's team memberships
   * @param orgPages - Factory for pages of organization memberships; only
   *                   invoked when the team scan found no read-write match
   */
  async match(
    teamPages: AsyncIterable<ProviderTeam[]>,
    orgPages: () => AsyncIterable<ProviderOrg[]>
  ): Promise<TeamMatchResult> {
    const state: MatchState = {};

    for await (const page of teamPages) {
      if (this.foldTeams(state, page)) {
        return this.result(state);
      }
    }

    console.debug('[TeamMatcher] no matching rw team found, trying orgs');

    for await (const page of orgPages()) {
      if (this.foldOrgs(state, page)) {
        return this.result(state);
      }
    }

    return this.result(state);
  }

  /**
   * Synchronous variant for memberships that are already in memory
   */
  matchMemberships(teams: ProviderTeam[], orgs: ProviderOrg[]): TeamMatchResult {
    const state: MatchState = {};
    if (!this.foldTeams(state, teams)) {
      this.foldOrgs(state, orgs);
    }
    return this.result(state);
  }

  /**
   * @returns true when a read-write match ends the scan
   */
  private foldTeams(state: MatchState, teams: ProviderTeam[]): boolean {
    for (const team of teams) {
      const name = team?.name;
      const org = team?.organization?.login;
      if (!name || !org) {
        console.debug('[TeamMatcher] skipping team without name or organization');
        continue;
      }

      const fullName = makeTeamName(org, name);
      if (this.offer(state, fullName, { org, team: name })) {
        return true;
      }
    }
    return false;
  }

  private foldOrgs(state: MatchState, orgs: ProviderOrg[]): boolean {
    for (const entry of orgs) {
      const org = entry?.login;
      if (!org) {
        console.debug('[TeamMatcher] skipping unnamed organization');
        continue;
      }

      if (this.offer(state, org, { org })) {
        return true;
      }
    }
    return false;
  }

  private offer(state: MatchState, ruleName: string, binding: TeamBinding): boolean {
    if (!state.readOnly && this.readOnly.has(ruleName)) {
      console.debug(`[TeamMatcher] found matching ro entry ${ruleName}`);
      state.readOnly = binding;
    }
    if (this.readWrite.has(ruleName)) {
      console.debug(`[TeamMatcher] found matching rw entry ${ruleName}`);
      state.readWrite = binding;
      return true;
    }
    return false;
  }

  private result(state: MatchState): TeamMatchResult {
    if (state.readWrite) {
      return { tier: TIER_READ_WRITE, binding: state.readWrite };
    }
    if (state.readOnly) {
      return { tier: TIER_READ_ONLY, binding: state.readOnly };
    }
    return { tier: TIER_NONE };
  }
}
