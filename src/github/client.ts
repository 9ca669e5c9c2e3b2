/**
 * GitHub REST Client
 *
 * Minimal, token-scoped client for the three endpoints the login dance needs:
 * - GET /user        (authenticated user)
 * - GET /user/teams  (teams of the authenticated user, paginated)
 * - GET /user/orgs   (organizations of the authenticated user, paginated)
 *
 * All three work with the `read:org` scope. Enterprise instances serve the
 * API under `<enterpriseUrl>/api/v3`.
 */

import { z } from 'zod';
import type { ProviderOrg, ProviderTeam } from '../core/types.js';
import { GitHubApiError } from './errors.js';
import { paginate } from './pagination.js';

export const GITHUB_API_URL = 'https://api.github.com';
export const DEFAULT_PER_PAGE = 50;

// ============================================================================
// Interfaces
// ============================================================================

export interface GitHubUser {
  login?: string | null;
}

/**
 * What the login dance needs from the provider
 */
export interface GitHubClient {
  getAuthenticatedUser(): Promise<GitHubUser>;
  listUserTeams(): AsyncIterable<ProviderTeam[]>;
  listUserOrgs(): AsyncIterable<ProviderOrg[]>;
}

/**
 * Builds a client bound to one access token.
 *
 * @throws Error if the client cannot be constructed (e.g. bad enterprise URL)
 */
export type GitHubClientFactory = (accessToken: string) => GitHubClient;

export interface FetchGitHubClientOptions {
  /** API root, e.g. https://api.github.com or https://ghe.example.com/api/v3 */
  baseUrl: string;
  accessToken: string;
  perPage?: number;
  userAgent?: string;
  /** Injected for tests (defaults to global fetch) */
  fetch?: typeof fetch;
}

// ============================================================================
// Response normalization
// ============================================================================

// Lenient on purpose: a malformed element becomes an empty entry that the
// team matcher skips, instead of failing the whole page.
const nullableString = z.string().nullish().catch(null);

const TeamEntrySchema = z
  .object({
    name: nullableString,
    organization: z.object({ login: nullableString }).nullish().catch(null),
  })
  .catch({});

const OrgEntrySchema = z.object({ login: nullableString }).catch({});

const UserSchema = z.object({ login: nullableString });

// ============================================================================
// Fetch-based implementation
// ============================================================================

export class FetchGitHubClient implements GitHubClient {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly perPage: number;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchGitHubClientOptions) {
    // Validates the URL; throws TypeError on garbage
    this.baseUrl = new URL(options.baseUrl).toString().replace(/\/+$/, '');
    this.accessToken = options.accessToken;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.userAgent = options.userAgent ?? 'team-gate';
    this.fetchImpl = options.fetch ?? fetch;
  }

  async getAuthenticatedUser(): Promise<GitHubUser> {
    const url = `${this.baseUrl}/user`;
    const response = await this.get(url);
    if (!response.ok) {
      throw new GitHubApiError(`GET ${url} failed: ${response.status} ${response.statusText}`, response.status, url);
    }

    const parsed = UserSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GitHubApiError(`GET ${url} returned an unexpected body`, response.status, url);
    }
    return parsed.data;
  }

  listUserTeams(): AsyncIterable<ProviderTeam[]> {
    return paginate(this.listUrl('/user/teams'), (url) => this.get(url), (raw) => TeamEntrySchema.parse(raw));
  }

  listUserOrgs(): AsyncIterable<ProviderOrg[]> {
    return paginate(this.listUrl('/user/orgs'), (url) => this.get(url), (raw) => OrgEntrySchema.parse(raw));
  }

  private listUrl(path: string): string {
    return `${this.baseUrl}${path}?per_page=${this.perPage}&page=1`;
  }

  private async get(url: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${this.accessToken}`,
          'User-Agent': this.userAgent,
        },
      });
    } catch (error) {
      throw new GitHubApiError(
        `GET ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        url
      );
    }
  }
}

/**
 * API root for public GitHub or an enterprise instance
 */
export function apiBaseUrl(enterpriseUrl: string): string {
  return enterpriseUrl ? `${enterpriseUrl}/api/v3` : GITHUB_API_URL;
}

/**
 * Factory producing fetch-based clients for the configured instance
 */
export function createGitHubClientFactory(
  enterpriseUrl: string,
  options?: Omit<FetchGitHubClientOptions, 'baseUrl' | 'accessToken'>
): GitHubClientFactory {
  const baseUrl = apiBaseUrl(enterpriseUrl);
  return (accessToken) => new FetchGitHubClient({ ...options, baseUrl, accessToken });
}
