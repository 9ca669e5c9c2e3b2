/**
 * GitHub OAuth Web Application Flow
 *
 * Flow:
 * 1. Gate stores a random state in the session and redirects to
 *    /login/oauth/authorize
 * 2. User authorizes the app on GitHub
 * 3. GitHub redirects to /login/cb with `code` and `state`
 * 4. Gate checks the state against the session, then exchanges the code for
 *    an access token at /login/oauth/access_token
 *
 * CSRF state handling lives in the gate because the state is kept in the
 * caller's session; this class only speaks to GitHub.
 */

import { z } from 'zod';
import { GitHubApiError } from './errors.js';

export const GITHUB_WEB_URL = 'https://github.com';

/**
 * `read:org` covers listing the user's teams and organizations; the login
 * name is public and needs no scope.
 */
export const DEFAULT_OAUTH_SCOPES = ['read:org'];

const TokenResponseSchema = z.object({
  access_token: z.string().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export interface GitHubOAuthConfig {
  clientId: string;
  clientSecret: string;
  authorizeEndpoint: string;
  tokenEndpoint: string;
  scopes: string[];
  /** Optional; GitHub falls back to the app's registered callback URL */
  callbackUrl?: string;
  /** Injected for tests (defaults to global fetch) */
  fetch?: typeof fetch;
}

export interface OAuthTokenResult {
  accessToken: string;
  tokenType: string;
  scope?: string;
}

/**
 * Authorization and token endpoints for public GitHub or an enterprise
 * instance
 */
export function oauthEndpoints(enterpriseUrl: string): {
  authorizeEndpoint: string;
  tokenEndpoint: string;
} {
  const root = enterpriseUrl || GITHUB_WEB_URL;
  return {
    authorizeEndpoint: `${root}/login/oauth/authorize`,
    tokenEndpoint: `${root}/login/oauth/access_token`,
  };
}

export class GitHubOAuthFlow {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: GitHubOAuthConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  /**
   * URL the browser is redirected to when a login is needed
   */
  buildAuthorizeUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      response_type: 'code',
      scope: this.config.scopes.join(' '),
      state,
      access_type: 'online',
    });
    if (this.config.callbackUrl) {
      params.set('redirect_uri', this.config.callbackUrl);
    }

    return `${this.config.authorizeEndpoint}?${params.toString()}`;
  }

  /**
   * Exchange an authorization code for an access token
   *
   * @throws GitHubApiError if GitHub rejects the code or returns no token
   */
  async exchangeCode(code: string): Promise<OAuthTokenResult> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      code,
    });
    if (this.config.callbackUrl) {
      body.set('redirect_uri', this.config.callbackUrl);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.config.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: body.toString(),
      });
    } catch (error) {
      throw new GitHubApiError(
        `Token exchange failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        this.config.tokenEndpoint
      );
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new GitHubApiError(
        `Token exchange failed: ${response.status} ${response.statusText} - ${errorText}`,
        response.status,
        this.config.tokenEndpoint
      );
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GitHubApiError('Token exchange returned an unexpected body', response.status, this.config.tokenEndpoint);
    }
    const data = parsed.data;

    // GitHub reports bad codes with 200 and an `error` field
    if (data.error) {
      throw new GitHubApiError(
        `Token exchange rejected: ${data.error}${data.error_description ? ` - ${data.error_description}` : ''}`,
        response.status,
        this.config.tokenEndpoint
      );
    }

    if (!data.access_token) {
      throw new GitHubApiError('Token exchange returned no access token', response.status, this.config.tokenEndpoint);
    }

    return {
      accessToken: data.access_token,
      tokenType: data.token_type ?? 'bearer',
      scope: data.scope,
    };
  }
}
