/**
 * GitHub OAuth Flow Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { DEFAULT_OAUTH_SCOPES, GitHubOAuthFlow, oauthEndpoints } from '../../../src/github/oauth-flow.js';

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
}

describe('oauthEndpoints', () => {
  it('should point at github.com by default', () => {
    expect(oauthEndpoints('')).toEqual({
      authorizeEndpoint: 'https://github.com/login/oauth/authorize',
      tokenEndpoint: 'https://github.com/login/oauth/access_token',
    });
  });

  it('should point at an enterprise instance', () => {
    expect(oauthEndpoints('https://ghe.example.com').tokenEndpoint).toBe(
      'https://ghe.example.com/login/oauth/access_token'
    );
  });
});

describe('GitHubOAuthFlow', () => {
  let fetchMock: Mock<typeof fetch>;
  let flow: GitHubOAuthFlow;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    flow = new GitHubOAuthFlow({
      clientId: 'test-client-id',
      clientSecret: 'test-client-secret',
      ...oauthEndpoints(''),
      scopes: DEFAULT_OAUTH_SCOPES,
      fetch: fetchMock,
    });
  });

  describe('buildAuthorizeUrl', () => {
    it('should carry the client id, scopes and state', () => {
      expect(flow.buildAuthorizeUrl('test-state')).toBe(
        'https://github.com/login/oauth/authorize?client_id=test-client-id&response_type=code&scope=read%3Aorg&state=test-state&access_type=online'
      );
    });

    it('should add the callback URL when configured', () => {
      const withCallback = new GitHubOAuthFlow({
        clientId: 'test-client-id',
        clientSecret: 'test-client-secret',
        ...oauthEndpoints(''),
        scopes: ['read:org', 'read:user'],
        callbackUrl: 'https://gate.example.com/login/cb',
      });

      const url = new URL(withCallback.buildAuthorizeUrl('test-state'));

      expect(url.searchParams.get('redirect_uri')).toBe('https://gate.example.com/login/cb');
      expect(url.searchParams.get('scope')).toBe('read:org read:user');
    });
  });

  describe('exchangeCode', () => {
    it('should post the code and return the access token', async () => {
      fetchMock.mockResolvedValue(json({ access_token: 'test-token', token_type: 'bearer', scope: 'read:org' }));

      const result = await flow.exchangeCode('test-code');

      expect(result).toEqual({ accessToken: 'test-token', tokenType: 'bearer', scope: 'read:org' });
      expect(fetchMock).toHaveBeenCalledWith('https://github.com/login/oauth/access_token', {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: 'client_id=test-client-id&client_secret=test-client-secret&code=test-code',
      });
    });

    it('should default the token type', async () => {
      fetchMock.mockResolvedValue(json({ access_token: 'test-token' }));

      expect((await flow.exchangeCode('test-code')).tokenType).toBe('bearer');
    });

    it('should surface a rejected code', async () => {
      fetchMock.mockResolvedValue(
        json({ error: 'bad_verification_code', error_description: 'The code passed is incorrect or expired.' })
      );

      await expect(flow.exchangeCode('stale')).rejects.toThrow(
        'Token exchange rejected: bad_verification_code - The code passed is incorrect or expired.'
      );
    });

    it('should fail on an error status', async () => {
      fetchMock.mockResolvedValue(new Response('oops', { status: 500, statusText: 'Internal Server Error' }));

      await expect(flow.exchangeCode('test-code')).rejects.toThrow(
        'Token exchange failed: 500 Internal Server Error - oops'
      );
    });

    it('should fail without an access token', async () => {
      fetchMock.mockResolvedValue(json({ token_type: 'bearer' }));

      await expect(flow.exchangeCode('test-code')).rejects.toThrow('Token exchange returned no access token');
    });

    it('should fail on a body that is not an object', async () => {
      fetchMock.mockResolvedValue(json(['test-token']));

      await expect(flow.exchangeCode('test-code')).rejects.toThrow('Token exchange returned an unexpected body');
    });

    it('should wrap transport errors', async () => {
      fetchMock.mockRejectedValue(new Error('ECONNREFUSED'));

      await expect(flow.exchangeCode('test-code')).rejects.toMatchObject({
        name: 'GitHubApiError',
        message: 'Token exchange failed: ECONNREFUSED',
        url: 'https://github.com/login/oauth/access_token',
      });
    });
  });
});
