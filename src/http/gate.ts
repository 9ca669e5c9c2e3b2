/**
 * Request Gate - Express Integration of the Login Flow
 *
 * `authenticate()` guards the protected application routes:
 * - session already authorized: GET/HEAD pass, other methods need `rw` (403)
 * - no Authorization header: start the browser OAuth flow (307 to GitHub)
 * - `Authorization: Bearer <token>`: run the login dance with that token
 *
 * Login endpoint handlers (mounted by the server):
 * - loginCallback()  GET  /login/cb       state check, code exchange, login dance
 * - webhook()        POST /login/webhook  GitHub webhook intake (raw body)
 * - logout()         POST /login/logout   drop the caller's session
 *
 * Every failed login cleans up the session: its index entry is removed and
 * the session is destroyed on save.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { LoginDance, LoginDanceResult } from '../core/login-dance.js';
import type { SessionIndex } from '../core/session-index.js';
import { READ_ONLY_METHODS, SESSION_KEYS, TIER_READ_ONLY, TIER_READ_WRITE } from '../core/types.js';
import type { GitHubOAuthFlow } from '../github/oauth-flow.js';
import { getSession } from '../sessions/middleware.js';
import type { Session } from '../sessions/types.js';
import { createErrorResponse, GateError, GateErrors } from '../utils/errors.js';
import { randomString } from '../utils/random.js';
import type { WebhookDispatcher } from '../webhooks/dispatcher.js';
import { EVENT_HEADER } from '../webhooks/events.js';
import { SIGNATURE_256_HEADER, SIGNATURE_HEADER } from '../webhooks/signature.js';

export const OAUTH_STATE_LENGTH = 64;

/**
 * Identity attached to `res.locals.auth` for authorized requests
 */
export interface GateAuth {
  teamId: string;
  username: string;
  accessLevel: 'ro' | 'rw';
}

export interface RequestGateOptions {
  oauth: GitHubOAuthFlow;
  loginDance: LoginDance;
  index: SessionIndex;
  dispatcher: WebhookDispatcher;
}

const authByResponse = new WeakMap<Response, GateAuth>();

/**
 * Identity of an authorized request, or undefined before `authenticate()`
 * let it through
 */
export function getAuth(res: Response): GateAuth | undefined {
  return authByResponse.get(res);
}

/**
 * Write a GateError as an HTTP response. Unverified webhook deliveries get
 * an empty body.
 */
export function sendGateError(res: Response, error: GateError): void {
  if (error.code === 'UNVERIFIED') {
    res.status(error.statusCode).end();
    return;
  }
  const { statusCode, body } = createErrorResponse(error);
  res.status(statusCode).json(body);
}

function singleHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export class RequestGate {
  constructor(private readonly options: RequestGateOptions) {}

  /**
   * Middleware guarding the protected routes
   */
  authenticate(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = getSession(res);

        if (session.has(SESSION_KEYS.teamId)) {
          this.authorizeSession(session, req, res, next);
          return;
        }

        const authHeader = req.headers.authorization;
        if (!authHeader) {
          await this.redirectToLogin(session, req, res);
          return;
        }

        const fields = authHeader.trim().split(/\s+/);
        if (fields.length !== 2 || fields[0].toLowerCase() !== 'bearer') {
          console.debug('[RequestGate] rejecting malformed Authorization header');
          await this.cleanup(session);
          sendGateError(res, GateErrors.UNAUTHORIZED('malformed Authorization header'));
          return;
        }

        const result = await this.options.loginDance.run(session, fields[1]);
        if (result.outcome !== 'ok') {
          await this.cleanup(session);
          sendGateError(res, this.failure(result));
          return;
        }

        this.authorizeSession(session, req, res, next);
      } catch (error) {
        next(error);
      }
    };
  }

  /**
   * OAuth callback: GitHub redirects the browser here with `state` and `code`
   */
  loginCallback(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = getSession(res);

        const desiredUrl = session.get(SESSION_KEYS.desiredUrl);
        const expectedState = session.get(SESSION_KEYS.state);
        if (desiredUrl === undefined || expectedState === undefined) {
          console.error('[RequestGate] login callback without a pending login in the session');
          await this.cleanup(session);
          sendGateError(res, GateErrors.INTERNAL_FAILURE('no pending login in session'));
          return;
        }

        const state = typeof req.query.state === 'string' ? req.query.state : '';
        if (state !== expectedState) {
          console.error('[RequestGate] login callback with an invalid OAuth state');
          await this.cleanup(session);
          sendGateError(res, GateErrors.UNAUTHORIZED('invalid OAuth state'));
          return;
        }

        const code = typeof req.query.code === 'string' ? req.query.code : '';
        let accessToken: string;
        try {
          accessToken = (await this.options.oauth.exchangeCode(code)).accessToken;
        } catch (error) {
          console.error(
            '[RequestGate] OAuth code exchange failed:',
            error instanceof Error ? error.message : String(error)
          );
          await this.cleanup(session);
          sendGateError(res, GateErrors.INTERNAL_FAILURE('OAuth code exchange failed'));
          return;
        }

        const result = await this.options.loginDance.run(session, accessToken);
        if (result.outcome !== 'ok') {
          await this.cleanup(session);
          sendGateError(res, this.failure(result));
          return;
        }

        // The state is single use
        session.delete(SESSION_KEYS.state);
        session.delete(SESSION_KEYS.desiredUrl);
        await session.save();

        res.redirect(307, desiredUrl);
      } catch (error) {
        next(error);
      }
    };
  }

  /**
   * Webhook intake; expects `req.body` to be the raw Buffer (express.raw)
   */
  webhook(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const rawBody: unknown = req.body;
        const outcome = await this.options.dispatcher.dispatch({
          eventType: singleHeader(req.headers[EVENT_HEADER]),
          signatures: {
            sha256: singleHeader(req.headers[SIGNATURE_256_HEADER]),
            sha1: singleHeader(req.headers[SIGNATURE_HEADER]),
          },
          rawBody: Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0),
        });

        if (outcome.status === 'dropped') {
          sendGateError(res, GateErrors.UNVERIFIED(outcome.reason));
          return;
        }
        if (outcome.status === 'ignored') {
          res.status(204).end();
          return;
        }
        res.status(200).json({ event: outcome.event.type, invalidatedSessions: outcome.sessionIds.length });
      } catch (error) {
        if (error instanceof GateError) {
          sendGateError(res, error);
          return;
        }
        next(error);
      }
    };
  }

  /**
   * Drop the caller's own session
   */
  logout(): RequestHandler {
    return async (_req: Request, res: Response, next: NextFunction) => {
      try {
        const session = getSession(res);
        const username = session.get(SESSION_KEYS.username);
        await this.cleanup(session);
        if (username) {
          console.log(`[RequestGate] ${username} logged out`);
        }
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    };
  }

  private authorizeSession(session: Session, req: Request, res: Response, next: NextFunction): void {
    const accessLevel = session.get(SESSION_KEYS.accessLevel) === TIER_READ_WRITE ? TIER_READ_WRITE : TIER_READ_ONLY;
    if (accessLevel !== TIER_READ_WRITE && !READ_ONLY_METHODS.includes(req.method)) {
      sendGateError(res, GateErrors.FORBIDDEN(req.method));
      return;
    }

    const auth: GateAuth = {
      teamId: session.get(SESSION_KEYS.teamId) ?? '',
      username: session.get(SESSION_KEYS.username) ?? '',
      accessLevel,
    };
    authByResponse.set(res, auth);
    res.locals.auth = auth;
    next();
  }

  private async redirectToLogin(session: Session, req: Request, res: Response): Promise<void> {
    const state = randomString(OAUTH_STATE_LENGTH);
    session.set(SESSION_KEYS.state, state);
    session.set(SESSION_KEYS.desiredUrl, req.originalUrl);
    await session.save();

    console.debug(`[RequestGate] redirecting ${req.originalUrl} to GitHub login`);
    res.redirect(307, this.options.oauth.buildAuthorizeUrl(state));
  }

  private failure(result: Exclude<LoginDanceResult, { outcome: 'ok' }>): GateError {
    return result.outcome === 'unauthorized'
      ? GateErrors.UNAUTHORIZED(result.reason)
      : GateErrors.INTERNAL_FAILURE(result.reason);
  }

  /**
   * Forget the session: drop its index entry and destroy it on save
   */
  private async cleanup(session: Session): Promise<void> {
    const username = session.get(SESSION_KEYS.username);
    if (username) {
      this.options.index.removeByUserAndSession(username, session.id);
    }
    session.mark();
    await session.save();
  }
}
