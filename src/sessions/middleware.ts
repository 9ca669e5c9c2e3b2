/**
 * Express session middleware
 *
 * Resolves the request's session from the cookie (or starts a new one) and
 * keeps the cookie in step with the store: every save re-issues the cookie,
 * and saving a marked session clears it.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { SessionCookieCodec } from './cookie-codec.js';
import type { Session, SessionStore } from './types.js';

export interface SessionMiddlewareOptions {
  store: SessionStore;
  codec: SessionCookieCodec;
  cookieName: string;
  maxAgeSeconds: number;
  /** Send the cookie with the Secure attribute (default: false) */
  secureCookie?: boolean;
}

const sessions = new WeakMap<Response, Session>();

/**
 * Session attached to the response by the middleware
 *
 * @throws Error if the session middleware did not run for this request
 */
export function getSession(res: Response): Session {
  const session = sessions.get(res);
  if (!session) {
    throw new Error('[SessionMiddleware] no session attached to this request');
  }
  return session;
}

/**
 * Parse a Cookie header into name/value pairs. The first occurrence of a
 * name wins.
 */
export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) {
    return cookies;
  }

  for (const pair of header.split(';')) {
    const eq = pair.indexOf('=');
    if (eq < 0) {
      continue;
    }
    const name = pair.slice(0, eq).trim();
    let value = pair.slice(eq + 1).trim();
    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
      value = value.slice(1, -1);
    }
    if (name && !(name in cookies)) {
      try {
        cookies[name] = decodeURIComponent(value);
      } catch {
        cookies[name] = value;
      }
    }
  }
  return cookies;
}

export function sessionMiddleware(options: SessionMiddlewareOptions): RequestHandler {
  const { store, codec, cookieName, maxAgeSeconds } = options;

  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      let session: Session | undefined;
      const cookie = parseCookies(req.headers.cookie)[cookieName];
      if (cookie) {
        const sessionId = await codec.decode(cookie);
        if (sessionId) {
          session = await store.load(sessionId);
        }
      }
      if (!session) {
        session = await store.create();
      }

      const current = session;
      current.onSave(async (saved) => {
        if (saved.isMarked()) {
          res.clearCookie(cookieName, { path: '/' });
          return;
        }
        res.cookie(cookieName, await codec.encode(saved.id), {
          path: '/',
          httpOnly: true,
          sameSite: 'lax',
          secure: options.secureCookie ?? false,
          maxAge: maxAgeSeconds * 1000,
        });
      });

      let released = false;
      const release = () => {
        if (!released) {
          released = true;
          store.release(current);
        }
      };
      res.on('finish', release);
      res.on('close', release);

      sessions.set(res, current);
      next();
    } catch (error) {
      next(error);
    }
  };
}
