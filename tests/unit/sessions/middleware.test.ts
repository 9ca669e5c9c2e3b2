/**
 * Session Middleware Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';
import { SessionCookieCodec } from '../../../src/sessions/cookie-codec.js';
import { InMemorySessionStore } from '../../../src/sessions/memory-store.js';
import { getSession, parseCookies, sessionMiddleware } from '../../../src/sessions/middleware.js';

describe('parseCookies', () => {
  it('should return nothing without a header', () => {
    expect(parseCookies(undefined)).toEqual({});
  });

  it('should split pairs and trim whitespace', () => {
    expect(parseCookies('a=1; b = 2 ;c=3')).toEqual({ a: '1', b: '2', c: '3' });
  });

  it('should keep the first occurrence of a name', () => {
    expect(parseCookies('githubauth=first; githubauth=second')).toEqual({ githubauth: 'first' });
  });

  it('should unquote and decode values', () => {
    expect(parseCookies('a="quoted"; b=x%20y; c=%E0%A4%A')).toEqual({ a: 'quoted', b: 'x y', c: '%E0%A4%A' });
  });

  it('should skip pairs without a name or an equals sign', () => {
    expect(parseCookies('flag; =orphan; a=1')).toEqual({ a: '1' });
  });
});

describe('sessionMiddleware', () => {
  let store: InMemorySessionStore;
  let app: express.Application;

  beforeEach(() => {
    store = new InMemorySessionStore();
    app = express();
    app.use(
      sessionMiddleware({
        store,
        codec: new SessionCookieCodec({
          authKey: 'test-session-auth-key',
          cryptKey: 'test-session-crypt-key',
          maxAgeSeconds: 3600,
        }),
        cookieName: 'githubauth',
        maxAgeSeconds: 3600,
        secureCookie: true,
      })
    );
    app.post('/count', async (_req, res) => {
      const session = getSession(res);
      const count = Number(session.get('count') ?? '0') + 1;
      session.set('count', String(count));
      await session.save();
      res.json({ count });
    });
    app.post('/drop', async (_req, res) => {
      const session = getSession(res);
      session.mark();
      await session.save();
      res.status(204).end();
    });
    app.get('/peek', (_req, res) => {
      res.json({ count: getSession(res).get('count') ?? null });
    });
  });

  it('should only set a cookie when the session is saved', async () => {
    const response = await request(app).get('/peek');

    expect(response.headers['set-cookie']).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it('should issue a hardened cookie on save', async () => {
    const response = await request(app).post('/count');

    const cookie: string = response.headers['set-cookie'][0];
    expect(cookie).toMatch(/^githubauth=/);
    expect(cookie).toContain('Path=/');
    expect(cookie).toContain('HttpOnly');
    expect(cookie).toContain('SameSite=Lax');
    expect(cookie).toContain('Secure');
    expect(cookie).toContain('Max-Age=3600');
  });

  it('should resume the session from the cookie', async () => {
    const first = await request(app).post('/count');
    const cookie: string = first.headers['set-cookie'][0].split(';')[0];

    const second = await request(app).post('/count').set('Cookie', cookie);

    expect(second.body).toEqual({ count: 2 });
  });

  it('should start over when the cookie cannot be decoded', async () => {
    const response = await request(app).post('/count').set('Cookie', 'githubauth=forged');

    expect(response.body).toEqual({ count: 1 });
  });

  it('should clear the cookie when a marked session is saved', async () => {
    const first = await request(app).post('/count');
    const cookie: string = first.headers['set-cookie'][0].split(';')[0];

    const response = await request(app).post('/drop').set('Cookie', cookie);

    expect(response.headers['set-cookie'][0]).toMatch(/^githubauth=;/);
    expect(store.size()).toBe(0);
  });

  it('should throw when read outside the middleware', () => {
    expect(() => getSession(express.response)).toThrow('[SessionMiddleware] no session attached to this request');
  });
});
