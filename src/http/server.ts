/**
 * HTTP Server for the Team Gate
 *
 * Routes:
 * - GET  /health          liveness, no session
 * - POST /login/webhook   GitHub webhooks (raw body, no session)
 * - GET  /login/cb        OAuth callback
 * - POST /login/logout    drop the caller's session
 * - GET  /whoami          identity and tier of the caller (gated)
 * - everything under `protectedRoutes`, behind the gate
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createServer } from 'http';
import type { Server } from 'http';
import type { SessionIndex } from '../core/session-index.js';
import { sessionMiddleware } from '../sessions/middleware.js';
import type { SessionMiddlewareOptions } from '../sessions/middleware.js';
import { GateError, GateErrors, sanitizeError } from '../utils/errors.js';
import { getAuth, sendGateError } from './gate.js';
import type { RequestGate } from './gate.js';

export interface GateServerOptions {
  gate: RequestGate;
  index: SessionIndex;
  sessions: SessionMiddlewareOptions;
  /** Application mounted behind `gate.authenticate()` */
  protectedRoutes?: RequestHandler;
  /** Limit for webhook bodies (default: '1mb') */
  webhookBodyLimit?: string;
}

export function createGateServer(options: GateServerOptions): express.Application {
  const { gate, index } = options;
  const app = express();

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'team-gate',
      index: index.size(),
      timestamp: new Date().toISOString(),
    });
  });

  // Signatures are computed over the exact bytes GitHub sent
  app.post(
    '/login/webhook',
    express.raw({ type: () => true, limit: options.webhookBodyLimit ?? '1mb' }),
    gate.webhook()
  );

  app.use(sessionMiddleware(options.sessions));

  app.get('/login/cb', gate.loginCallback());
  app.post('/login/logout', gate.logout());

  app.get('/whoami', gate.authenticate(), (_req: Request, res: Response) => {
    res.json(getAuth(res));
  });

  if (options.protectedRoutes) {
    app.use(gate.authenticate(), options.protectedRoutes);
  }

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof GateError) {
      sendGateError(res, err);
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      const reason = err instanceof Error ? err.message : 'rejected';
      console.warn(`[HTTP Server] Rejected request (${clientStatus}): ${reason}`);
      sendGateError(res, GateErrors.BAD_REQUEST(clientStatus, reason));
      return;
    }

    console.error('[HTTP Server] Error:', sanitizeError(err));
    sendGateError(res, GateErrors.INTERNAL_FAILURE('unexpected error'));
  });

  return app;
}

/**
 * 4xx status carried by errors from express and its body parsers
 * (e.g. 413 for a body over the limit)
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Start listening on `port`
 */
export function startHTTPServer(app: express.Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use`));
      } else {
        reject(err);
      }
    });

    server.listen(port, () => {
      console.log(`[HTTP Server] Listening on port ${port}`);
      console.log(`[HTTP Server] OAuth callback: http://localhost:${port}/login/cb`);
      console.log(`[HTTP Server] Webhook endpoint: http://localhost:${port}/login/webhook`);
      resolve(server);
    });
  });
}
