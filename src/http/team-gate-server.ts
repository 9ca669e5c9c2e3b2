/**
 * Team Gate Server
 *
 * One class that loads the configuration, builds the gate components and
 * runs the HTTP server. Secret lookups made while loading the configuration
 * are buffered and then written to the gate's audit trail.
 *
 * ```typescript
 * const server = new TeamGateServer('./config/team-gate.json');
 * await server.start({ protectedRoutes: myApp });
 * ```
 */

import type { RequestHandler } from 'express';
import type { Server } from 'http';
import { ConfigManager } from '../config/manager.js';
import type { ConfigManagerOptions } from '../config/manager.js';
import { AuditService, InMemoryAuditStorage } from '../core/audit-service.js';
import { buildGateContext } from './orchestrator.js';
import type { GateContext, GateContextOptions } from './orchestrator.js';
import { createGateServer, startHTTPServer } from './server.js';

export interface TeamGateStartOptions extends GateContextOptions {
  /** Overrides server.port from the configuration */
  port?: number;
  protectedRoutes?: RequestHandler;
}

export class TeamGateServer {
  private readonly configManager: ConfigManager;
  private readonly startupAudit = new InMemoryAuditStorage();
  private context?: GateContext;
  private httpServer?: Server;

  constructor(
    private readonly configPath?: string,
    configOptions?: Omit<ConfigManagerOptions, 'auditService'>
  ) {
    this.configManager = new ConfigManager({
      ...configOptions,
      auditService: new AuditService({ enabled: true, storage: this.startupAudit }),
    });
  }

  async start(options: TeamGateStartOptions = {}): Promise<Server> {
    if (this.httpServer) {
      throw new Error('[TeamGateServer] already running');
    }

    const config = await this.configManager.loadConfig(this.configPath);
    const context = buildGateContext(config, {
      ...options,
      onAuditOverflow:
        options.onAuditOverflow ??
        ((entries) => {
          console.warn(`[TeamGateServer] Audit overflow: oldest of ${entries.length} entries discarded`);
        }),
    });

    // Dropped here when auditing is disabled in the configuration
    for (const entry of this.startupAudit.drain()) {
      await context.auditService.log(entry);
    }

    const app = createGateServer({
      gate: context.gate,
      index: context.index,
      sessions: context.sessions,
      protectedRoutes: options.protectedRoutes,
    });

    this.httpServer = await startHTTPServer(app, options.port ?? config.server.port);
    this.context = context;
    return this.httpServer;
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      console.log('[TeamGateServer] Server is not running');
      return;
    }

    console.log('[TeamGateServer] Stopping server...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });

    this.httpServer = undefined;
    this.context = undefined;
    console.log('[TeamGateServer] Server stopped');
  }

  getContext(): GateContext {
    if (!this.context) {
      throw new Error('Gate context not initialized. Call start() first.');
    }
    return this.context;
  }

  isRunning(): boolean {
    return this.httpServer !== undefined;
  }
}
