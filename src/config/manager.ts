import { readFile } from 'fs/promises';
import type { AuditService } from '../core/audit-service.js';
import { TeamGateConfigSchema } from './schema.js';
import type { AuditConfig, GitHubConfig, ServerConfig, SessionConfig, TeamGateConfig } from './schema.js';
import { EnvProvider, FileSecretProvider, SecretResolver } from './secrets/index.js';

export const DEFAULT_CONFIG_PATH = './config/team-gate.json';

export interface ConfigManagerOptions {
  /** Records secret lookups */
  auditService?: AuditService;
  /** Directory for file-based secrets (default: SECRETS_PATH or '/run/secrets') */
  secretsDir?: string;
  /** Environment used for CONFIG_PATH, SERVER_PORT and env secrets (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private config: TeamGateConfig | null = null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly secretResolver: SecretResolver;

  constructor(options?: ConfigManagerOptions) {
    this.env = options?.env ?? process.env;

    this.secretResolver = new SecretResolver({
      auditService: options?.auditService,
      failFast: true,
    });
    // Mounted secret files win over environment variables
    this.secretResolver.addProvider(
      new FileSecretProvider(options?.secretsDir ?? this.env.SECRETS_PATH ?? '/run/secrets')
    );
    this.secretResolver.addProvider(new EnvProvider(this.env));
  }

  /**
   * Read, resolve and validate the configuration file. The result is cached;
   * use reloadConfig() to read it again.
   *
   * Lookup order for the path: argument, CONFIG_PATH, ./config/team-gate.json
   */
  async loadConfig(configPath?: string): Promise<TeamGateConfig> {
    if (this.config) {
      return this.config;
    }

    const path = configPath || this.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;

    try {
      const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));

      // {"$secret": "NAME"} descriptors are replaced before validation
      const resolved = await this.secretResolver.resolveSecrets(raw);
      const config = TeamGateConfigSchema.parse(resolved);

      const port = this.env.SERVER_PORT ? parseInt(this.env.SERVER_PORT, 10) : NaN;
      if (Number.isInteger(port) && port > 0) {
        config.server.port = port;
      }

      this.checkProductionSettings(config);
      this.config = config;

      console.log(`[ConfigManager] Configuration loaded from ${path}`);
      return config;
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to load configuration: ${error.message}`);
      }
      throw error;
    }
  }

  async reloadConfig(configPath?: string): Promise<TeamGateConfig> {
    this.config = null;
    console.log('[ConfigManager] Reloading configuration...');
    return this.loadConfig(configPath);
  }

  getConfig(): TeamGateConfig {
    if (!this.config) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getGitHubConfig(): GitHubConfig {
    return this.getConfig().github;
  }

  getSessionConfig(): SessionConfig {
    return this.getConfig().sessions;
  }

  getServerConfig(): ServerConfig {
    return this.getConfig().server;
  }

  getAuditConfig(): AuditConfig {
    return this.getConfig().audit;
  }

  getSecretResolver(): SecretResolver {
    return this.secretResolver;
  }

  isSecureEnvironment(): boolean {
    return this.env.NODE_ENV === 'production';
  }

  private checkProductionSettings(config: TeamGateConfig): void {
    if (!this.isSecureEnvironment()) {
      return;
    }
    if (!config.sessions.secureCookie) {
      console.warn('[ConfigManager] sessions.secureCookie is off in production');
    }
    if (config.github.callbackUrl?.startsWith('http://')) {
      console.warn('[ConfigManager] github.callbackUrl is not HTTPS in production');
    }
    if (config.sessions.authKey === config.sessions.cryptKey) {
      throw new Error('sessions.authKey and sessions.cryptKey must differ');
    }
  }
}
