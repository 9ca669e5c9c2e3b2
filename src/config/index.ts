/**
 * Configuration Module - Public API
 */

export { ConfigManager, DEFAULT_CONFIG_PATH } from './manager.js';
export type { ConfigManagerOptions } from './manager.js';

export {
  TeamGateConfigSchema,
  GitHubConfigSchema,
  SessionConfigSchema,
  ServerConfigSchema,
  AuditConfigSchema,
} from './schema.js';
export type {
  TeamGateConfig,
  GitHubConfig,
  SessionConfig,
  ServerConfig,
  AuditConfig,
} from './schema.js';

export * from './secrets/index.js';
