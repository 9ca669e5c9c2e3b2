/**
 * Secret Resolver
 *
 * Replaces every `{"$secret": "NAME"}` descriptor in a parsed configuration
 * with the value returned by the first provider that knows NAME.
 *
 * ```typescript
 * const resolver = new SecretResolver();
 * resolver.addProvider(new FileSecretProvider('/run/secrets'));
 * resolver.addProvider(new EnvProvider());
 * const resolved = await resolver.resolveSecrets(JSON.parse(raw));
 * ```
 */

import type { AuditService } from '../../core/audit-service.js';
import { isSecretProvider } from './ISecretProvider.js';
import type { ISecretProvider } from './ISecretProvider.js';

export interface SecretResolverConfig {
  /** Records which provider answered each lookup (never the value) */
  auditService?: AuditService;

  /** Throw when a descriptor cannot be resolved (default: true) */
  failFast?: boolean;
}

const AUDIT_SOURCE = 'secret:resolution';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function secretName(value: unknown): string | undefined {
  if (!isRecord(value) || Object.keys(value).length !== 1) {
    return undefined;
  }
  const name = value.$secret;
  return typeof name === 'string' && name.length > 0 ? name : undefined;
}

export class SecretResolver {
  private providers: ISecretProvider[] = [];
  private readonly auditService?: AuditService;
  private readonly failFast: boolean;

  constructor(config?: SecretResolverConfig) {
    this.auditService = config?.auditService;
    this.failFast = config?.failFast ?? true;
  }

  /**
   * Append a provider; earlier providers win
   */
  addProvider(provider: ISecretProvider): void {
    if (!isSecretProvider(provider)) {
      throw new Error('[SecretResolver] provider must implement resolve(name)');
    }
    this.providers.push(provider);
  }

  getProviders(): ISecretProvider[] {
    return [...this.providers];
  }

  clearProviders(): void {
    this.providers = [];
  }

  /**
   * Return a copy of `config` with every secret descriptor resolved.
   * Unresolved descriptors are kept as-is when `failFast` is off.
   *
   * @throws Error naming the secret and its config path when `failFast` is on
   */
  async resolveSecrets(config: unknown): Promise<unknown> {
    return this.resolveNode(config, 'config');
  }

  private async resolveNode(node: unknown, at: string): Promise<unknown> {
    const name = secretName(node);
    if (name !== undefined) {
      const value = await this.resolveSecret(name, at);
      if (value !== undefined) {
        return value;
      }

      const message = `Secret "${name}" at "${at}" could not be resolved by any provider`;
      if (this.failFast) {
        throw new Error(`[SecretResolver] ${message}`);
      }
      console.warn(`[SecretResolver] ${message}`);
      return node;
    }

    if (Array.isArray(node)) {
      const items: unknown[] = [];
      for (const [i, item] of node.entries()) {
        items.push(await this.resolveNode(item, `${at}[${i}]`));
      }
      return items;
    }

    if (isRecord(node)) {
      const resolved: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(node)) {
        resolved[key] = await this.resolveNode(child, `${at}.${key}`);
      }
      return resolved;
    }

    return node;
  }

  private async resolveSecret(name: string, at: string): Promise<string | undefined> {
    for (const provider of this.providers) {
      let value: string | undefined;
      try {
        value = await provider.resolve(name);
      } catch (error) {
        console.warn(
          `[SecretResolver] ${provider.constructor.name} failed on "${name}": ${error instanceof Error ? error.message : String(error)}`
        );
        continue;
      }

      if (value !== undefined) {
        await this.audit(name, at, provider.constructor.name, true);
        return value;
      }
    }

    await this.audit(name, at, 'none', false);
    return undefined;
  }

  private async audit(name: string, at: string, provider: string, success: boolean): Promise<void> {
    if (!this.auditService) {
      return;
    }
    await this.auditService.log({
      timestamp: new Date(),
      source: AUDIT_SOURCE,
      userId: 'system',
      action: `resolve:${name}`,
      success,
      reason: success ? undefined : 'no provider could resolve this secret',
      metadata: { secretName: name, provider, configPath: at },
    });
  }
}
