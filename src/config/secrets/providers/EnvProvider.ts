/**
 * Environment Variable Secret Provider
 *
 * Reads `process.env[NAME]`. Meant as the fallback behind FileSecretProvider,
 * for development and for platforms that only inject environment variables.
 */

import type { ISecretProvider } from '../ISecretProvider.js';

export class EnvProvider implements ISecretProvider {
  /**
   * @param env - Variables to read from (default: process.env)
   */
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async resolve(logicalName: string): Promise<string | undefined> {
    const value = this.env[logicalName]?.trim();
    return value ? value : undefined;
  }
}
