/**
 * File-Based Secret Provider
 *
 * Reads `<secretDir>/<NAME>`, the layout of Docker and Kubernetes secret
 * mounts. Names that would leave `secretDir` resolve to undefined.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ISecretProvider } from '../ISecretProvider.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FileSecretProvider implements ISecretProvider {
  private readonly secretDir: string;

  constructor(secretDir: string = '/run/secrets') {
    this.secretDir = path.resolve(secretDir);
  }

  async resolve(logicalName: string): Promise<string | undefined> {
    const filePath = path.resolve(this.secretDir, logicalName);
    if (path.dirname(filePath) !== this.secretDir) {
      console.warn(`[FileSecretProvider] refusing secret name outside ${this.secretDir}: ${logicalName}`);
      return undefined;
    }

    try {
      // Mounted secrets usually end with a newline
      return (await fs.readFile(filePath, 'utf-8')).trim();
    } catch (error) {
      if (NOT_FOUND_CODES.has(errorCode(error) ?? '')) {
        return undefined;
      }
      throw error;
    }
  }

  getSecretDir(): string {
    return this.secretDir;
  }
}
