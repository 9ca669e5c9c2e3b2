/**
 * Audit Service - Security Event Trail with Null Object Pattern
 *
 * Write-only audit log for login outcomes, session invalidations and secret
 * resolution. Disabled by default: a service built without configuration
 * accepts entries and drops them, so callers never need to null-check.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Called with every stored entry before the oldest one is discarded */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage backend for audit entries.
 *
 * Deliberately write-only; querying belongs to whatever indexed store the
 * entries are shipped to.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage
// ============================================================================

export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = 10000,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /**
   * Remove and return every stored entry
   */
  drain(): AuditEntry[] {
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  /**
   * @internal for tests
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * @internal for tests
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service
// ============================================================================

export class AuditService {
  private readonly enabled: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
  }

  /**
   * Record an entry. No-op when the service is disabled.
   *
   * @throws Error if the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('[AuditService] audit entry is missing its source field');
    }

    await this.storage.log(entry);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @internal for tests
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}
