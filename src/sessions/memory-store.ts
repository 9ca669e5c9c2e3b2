/**
 * In-Memory Session Store
 *
 * Process-local SessionStore. Sessions expire `maxAgeSeconds` after their
 * last save; expired entries are swept whenever a session is created or
 * saved, so ids that are never loaded again do not accumulate. Invalidation by id deletes the stored copy immediately; if a
 * request currently holds the session, the id is also remembered so that the
 * request's own save cannot bring it back.
 */

import crypto from 'crypto';
import type { Session, SessionStore } from './types.js';

export interface InMemorySessionStoreOptions {
  /** Idle lifetime in seconds (default: 86400) */
  maxAgeSeconds?: number;
  /** Clock, injected for tests */
  now?: () => number;
}

interface StoredSession {
  values: Map<string, string>;
  expiresAt: number;
}

class MemorySession implements Session {
  private marked = false;
  private readonly listeners: Array<(session: Session) => Promise<void> | void> = [];

  constructor(
    readonly id: string,
    private readonly values: Map<string, string>,
    private readonly store: InMemorySessionStore
  ) {}

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  set(key: string, value: string): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  delete(key: string): void {
    this.values.delete(key);
  }

  mark(): void {
    this.marked = true;
  }

  isMarked(): boolean {
    return this.marked;
  }

  async save(): Promise<void> {
    if (!this.store.persist(this.id, this.values, this.marked)) {
      this.marked = true;
    }
    for (const listener of this.listeners) {
      await listener(this);
    }
  }

  onSave(listener: (session: Session) => Promise<void> | void): void {
    this.listeners.push(listener);
  }
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly holders = new Map<string, number>();
  private readonly destroyed = new Set<string>();
  private readonly maxAgeMs: number;
  private readonly now: () => number;

  constructor(options?: InMemorySessionStoreOptions) {
    this.maxAgeMs = (options?.maxAgeSeconds ?? 86400) * 1000;
    this.now = options?.now ?? Date.now;
  }

  async create(): Promise<Session> {
    this.sweepExpired();
    const id = crypto.randomBytes(32).toString('hex');
    this.hold(id);
    return new MemorySession(id, new Map(), this);
  }

  async load(id: string): Promise<Session | undefined> {
    const stored = this.sessions.get(id);
    if (!stored) {
      return undefined;
    }
    if (stored.expiresAt <= this.now()) {
      this.sessions.delete(id);
      return undefined;
    }

    this.hold(id);
    return new MemorySession(id, new Map(stored.values), this);
  }

  async markOrDestroySessionById(id: string): Promise<void> {
    this.sessions.delete(id);
    if ((this.holders.get(id) ?? 0) > 0) {
      this.destroyed.add(id);
    }
  }

  release(session: Session): void {
    const count = (this.holders.get(session.id) ?? 0) - 1;
    if (count > 0) {
      this.holders.set(session.id, count);
      return;
    }
    this.holders.delete(session.id);
    this.destroyed.delete(session.id);
  }

  /**
   * Number of live (persisted, unexpired) sessions
   */
  size(): number {
    const now = this.now();
    let live = 0;
    for (const stored of this.sessions.values()) {
      if (stored.expiresAt > now) {
        live++;
      }
    }
    return live;
  }

  has(id: string): boolean {
    const stored = this.sessions.get(id);
    return stored !== undefined && stored.expiresAt > this.now();
  }

  /**
   * @internal used by MemorySession.save
   * @returns false when the session was destroyed instead of persisted
   */
  persist(id: string, values: Map<string, string>, marked: boolean): boolean {
    if (marked || this.destroyed.has(id)) {
      this.sessions.delete(id);
      return false;
    }
    this.sweepExpired();
    // Re-inserting keeps the map ordered by expiry
    this.sessions.delete(id);
    this.sessions.set(id, { values: new Map(values), expiresAt: this.now() + this.maxAgeMs });
    return true;
  }

  /**
   * Number of stored entries, expired or not
   */
  retained(): number {
    return this.sessions.size;
  }

  /**
   * Drop expired entries from the front of the map, stopping at the first
   * live one.
   */
  private sweepExpired(): void {
    const now = this.now();
    for (const [id, stored] of this.sessions) {
      if (stored.expiresAt > now) {
        return;
      }
      this.sessions.delete(id);
    }
  }

  private hold(id: string): void {
    this.holders.set(id, (this.holders.get(id) ?? 0) + 1);
  }
}
