/**
 * Session contracts
 *
 * The gate treats sessions as an external collaborator: a string key/value
 * bag with a stable id, persisted by a store addressed by that id. Any store
 * honouring these interfaces (in-memory, memcached, redis...) can be plugged
 * into the gate.
 */

/**
 * A session bag as seen by one request
 */
export interface Session {
  /** Stable, opaque id */
  readonly id: string;

  get(key: string): string | undefined;
  set(key: string, value: string): void;
  has(key: string): boolean;
  delete(key: string): void;

  /**
   * Mark the session for destruction; the next save destroys it instead of
   * persisting it.
   */
  mark(): void;
  isMarked(): boolean;

  /**
   * Persist (or destroy, when marked) the session
   */
  save(): Promise<void>;

  /**
   * Register a callback run after every successful save
   */
  onSave(listener: (session: Session) => Promise<void> | void): void;
}

export interface SessionStore {
  /** Start a new, not yet persisted session */
  create(): Promise<Session>;

  /** Load a persisted session, or undefined when unknown or expired */
  load(id: string): Promise<Session | undefined>;

  /**
   * Invalidate a session by id, independently of any request. A session that
   * an in-flight request holds is destroyed when that request saves it.
   */
  markOrDestroySessionById(id: string): Promise<void>;

  /** Called once the request that loaded or created `session` is done */
  release(session: Session): void;
}
