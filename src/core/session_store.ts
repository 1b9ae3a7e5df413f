import type { Session, SessionIdentity } from './session.js';

export { sessionKey, type Session, type SessionIdentity } from './session.js';

export interface SessionStore {
  /** Returns a copy of the stored session, or a new empty one. Never fails for unknown identities. */
  getOrCreate(identity: SessionIdentity): Promise<Session>;
  save(session: Session): Promise<void>;
  /** Serializes work per identity; different identities run concurrently. */
  withLock<T>(identity: SessionIdentity, fn: () => Promise<T>, signal?: AbortSignal): Promise<T>;
  delete(identity: SessionIdentity): Promise<void>;
  clear(): Promise<void>;
  size(): number;
  close(): void;
}
