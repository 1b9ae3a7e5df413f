import type { SessionConfig } from '../../config/session.js';
import { copyContext } from '../context.js';
import { KeyedLock } from '../keyed_lock.js';
import { sessionKey, type Session, type SessionIdentity } from '../session.js';
import type { SessionStore } from '../session_store.js';

export interface InMemoryStoreOptions {
  /** Clock in epoch milliseconds. */
  readonly now?: () => number;
  /** Set false to skip the background sweep (tests call sweep() directly). */
  readonly sweep?: boolean;
}

export interface InMemorySessionStore extends SessionStore {
  /** Drops every session idle past the TTL; returns how many were removed. */
  sweep(): number;
}

function snapshot(session: Session): Session {
  return {
    identity: { ...session.identity },
    context: copyContext(session.context),
    createdAt: session.createdAt,
    lastActive: session.lastActive,
  };
}

export function createInMemoryStore(
  cfg: SessionConfig,
  options: InMemoryStoreOptions = {},
): InMemorySessionStore {
  const now = options.now ?? Date.now;
  const ttlMs = cfg.ttlSec * 1000;
  // Map order doubles as recency order: touched entries are re-inserted at the end.
  const sessions = new Map<string, Session>();
  const locks = new KeyedLock();

  function isExpired(session: Session, at: number): boolean {
    return at - session.lastActive > ttlMs;
  }

  function put(key: string, session: Session): void {
    sessions.delete(key);
    sessions.set(key, session);
  }

  function evictForInsert(): void {
    if (sessions.size < cfg.maxSessions) return;
    for (const [key] of sessions) {
      if (!locks.isLocked(key)) {
        sessions.delete(key);
        return;
      }
    }
  }

  function sweep(): number {
    const at = now();
    let removed = 0;
    for (const [key, session] of sessions) {
      if (isExpired(session, at) && !locks.isLocked(key)) {
        sessions.delete(key);
        removed++;
      }
    }
    return removed;
  }

  let timer: NodeJS.Timeout | undefined;
  if (options.sweep !== false) {
    timer = setInterval(sweep, cfg.sweepIntervalSec * 1000);
    timer.unref();
  }

  return {
    async getOrCreate(identity: SessionIdentity): Promise<Session> {
      const key = sessionKey(identity);
      const at = now();
      const existing = sessions.get(key);
      if (existing && !isExpired(existing, at)) {
        put(key, existing);
        return snapshot(existing);
      }

      if (existing) {
        sessions.delete(key);
      } else {
        evictForInsert();
      }
      const fresh: Session = {
        identity: { ...identity },
        context: {},
        createdAt: at,
        lastActive: at,
      };
      put(key, fresh);
      return snapshot(fresh);
    },

    async save(session: Session): Promise<void> {
      const key = sessionKey(session.identity);
      if (!sessions.has(key)) {
        evictForInsert();
      }
      put(key, snapshot(session));
    },

    withLock<T>(identity: SessionIdentity, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
      return locks.run(sessionKey(identity), fn, signal);
    },

    async delete(identity: SessionIdentity): Promise<void> {
      sessions.delete(sessionKey(identity));
    },

    async clear(): Promise<void> {
      sessions.clear();
    },

    size(): number {
      return sessions.size;
    },

    close(): void {
      if (timer) {
        clearInterval(timer);
        timer = undefined;
      }
    },

    sweep,
  };
}
