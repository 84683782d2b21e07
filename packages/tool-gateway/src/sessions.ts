// packages/tool-gateway/src/sessions.ts
import { randomUUID } from "crypto";

export interface Session {
  id: string;
  createdAt: number;
  lastSeenAt: number;
}

export interface SessionStoreOptions {
  /** Idle lifetime. Default 30 minutes. */
  ttlMs?: number;
  now?: () => number;
}

/**
 * In-memory sessions with an idle TTL. Expired sessions are dropped on
 * lookup and by sweep(); there is no explicit close.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: SessionStoreOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 30 * 60 * 1000;
    this.now = opts.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): Session {
    const t = this.now();
    const session: Session = { id: randomUUID(), createdAt: t, lastSeenAt: t };
    this.sessions.set(session.id, session);
    return session;
  }

  /** Live session for `id`, refreshed; undefined if unknown or expired. */
  touch(id: string | undefined): Session | undefined {
    if (!id) return undefined;
    const session = this.sessions.get(id);
    if (!session) return undefined;

    const t = this.now();
    if (t - session.lastSeenAt > this.ttlMs) {
      this.sessions.delete(id);
      return undefined;
    }
    session.lastSeenAt = t;
    return session;
  }

  sweep(): number {
    const t = this.now();
    let removed = 0;
    for (const [id, s] of this.sessions) {
      if (t - s.lastSeenAt > this.ttlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
