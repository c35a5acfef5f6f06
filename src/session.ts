// In-memory sessions keyed by an opaque cookie. Only the legacy chat widget
// handshake uses them; nothing survives a restart.

import { randomUUID } from "crypto";
import { parseCookies } from "./http";
import { log } from "./logger";

export const SESSION_COOKIE = "sid";

const DEFAULT_MAX_SESSIONS = 10000;
const DEFAULT_IDLE_TIMEOUT_MS = 2 * 60 * 60 * 1000; // 2 hours

export interface Session {
  id: string;
  isNew: boolean;
  data: Map<string, string>;
}

export interface SessionStoreConfig {
  /** Upper bound on live sessions; the least recently used are evicted past it. */
  maxSessions?: number;
  idleTimeoutMs?: number;
}

interface StoredSession {
  data: Map<string, string>;
  lastUsedAt: number;
}

export class SessionStore {
  // Map order doubles as recency order: a touched session is re-inserted last.
  private sessions: Map<string, StoredSession> = new Map();
  private readonly maxSessions: number;
  private readonly idleTimeoutMs: number;

  constructor(config: SessionStoreConfig = {}) {
    this.maxSessions = config.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.idleTimeoutMs = config.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
  }

  /** Find the session named by the request's cookie, or open a new one. */
  resolve(cookieHeader: string | undefined): Session {
    const now = Date.now();
    this.evictIdle(now);

    const id = parseCookies(cookieHeader).get(SESSION_COOKIE);
    if (id) {
      const stored = this.sessions.get(id);
      if (stored) {
        this.sessions.delete(id);
        stored.lastUsedAt = now;
        this.sessions.set(id, stored);
        return { id, isNew: false, data: stored.data };
      }
    }

    const fresh = randomUUID();
    const data = new Map<string, string>();
    this.sessions.set(fresh, { data, lastUsedAt: now });
    this.evictOverflow();
    return { id: fresh, isNew: true, data };
  }

  size(): number {
    return this.sessions.size;
  }

  cookieFor(session: Session): string {
    return `${SESSION_COOKIE}=${session.id}; Path=/; HttpOnly; SameSite=Lax`;
  }

  private evictIdle(now: number): void {
    let evicted = 0;
    for (const [id, stored] of this.sessions) {
      // Oldest first, so the scan stops at the first session still in use.
      if (now - stored.lastUsedAt <= this.idleTimeoutMs) break;
      this.sessions.delete(id);
      evicted++;
    }
    if (evicted > 0) {
      log("debug", "Idle sessions evicted", { evicted, remaining: this.sessions.size });
    }
  }

  private evictOverflow(): void {
    for (const id of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) return;
      this.sessions.delete(id);
    }
  }
}
