import { SessionNotFoundError } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';
import type { ChatSession } from './chat-session.js';

export interface SessionStoreOptions {
  /** Idle time after which a session is dropped. */
  idleTtlMs?: number;
  /** Live sessions kept at most; the least recently active idle one makes room. */
  maxSessions?: number;
}

export const DEFAULT_SESSION_IDLE_MS = 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

/** Live sessions by id. Nothing is persisted. Sessions mid-turn are never evicted. */
export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly idleTtlMs: number;
  private readonly maxSessions: number;

  constructor(options: SessionStoreOptions = {}) {
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_SESSION_IDLE_MS;
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;
  }

  add(session: ChatSession): ChatSession {
    this.prune();
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.leastRecentlyActive();
      if (!oldest) break;
      logDebug(`[Sessions] evicting ${oldest.id} to make room`);
      this.sessions.delete(oldest.id);
    }
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): ChatSession {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    if (this.isExpired(session, Date.now())) {
      this.sessions.delete(id);
      throw new SessionNotFoundError(id);
    }
    return session;
  }

  delete(id: string): void {
    if (!this.sessions.delete(id)) throw new SessionNotFoundError(id);
  }

  /** Drop every idle session past its TTL; returns how many were dropped. */
  prune(now: number = Date.now()): number {
    let dropped = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        dropped++;
      }
    }
    if (dropped > 0) logDebug(`[Sessions] dropped ${dropped} idle session(s)`);
    return dropped;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: ChatSession, now: number): boolean {
    return !session.isBusy && now - session.lastActiveAt > this.idleTtlMs;
  }

  private leastRecentlyActive(): ChatSession | undefined {
    let oldest: ChatSession | undefined;
    for (const session of this.sessions.values()) {
      if (session.isBusy) continue;
      if (!oldest || session.lastActiveAt < oldest.lastActiveAt) oldest = session;
    }
    return oldest;
  }
}
