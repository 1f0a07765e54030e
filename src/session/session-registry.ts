import { createSession } from './review-session';
import type { ReviewSession } from './review-session';
import { SessionNotFoundError } from '../errors';

export const DEFAULT_SESSION_IDLE_MS = 60 * 60 * 1000;

export interface SessionRegistryOptions {
  /** A session not looked up for this long is dropped, API key and record included. */
  idleTimeoutMs?: number;
}

/** In-memory sessions for one app instance. Nothing is persisted across restarts. */
export class SessionRegistry {
  private sessions: Map<string, ReviewSession> = new Map();
  private lastUsed: Map<string, number> = new Map();
  private readonly idleTimeoutMs: number;

  constructor(options: SessionRegistryOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_SESSION_IDLE_MS;
  }

  open(apiKey: string): ReviewSession {
    this.evictIdle();
    const session = createSession(apiKey);
    this.sessions.set(session.id, session);
    this.lastUsed.set(session.id, Date.now());
    return session;
  }

  get(sessionId: string): ReviewSession {
    this.evictIdle();
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    this.lastUsed.set(sessionId, Date.now());
    return session;
  }

  close(sessionId: string): boolean {
    this.lastUsed.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  size(): number {
    this.evictIdle();
    return this.sessions.size;
  }

  private evictIdle(): void {
    const cutoff = Date.now() - this.idleTimeoutMs;
    for (const [sessionId, usedAt] of this.lastUsed) {
      if (usedAt <= cutoff) {
        this.close(sessionId);
        console.log(`[Session] Expired idle session ${sessionId}`);
      }
    }
  }
}
