import { randomBytes } from 'crypto';

/**
 * Server-side record for one browser, keyed by the token in its signed cookie
 */
export interface WebSession {
  token: string;
  authenticated: boolean;
  /** Epoch milliseconds of the last request */
  lastActiveAt: number;
  /** A generate or refine call is running */
  busy: boolean;
}

/**
 * Sliding inactivity expiry: a session lapses once it has been idle longer than the timeout
 */
export function isSessionExpired(session: WebSession, now: number, timeoutMs: number): boolean {
  return now - session.lastActiveAt > timeoutMs;
}

// Upper bound on live sessions; the least recently active one makes room
export const MAX_SESSIONS = 10_000;

function newToken(): string {
  return randomBytes(24).toString('base64url');
}

/**
 * In-memory session table, kept in order of last activity
 */
export class SessionStore {
  private readonly sessions = new Map<string, WebSession>();
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly maxSessions: number;

  constructor(timeoutMinutes: number, now: () => number = Date.now, maxSessions: number = MAX_SESSIONS) {
    this.timeoutMs = timeoutMinutes * 60_000;
    this.now = now;
    this.maxSessions = maxSessions;
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): WebSession {
    this.prune();
    this.evictOverflow();

    const session: WebSession = {
      token: newToken(),
      authenticated: false,
      lastActiveAt: this.now(),
      busy: false,
    };
    this.sessions.set(session.token, session);
    return session;
  }

  /**
   * Look up a live session; an expired one is removed and not returned
   */
  get(token: string): WebSession | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;

    if (isSessionExpired(session, this.now(), this.timeoutMs)) {
      this.sessions.delete(token);
      return undefined;
    }
    return session;
  }

  touch(session: WebSession): void {
    session.lastActiveAt = this.now();
    this.sessions.delete(session.token);
    this.sessions.set(session.token, session);
  }

  /**
   * Move a session to a fresh token (after login)
   */
  rotate(session: WebSession): WebSession {
    this.sessions.delete(session.token);
    session.token = newToken();
    session.lastActiveAt = this.now();
    this.sessions.set(session.token, session);
    return session;
  }

  destroy(token: string): boolean {
    return this.sessions.delete(token);
  }

  /**
   * Drop every expired session
   *
   * @returns Number of sessions removed
   */
  prune(): number {
    const now = this.now();
    let removed = 0;

    for (const [token, session] of this.sessions) {
      if (isSessionExpired(session, now, this.timeoutMs)) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Drop the least recently active sessions until one more fits
   */
  private evictOverflow(): void {
    for (const token of this.sessions.keys()) {
      if (this.sessions.size < this.maxSessions) return;
      this.sessions.delete(token);
    }
  }
}
