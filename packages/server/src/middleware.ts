import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { rateLimit } from 'express-rate-limit';
import type { SessionStore, WebSession } from './sessions.js';

export const SESSION_COOKIE = 'docwriter_session';

// Requests that never start a session
const READ_ONLY_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

declare global {
  namespace Express {
    interface Request {
      webSession?: WebSession;
    }
  }
}

/**
 * Session attached by sessionMiddleware; always present on state-changing requests
 */
export function currentSession(req: Request): WebSession {
  if (!req.webSession) {
    throw new Error(`No session for ${req.method} ${req.path}`);
  }
  return req.webSession;
}

export function setSessionCookie(res: Response, session: WebSession, maxAgeMs: number): void {
  res.cookie(SESSION_COOKIE, session.token, {
    signed: true,
    httpOnly: true,
    sameSite: 'lax',
    maxAge: maxAgeMs,
  });
}

/**
 * Resolve the signed session cookie to a live session and slide its inactivity
 * window. Without one (missing, forged or expired cookie), read-only requests
 * stay anonymous and any other request starts a new session.
 */
export function sessionMiddleware(sessions: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const signed: Record<string, unknown> = req.signedCookies ?? {};
    const token = signed[SESSION_COOKIE];
    const existing = typeof token === 'string' ? sessions.get(token) : undefined;

    if (existing) {
      sessions.touch(existing);
      req.webSession = existing;
    } else if (!READ_ONLY_METHODS.has(req.method)) {
      req.webSession = sessions.create();
    }

    if (req.webSession) {
      setSessionCookie(res, req.webSession, sessions.timeout);
    }
    next();
  };
}

/**
 * Constant-time password comparison
 */
export function passwordMatches(candidate: string, expected: string): boolean {
  const a = createHash('sha256').update(candidate).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

/**
 * Reject unauthenticated requests when a password is configured
 */
export function requireAuth(password: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!password || req.webSession?.authenticated) {
      next();
      return;
    }
    res.status(401).json({ error: 'Authentication required' });
  };
}

/**
 * Allow one generation call per session at a time
 */
export function exclusivePerSession(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const session = currentSession(req);

    if (session.busy) {
      res.status(409).json({ error: 'A request is already in progress for this session' });
      return;
    }

    session.busy = true;
    void handler(req, res)
      .catch(next)
      .finally(() => {
        session.busy = false;
      });
  };
}

export interface RateLimitOptions {
  windowMs: number;
  limit: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitOptions = { windowMs: 60_000, limit: 10 };

/**
 * Per-address limiter for requests that do work or change state
 */
export function mutationLimiter(options: RateLimitOptions = DEFAULT_RATE_LIMIT): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({ error: 'Too many requests, please slow down' });
    },
  });
}
