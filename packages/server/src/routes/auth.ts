import { Router } from 'express';
import type { RouteContext } from '../context.js';
import { LoginBodySchema, parseBody } from '../validation.js';
import { SESSION_COOKIE, currentSession, passwordMatches, setSessionCookie } from '../middleware.js';

export function createAuthRoutes(ctx: RouteContext): Router {
  const router = Router();

  /**
   * POST /login
   * Body: { "password": "..." }
   */
  router.post('/login', ctx.limiter, (req, res) => {
    const body = parseBody(LoginBodySchema, req, res);
    if (!body) return;

    const session = currentSession(req);

    if (!ctx.password) {
      res.json({ authenticated: true, passwordRequired: false });
      return;
    }

    if (!passwordMatches(body.password, ctx.password)) {
      ctx.logger.warn('Failed login attempt', { ip: req.ip });
      res.status(401).json({ error: 'Invalid password' });
      return;
    }

    ctx.sessions.rotate(session);
    session.authenticated = true;
    setSessionCookie(res, session, ctx.sessions.timeout);

    res.json({ authenticated: true, passwordRequired: true });
  });

  /**
   * POST /logout
   */
  router.post('/logout', (req, res) => {
    ctx.sessions.destroy(currentSession(req).token);
    res.clearCookie(SESSION_COOKIE);
    res.json({ authenticated: false });
  });

  /**
   * GET /session
   * Report login state for the current browser
   */
  router.get('/session', (req, res) => {
    res.json({
      authenticated: !ctx.password || req.webSession?.authenticated === true,
      passwordRequired: Boolean(ctx.password),
      timeoutMinutes: ctx.sessions.timeout / 60_000,
    });
  });

  return router;
}
