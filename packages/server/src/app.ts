import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import { errorMessage, silentLogger, type DocWriterClient, type Logger } from '@docwriter/core';
import type { RouteContext } from './context.js';
import { SessionStore } from './sessions.js';
import { DownloadRegistry, DOWNLOAD_TTL_MS } from './downloads.js';
import {
  DEFAULT_RATE_LIMIT,
  mutationLimiter,
  requireAuth,
  sessionMiddleware,
  type RateLimitOptions,
} from './middleware.js';
import { createAuthRoutes } from './routes/auth.js';
import { createTemplateRoutes } from './routes/templates.js';
import { createGenerationRoutes } from './routes/generation.js';
import { createDraftRoutes } from './routes/drafts.js';
import { createExportRoutes } from './routes/exports.js';

// Room for four 10,000-character fields plus JSON overhead
const BODY_LIMIT = '256kb';

export interface AppOptions {
  client: DocWriterClient;
  /** Cookie signing secret */
  secretKey: string;
  password?: string;
  sessionTimeoutMinutes: number;
  /** Cap on live sessions */
  maxSessions?: number;
  logger?: Logger;
  rateLimit?: RateLimitOptions;
  downloadTtlMs?: number;
  /** Clock for sessions and downloads (tests) */
  now?: () => number;
}

/**
 * Read an HTTP status carried by body-parser and similar middleware errors
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

/**
 * Build the Express application
 *
 * @example
 * ```typescript
 * const app = createApp({ client, secretKey, password: config.web.password, sessionTimeoutMinutes: 60 });
 * app.listen(8090);
 * ```
 */
export function createApp(options: AppOptions): Express {
  const logger = options.logger ?? silentLogger;
  const sessions = new SessionStore(options.sessionTimeoutMinutes, options.now, options.maxSessions);
  const downloads = new DownloadRegistry(options.downloadTtlMs ?? DOWNLOAD_TTL_MS, options.now);

  const ctx: RouteContext = {
    client: options.client,
    logger,
    sessions,
    downloads,
    password: options.password,
    limiter: mutationLimiter(options.rateLimit ?? DEFAULT_RATE_LIMIT),
    requireAuth: requireAuth(options.password),
  };

  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.urlencoded({ extended: false, limit: BODY_LIMIT }));
  app.use(cookieParser(options.secretKey));

  // ============================================================================
  // Routes
  // ============================================================================

  /**
   * GET /health
   * Liveness check (no auth, no session)
   */
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  app.use(sessionMiddleware(sessions));

  app.use(createAuthRoutes(ctx));

  /**
   * GET /diagnostics
   * Component health plus system diagnostics
   */
  app.get('/diagnostics', ctx.requireAuth, async (_req, res, next) => {
    try {
      const [health, diagnostics] = await Promise.all([
        options.client.healthCheck(),
        options.client.getDiagnostics(),
      ]);
      res.json({ health, diagnostics });
    } catch (error) {
      next(error);
    }
  });

  app.use(createTemplateRoutes(ctx));
  app.use(createGenerationRoutes(ctx));
  app.use(createDraftRoutes(ctx));
  app.use(createExportRoutes(ctx));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ============================================================================
  // Error Handling
  // ============================================================================

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      res.status(status).json({ error: status === 413 ? 'Request body too large' : 'Bad request' });
      return;
    }

    logger.error('Unhandled error', {
      method: req.method,
      path: req.path,
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    if (res.headersSent) return;
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
