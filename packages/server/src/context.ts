import type { RequestHandler } from 'express';
import type { DocWriterClient, Logger } from '@docwriter/core';
import type { SessionStore } from './sessions.js';
import type { DownloadRegistry } from './downloads.js';

/**
 * Shared state handed to every route module
 */
export interface RouteContext {
  client: DocWriterClient;
  logger: Logger;
  sessions: SessionStore;
  downloads: DownloadRegistry;
  password?: string;
  /** Applied first on every route that does work or changes state */
  limiter: RequestHandler;
  requireAuth: RequestHandler;
}
