/**
 * DocWriter web server - JSON API over @docwriter/core
 */

export { createApp, type AppOptions } from './app.js';
export { SessionStore, isSessionExpired, MAX_SESSIONS, type WebSession } from './sessions.js';
export { DownloadRegistry, DOWNLOAD_TTL_MS, type PendingDownload } from './downloads.js';
export { findAvailablePort, isPortAvailable, MAX_PORT_ATTEMPTS } from './port.js';
export {
  SESSION_COOKIE,
  DEFAULT_RATE_LIMIT,
  passwordMatches,
  type RateLimitOptions,
} from './middleware.js';
export {
  MAX_TEXT_LENGTH,
  MAX_SHORT_FIELD_LENGTH,
  MAX_INSTRUCTION_LENGTH,
} from './validation.js';
