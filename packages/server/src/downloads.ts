import { randomBytes } from 'crypto';

export const DOWNLOAD_TTL_MS = 5 * 60_000;

export interface PendingDownload {
  path: string;
  filename: string;
  mimeType: string;
  /** Session allowed to fetch the file */
  sessionToken: string;
  expiresAt: number;
}

/**
 * One-time download tokens for exported files
 */
export class DownloadRegistry {
  private readonly pending = new Map<string, PendingDownload>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number = DOWNLOAD_TTL_MS, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get size(): number {
    return this.pending.size;
  }

  register(entry: Omit<PendingDownload, 'expiresAt'>): string {
    this.prune();

    const token = randomBytes(24).toString('base64url');
    this.pending.set(token, { ...entry, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  /**
   * Redeem a token. A token works once, only for the session it was issued to,
   * and only before it expires.
   */
  take(token: string, sessionToken: string): PendingDownload | undefined {
    const entry = this.pending.get(token);
    if (!entry || entry.sessionToken !== sessionToken) return undefined;

    this.pending.delete(token);
    return entry.expiresAt >= this.now() ? entry : undefined;
  }

  prune(): void {
    const now = this.now();
    for (const [token, entry] of this.pending) {
      if (entry.expiresAt < now) this.pending.delete(token);
    }
  }
}
