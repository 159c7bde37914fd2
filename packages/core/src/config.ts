import { homedir } from 'os';
import { join, resolve } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

export const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_DRAFTS_DIR = join(homedir(), 'Documents', 'AI Writer Drafts');

/**
 * Environment schema. Empty strings are treated as unset before validation.
 */
const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().default(DEFAULT_MODEL),
  DRAFTS_DIR: z.string().optional(),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().max(64_000).default(4096),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  WEB_PASSWORD: z.string().optional(),
  WEB_SECRET_KEY: z.string().optional(),
  WEB_SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(60),
  WEB_PORT: z.coerce.number().int().min(1).max(65535).default(8090),
});

export interface WebConfig {
  password?: string;
  secretKey?: string;
  sessionTimeoutMinutes: number;
  port: number;
}

export interface DocWriterConfig {
  anthropicApiKey?: string;
  model: string;
  draftsDir: string;
  generationTimeoutMs: number;
  maxOutputTokens: number;
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  web: WebConfig;
}

/**
 * Custom error for invalid configuration values
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  /**
   * Get formatted error details
   */
  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors.map((err) => `${err.path.join('.')}: ${err.message}`).join('\n');
  }
}

/**
 * Load a .env file into process.env (existing variables win)
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

/**
 * Build configuration from an environment map
 *
 * @throws ConfigError if a value is present but invalid
 *
 * @example
 * ```typescript
 * loadEnvFile();
 * const config = loadConfig(process.env);
 * ```
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): DocWriterConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      raw[key] = value;
    }
  }

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    const error = new ConfigError('Invalid configuration', result.error);
    error.message = `Invalid configuration:\n${error.getDetails()}`;
    throw error;
  }

  const parsed = result.data;

  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    model: parsed.CLAUDE_MODEL,
    draftsDir: parsed.DRAFTS_DIR ? resolve(parsed.DRAFTS_DIR) : DEFAULT_DRAFTS_DIR,
    generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
    maxOutputTokens: parsed.MAX_OUTPUT_TOKENS,
    logLevel: parsed.LOG_LEVEL,
    web: {
      password: parsed.WEB_PASSWORD,
      secretKey: parsed.WEB_SECRET_KEY,
      sessionTimeoutMinutes: parsed.WEB_SESSION_TIMEOUT_MINUTES,
      port: parsed.WEB_PORT,
    },
  };
}
