import { z } from 'zod';
import type { Draft, DraftInput, DraftSummary } from '../types.js';

/**
 * On-disk draft format (UTF-8 JSON, snake_case keys)
 */
export const DraftFileSchema = z.object({
  title: z.string(),
  template_name: z.string(),
  tone: z.string(),
  notes: z.string(),
  document_text: z.string(),
  saved_at: z.string(),
  filename: z.string().default(''),
});

export type DraftFile = z.infer<typeof DraftFileSchema>;

/**
 * Fields read when listing; everything optional so old or partial files still list
 */
export const DraftSummaryFileSchema = z.object({
  title: z.string().default('Untitled'),
  saved_at: z.string().default(''),
  template_name: z.string().default('general'),
});

/**
 * DraftStore - persistence contract for drafts
 *
 * Implementations:
 * - FileDraftStore - one JSON file per draft in a directory
 *
 * @example
 * ```typescript
 * const store = new FileDraftStore('/home/me/Documents/AI Writer Drafts');
 * await store.initialize();
 *
 * const path = await store.save({
 *   title: 'Pothole report',
 *   templateName: 'formal_letter',
 *   tone: 'Formal',
 *   notes: 'Main Street, 3 months',
 *   documentText: 'Dear Council, ...',
 * });
 *
 * const draft = await store.load(path);
 * ```
 */
export interface DraftStore {
  /**
   * Prepare the backing store (create directories, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Persist a new draft
   *
   * @returns Absolute path of the written file
   * @throws StorageError on any I/O or serialization failure
   */
  save(input: DraftInput): Promise<string>;

  /**
   * Load a draft by path
   *
   * @throws DraftNotFoundError if the file does not exist
   * @throws CorruptDraftError if the file is not a valid draft
   */
  load(filepath: string): Promise<Draft>;

  /**
   * List drafts, newest first (filename descending). Unreadable entries are skipped.
   */
  list(): Promise<DraftSummary[]>;

  /**
   * Delete a draft by bare filename
   *
   * @returns true if deleted; false if missing, rejected or failed
   */
  delete(filename: string): Promise<boolean>;

  /**
   * Map a bare filename to its path inside the store
   *
   * @returns undefined when the name addresses anything outside the store
   */
  resolve(filename: string): string | undefined;
}

/**
 * Custom error for missing drafts
 */
export class DraftNotFoundError extends Error {
  constructor(path: string) {
    super(`Draft not found: ${path}`);
    this.name = 'DraftNotFoundError';
  }
}

/**
 * Custom error for draft files that cannot be parsed
 */
export class CorruptDraftError extends Error {
  constructor(path: string, reason: string) {
    super(`Draft file is corrupt: ${path} (${reason})`);
    this.name = 'CorruptDraftError';
  }
}

/**
 * Custom error for storage operations
 */
export class StorageError extends Error {
  public readonly code?: string;
  public override readonly cause?: unknown;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message);
    this.name = 'StorageError';
    this.code = code;
    this.cause = cause;
  }
}
