import { mkdir, readFile, readdir, unlink } from 'fs/promises';
import { basename, dirname, join, resolve as resolvePath } from 'path';
import type { Draft, DraftInput, DraftSummary, Logger } from '../types.js';
import { silentLogger, errorMessage } from '../logger.js';
import type { DraftStore, DraftFile } from './types.js';
import {
  DraftFileSchema,
  DraftSummaryFileSchema,
  DraftNotFoundError,
  CorruptDraftError,
  StorageError,
} from './types.js';
import { sanitizeTitle, formatFileTimestamp, formatSavedAt } from './naming.js';
import { hasErrorCode, writeUniqueFile } from './unique-file.js';

const DRAFT_EXTENSION = '.json';

export interface FileDraftStoreOptions {
  logger?: Logger;
  /** Clock override (tests) */
  now?: () => Date;
}

/**
 * FileDraftStore - one pretty-printed JSON file per draft
 *
 * Filenames are `{sanitized title}_{YYYYMMDD_HHMMSS}.json`, so sorting them
 * in reverse gives newest-first within a title. A second save of the same
 * title within the same second gets a `_2`, `_3`, ... suffix instead of
 * overwriting.
 */
export class FileDraftStore implements DraftStore {
  private readonly draftsDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(draftsDir: string, options: FileDraftStoreOptions = {}) {
    this.draftsDir = resolvePath(draftsDir);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Directory holding the draft files
   */
  get directory(): string {
    return this.draftsDir;
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.draftsDir, { recursive: true });
    } catch (error) {
      throw new StorageError(
        `Failed to create drafts directory: ${this.draftsDir}`,
        'INIT_ERROR',
        error
      );
    }
  }

  async save(input: DraftInput): Promise<string> {
    const savedAt = this.now();
    const stem = `${sanitizeTitle(input.title)}_${formatFileTimestamp(savedAt)}`;

    try {
      await mkdir(this.draftsDir, { recursive: true });

      const filepath = await writeUniqueFile(this.draftsDir, stem, DRAFT_EXTENSION, (filename) => {
        const record: DraftFile = {
          title: input.title,
          template_name: input.templateName,
          tone: input.tone,
          notes: input.notes,
          document_text: input.documentText,
          saved_at: formatSavedAt(savedAt),
          filename,
        };
        return JSON.stringify(record, null, 2);
      });

      this.logger.info('Draft saved', { filepath });
      return filepath;
    } catch (error) {
      this.logger.error('Failed to save draft', { title: input.title, error: errorMessage(error) });

      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`Failed to save draft: ${errorMessage(error)}`, 'WRITE_ERROR', error);
    }
  }

  async load(filepath: string): Promise<Draft> {
    let content: string;

    try {
      content = await readFile(filepath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.error('Draft not found', { filepath });
        throw new DraftNotFoundError(filepath);
      }
      this.logger.error('Failed to read draft', { filepath, error: errorMessage(error) });
      throw new StorageError(`Failed to read draft: ${filepath}`, 'READ_ERROR', error);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      this.logger.error('Failed to parse draft', { filepath, error: errorMessage(error) });
      throw new CorruptDraftError(filepath, 'invalid JSON');
    }

    const result = DraftFileSchema.safeParse(data);
    if (!result.success) {
      const fields = result.error.errors.map((err) => err.path.join('.') || '(root)').join(', ');
      this.logger.error('Draft is missing required fields', { filepath, fields });
      throw new CorruptDraftError(filepath, `invalid fields: ${fields}`);
    }

    const record = result.data;
    return {
      title: record.title,
      templateName: record.template_name,
      tone: record.tone,
      notes: record.notes,
      documentText: record.document_text,
      savedAt: record.saved_at,
      filename: record.filename || basename(filepath),
    };
  }

  async list(): Promise<DraftSummary[]> {
    let names: string[];

    try {
      names = await readdir(this.draftsDir);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.error('Failed to list drafts', { error: errorMessage(error) });
      }
      return [];
    }

    const draftFiles = names
      .filter((name) => name.endsWith(DRAFT_EXTENSION))
      .sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));

    const drafts: DraftSummary[] = [];

    for (const name of draftFiles) {
      const filepath = join(this.draftsDir, name);

      try {
        const data: unknown = JSON.parse(await readFile(filepath, 'utf-8'));
        const summary = DraftSummaryFileSchema.parse(data);

        drafts.push({
          title: summary.title,
          savedAt: summary.saved_at,
          filepath,
          templateName: summary.template_name,
        });
      } catch (error) {
        this.logger.warn(`Skipping unreadable draft: ${name}`, { error: errorMessage(error) });
      }
    }

    return drafts;
  }

  async delete(filename: string): Promise<boolean> {
    const filepath = this.resolve(filename);

    if (!filepath) {
      this.logger.warn('Rejected draft filename', { filename });
      return false;
    }

    try {
      await unlink(filepath);
      this.logger.info('Draft deleted', { filepath });
      return true;
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.error('Failed to delete draft', { filepath, error: errorMessage(error) });
      }
      return false;
    }
  }

  resolve(filename: string): string | undefined {
    const name = basename(filename);

    if (name !== filename || !name.endsWith(DRAFT_EXTENSION) || name === DRAFT_EXTENSION) {
      return undefined;
    }

    const filepath = join(this.draftsDir, name);
    return dirname(filepath) === this.draftsDir ? filepath : undefined;
  }
}
