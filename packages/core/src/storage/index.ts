/**
 * Storage System - Draft persistence and retrieval
 *
 * Provides the DraftStore contract with a filesystem implementation:
 * - FileDraftStore - one JSON file per draft in a fixed directory
 *
 * Features:
 * - Title sanitization and timestamped filenames
 * - Newest-first listing that skips unreadable files
 * - Path-traversal guard on delete and resolve
 */

export {
  type DraftStore,
  type DraftFile,
  DraftFileSchema,
  DraftNotFoundError,
  CorruptDraftError,
  StorageError,
} from './types.js';

export { FileDraftStore, type FileDraftStoreOptions } from './file-store.js';

export { writeUniqueFile, hasErrorCode, MAX_NAME_ATTEMPTS } from './unique-file.js';

export {
  sanitizeTitle,
  formatFileTimestamp,
  formatSavedAt,
  formatDisplayDate,
  DRAFT_TITLE_MAX_LENGTH,
  EXPORT_TITLE_MAX_LENGTH,
} from './naming.js';
