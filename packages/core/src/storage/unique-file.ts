import { writeFile } from 'fs/promises';
import { join } from 'path';
import { StorageError } from './types.js';

// Upper bound on `_2`, `_3`, ... suffixes tried for same-second writes
export const MAX_NAME_ATTEMPTS = 100;

/**
 * Check a thrown value for a Node.js errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Create `{stem}{extension}` in `dir` without replacing an existing file.
 * A taken name gets a `_2`, `_3`, ... suffix before the extension.
 *
 * @param content - file body for the chosen filename
 * @returns Path of the file that was created
 * @throws StorageError with code NAME_EXHAUSTED when every candidate is taken
 *
 * @example
 * ```typescript
 * await writeUniqueFile(dir, 'Report_20260520_164509', '.pdf', () => bytes);
 * // '<dir>/Report_20260520_164509.pdf', or '..._2.pdf' if that already exists
 * ```
 */
export async function writeUniqueFile(
  dir: string,
  stem: string,
  extension: string,
  content: (filename: string) => string | Uint8Array
): Promise<string> {
  for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
    const filename = attempt === 1 ? `${stem}${extension}` : `${stem}_${attempt}${extension}`;
    const filepath = join(dir, filename);

    try {
      await writeFile(filepath, content(filename), { flag: 'wx' });
      return filepath;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        continue;
      }
      throw error;
    }
  }

  throw new StorageError(`No free filename for: ${stem}${extension}`, 'NAME_EXHAUSTED');
}
