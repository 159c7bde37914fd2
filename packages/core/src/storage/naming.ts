/**
 * Filename and timestamp helpers shared by the draft store and the exporters
 */

const ALLOWED_TITLE_CHAR = /[\p{L}\p{N} _-]/u;

export const DRAFT_TITLE_MAX_LENGTH = 40;
export const EXPORT_TITLE_MAX_LENGTH = 30;

/**
 * Turn a free-form title into a filename stem
 *
 * Keeps letters, digits, spaces, hyphens and underscores, truncates to
 * `maxLength`, trims, then replaces spaces with underscores. Falls back to
 * `untitled` when nothing is left.
 *
 * @example
 * ```typescript
 * sanitizeTitle('Hello! @World# $Test'); // 'Hello_World_Test'
 * ```
 */
export function sanitizeTitle(title: string, maxLength: number = DRAFT_TITLE_MAX_LENGTH): string {
  const kept = Array.from(title)
    .filter((char) => ALLOWED_TITLE_CHAR.test(char))
    .slice(0, maxLength)
    .join('');

  return kept.trim().replace(/ /g, '_') || 'untitled';
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Local time as `YYYYMMDD_HHMMSS` (fixed width, sorts chronologically)
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Local time as ISO-8601 with second precision and no offset
 */
export function formatSavedAt(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/**
 * Date stamp printed under exported titles, e.g. `March 05, 2026`
 */
export function formatDisplayDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${pad(date.getDate())}, ${date.getFullYear()}`;
}
