import type { ClassifiedLine } from './classifier.js';

export type ExportFormat = 'pdf' | 'docx';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['pdf', 'docx'];

/**
 * Turns classified lines into a finished file
 */
export interface DocumentRenderer {
  readonly format: ExportFormat;
  /** File extension without the dot */
  readonly extension: string;
  readonly mimeType: string;

  render(lines: readonly ClassifiedLine[], title: string, date: Date): Promise<Buffer>;
}

export type ExportFailureReason = 'empty-input' | 'render-failed';

export type ExportResult =
  | { ok: true; path: string }
  | { ok: false; reason: ExportFailureReason; message: string };

export interface ExportOptions {
  /** Title shown in the document header (default "Document") */
  title?: string;
  /** Explicit destination; parent directories are created */
  outputPath?: string;
  /** Clock override for the date stamp and generated filename */
  now?: Date;
}

export function isExportFormat(value: string): value is ExportFormat {
  return value === 'pdf' || value === 'docx';
}
