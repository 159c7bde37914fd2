/**
 * Export System - plain text to PDF and DOCX
 *
 * - classify() - per-line structure shared by both renderers
 * - PdfRenderer / DocxRenderer - format-specific layout
 * - findUnicodeFont() - system TrueType font for non-Latin PDF text
 * - DocumentExporter - output paths, empty-input checks, failure reporting
 */

export {
  classify,
  classifyLine,
  toTitleCase,
  numberLines,
  type ClassifiedLine,
  type LineKind,
} from './classifier.js';

export {
  EXPORT_FORMATS,
  isExportFormat,
  type DocumentRenderer,
  type ExportFormat,
  type ExportFailureReason,
  type ExportOptions,
  type ExportResult,
} from './types.js';

export { PdfRenderer, type PdfRendererOptions } from './pdf-renderer.js';
export {
  UNICODE_FONT_CANDIDATES,
  findUnicodeFont,
  loadUnicodeFont,
  type UnicodeFontFiles,
  type UnicodeFontData,
} from './fonts.js';
export { DocxRenderer } from './docx-renderer.js';
export { DocumentExporter, type DocumentExporterOptions } from './exporter.js';
