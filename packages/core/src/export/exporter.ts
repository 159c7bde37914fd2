import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve as resolvePath } from 'path';
import type { Logger } from '../types.js';
import { silentLogger, errorMessage } from '../logger.js';
import { sanitizeTitle, formatFileTimestamp, EXPORT_TITLE_MAX_LENGTH } from '../storage/naming.js';
import { writeUniqueFile } from '../storage/unique-file.js';
import { classify } from './classifier.js';
import { PdfRenderer } from './pdf-renderer.js';
import { DocxRenderer } from './docx-renderer.js';
import type { DocumentRenderer, ExportFormat, ExportOptions, ExportResult } from './types.js';

const DEFAULT_TITLE = 'Document';

export interface DocumentExporterOptions {
  logger?: Logger;
  /** Clock override (tests) */
  now?: () => Date;
  /** Replace the built-in renderers */
  renderers?: Partial<Record<ExportFormat, DocumentRenderer>>;
}

/**
 * DocumentExporter - classify text and write it out as PDF or DOCX
 *
 * Never throws: empty input and render or I/O failures come back as
 * `{ ok: false }` results.
 *
 * @example
 * ```typescript
 * const exporter = new DocumentExporter(config.draftsDir, { logger });
 * const result = await exporter.export('pdf', draftText, { title: 'Quarterly Report' });
 * if (result.ok) console.log(result.path);
 * ```
 */
export class DocumentExporter {
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly renderers: Record<ExportFormat, DocumentRenderer>;

  constructor(outputDir: string, options: DocumentExporterOptions = {}) {
    this.outputDir = resolvePath(outputDir);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.renderers = {
      pdf: options.renderers?.pdf ?? new PdfRenderer({ logger: this.logger }),
      docx: options.renderers?.docx ?? new DocxRenderer(),
    };
  }

  /**
   * Renderer registered for a format
   */
  getRenderer(format: ExportFormat): DocumentRenderer {
    return this.renderers[format];
  }

  async export(format: ExportFormat, text: string, options: ExportOptions = {}): Promise<ExportResult> {
    if (!text.trim()) {
      this.logger.error('No text to export', { format });
      return { ok: false, reason: 'empty-input', message: 'No text to export' };
    }

    const renderer = this.renderers[format];
    const title = options.title ?? DEFAULT_TITLE;
    const date = options.now ?? this.now();
    const explicitPath = options.outputPath ? resolvePath(options.outputPath) : undefined;
    let outputPath = explicitPath ?? this.outputDir;

    try {
      const content = await renderer.render(classify(text), title, date);

      if (explicitPath) {
        await mkdir(dirname(explicitPath), { recursive: true });
        await writeFile(explicitPath, content);
      } else {
        // Generated names never replace an earlier export
        await mkdir(this.outputDir, { recursive: true });
        const stem = `${sanitizeTitle(title, EXPORT_TITLE_MAX_LENGTH)}_${formatFileTimestamp(date)}`;
        outputPath = await writeUniqueFile(this.outputDir, stem, `.${renderer.extension}`, () => content);
      }

      this.logger.info(`${format.toUpperCase()} exported`, { path: outputPath, bytes: content.length });
      return { ok: true, path: outputPath };
    } catch (error) {
      this.logger.error(`Failed to export ${format.toUpperCase()}`, {
        path: outputPath,
        error: errorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return {
        ok: false,
        reason: 'render-failed',
        message: `Failed to export ${format.toUpperCase()}: ${errorMessage(error)}`,
      };
    }
  }

  /**
   * Export to PDF
   *
   * @returns Written path, or null when the text is empty or export failed
   */
  async exportToPdf(text: string, title?: string, outputPath?: string): Promise<string | null> {
    const result = await this.export('pdf', text, { title, outputPath });
    return result.ok ? result.path : null;
  }

  /**
   * Export to DOCX
   *
   * @returns Written path, or null when the text is empty or export failed
   */
  async exportToDocx(text: string, title?: string, outputPath?: string): Promise<string | null> {
    const result = await this.export('docx', text, { title, outputPath });
    return result.ok ? result.path : null;
  }
}
