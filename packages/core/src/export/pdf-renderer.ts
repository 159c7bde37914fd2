import { jsPDF } from 'jspdf';
import { numberLines, toTitleCase, type ClassifiedLine } from './classifier.js';
import type { DocumentRenderer } from './types.js';
import { formatDisplayDate } from '../storage/naming.js';
import type { Logger } from '../types.js';
import { errorMessage, silentLogger } from '../logger.js';
import { findUnicodeFont, loadUnicodeFont, UNICODE_FONT_CANDIDATES, type UnicodeFontData } from './fonts.js';

type Rgb = [number, number, number];

interface TextStyle {
  fontStyle: 'normal' | 'bold' | 'italic';
  fontSize: number;
  color: Rgb;
  lineHeight: number;
}

// Layout in millimetres on A4
const MARGIN = 10;
const CONTENT_TOP = 28;
const HEADER_RULE_Y = 22;
const BOTTOM_MARGIN = 20;
const LIST_INDENT = 5;
const MARKER_WIDTH = 6;
const BLANK_GAP = 4;

const BODY: TextStyle = { fontStyle: 'normal', fontSize: 11, color: [0, 0, 0], lineHeight: 6 };
const HEADING: TextStyle = { fontStyle: 'bold', fontSize: 13, color: [0, 51, 102], lineHeight: 7 };
const SUBHEADING: TextStyle = { fontStyle: 'bold', fontSize: 11, color: [51, 51, 51], lineHeight: 6 };

const FALLBACK_FAMILY = 'helvetica';
const UNICODE_FAMILY = 'DocSans';

export interface PdfRendererOptions {
  logger?: Logger;
  /** TTF files to try for Unicode text; Helvetica when none is installed */
  fontCandidates?: readonly string[];
}

/**
 * PdfRenderer - A4 PDF with running header, page footer and wrapped text
 *
 * Text is set in the first installed Unicode TrueType font (embedded), or in
 * the built-in Helvetica, which only covers Latin-1.
 */
export class PdfRenderer implements DocumentRenderer {
  readonly format = 'pdf';
  readonly extension = 'pdf';
  readonly mimeType = 'application/pdf';

  private readonly logger: Logger;
  private readonly fontCandidates: readonly string[];
  private fontData?: Promise<UnicodeFontData | undefined>;

  constructor(options: PdfRendererOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.fontCandidates = options.fontCandidates ?? UNICODE_FONT_CANDIDATES;
  }

  async render(lines: readonly ClassifiedLine[], title: string, date: Date): Promise<Buffer> {
    const pdf = new jsPDF({ unit: 'mm', format: 'a4' });
    const family = this.registerFont(pdf, await this.loadFont());
    const pageWidth = pdf.internal.pageSize.getWidth();
    const pageHeight = pdf.internal.pageSize.getHeight();
    const maxWidth = pageWidth - MARGIN * 2;
    const pageBottom = pageHeight - BOTTOM_MARGIN;
    let y = CONTENT_TOP;

    pdf.setFont(family, 'normal');

    const applyStyle = (style: TextStyle): void => {
      pdf.setFont(family, style.fontStyle);
      pdf.setFontSize(style.fontSize);
      const [r, g, b] = style.color;
      pdf.setTextColor(r, g, b);
    };

    const ensureRoom = (height: number): void => {
      if (y + height > pageBottom) {
        pdf.addPage();
        y = CONTENT_TOP;
      }
    };

    const writeBlock = (text: string, style: TextStyle, x: number, marker?: string): void => {
      applyStyle(style);
      const wrapped: string[] = pdf.splitTextToSize(text, pageWidth - MARGIN - x);

      wrapped.forEach((part, index) => {
        ensureRoom(style.lineHeight);
        if (marker && index === 0) {
          pdf.text(marker, x - MARKER_WIDTH, y, { baseline: 'top' });
        }
        pdf.text(part, x, y, { baseline: 'top' });
        y += style.lineHeight;
      });
    };

    const numbers = numberLines(lines);

    lines.forEach((line, index) => {
      switch (line.kind) {
        case 'blank':
          y += BLANK_GAP;
          break;
        case 'heading':
          y += 4;
          writeBlock(toTitleCase(line.text), HEADING, MARGIN);
          y += 2;
          break;
        case 'subheading':
          y += 2;
          writeBlock(line.text, SUBHEADING, MARGIN);
          y += 1;
          break;
        case 'bullet':
          writeBlock(line.text, BODY, MARGIN + LIST_INDENT + MARKER_WIDTH, '-');
          break;
        case 'numbered':
          writeBlock(line.text, BODY, MARGIN + LIST_INDENT + MARKER_WIDTH, `${numbers[index]}.`);
          break;
        case 'paragraph':
          writeBlock(line.text, BODY, MARGIN);
          break;
      }
    });

    const pageCount = pdf.getNumberOfPages();
    const stamp = formatDisplayDate(date);
    pdf.setFont(family, 'bold');
    pdf.setFontSize(11);
    const headerTitle: string[] = pdf.splitTextToSize(title, maxWidth * 0.7);

    for (let page = 1; page <= pageCount; page++) {
      pdf.setPage(page);

      // Header
      pdf.setFont(family, 'bold');
      pdf.setFontSize(11);
      pdf.setTextColor(100, 100, 100);
      pdf.text(headerTitle[0] ?? '', MARGIN, 12, { baseline: 'top' });
      pdf.text(stamp, pageWidth - MARGIN, 12, { baseline: 'top', align: 'right' });
      pdf.setDrawColor(0, 0, 0);
      pdf.line(MARGIN, HEADER_RULE_Y, pageWidth - MARGIN, HEADER_RULE_Y);

      // Footer
      pdf.setFont(family, 'italic');
      pdf.setFontSize(8);
      pdf.setTextColor(128, 128, 128);
      pdf.text(`Page ${page}/${pageCount}`, pageWidth / 2, pageHeight - 10, { align: 'center' });
    }

    return Buffer.from(pdf.output('arraybuffer'));
  }

  /**
   * Font family to use in `pdf`, embedding the Unicode font when one was found
   */
  private registerFont(pdf: jsPDF, font: UnicodeFontData | undefined): string {
    if (!font) return FALLBACK_FAMILY;

    pdf.addFileToVFS(`${UNICODE_FAMILY}-Regular.ttf`, font.regular);
    pdf.addFileToVFS(`${UNICODE_FAMILY}-Bold.ttf`, font.bold);
    // No italic face is looked up; italic text is set upright
    pdf.addFileToVFS(`${UNICODE_FAMILY}-Italic.ttf`, font.regular);
    pdf.addFont(`${UNICODE_FAMILY}-Regular.ttf`, UNICODE_FAMILY, 'normal');
    pdf.addFont(`${UNICODE_FAMILY}-Bold.ttf`, UNICODE_FAMILY, 'bold');
    pdf.addFont(`${UNICODE_FAMILY}-Italic.ttf`, UNICODE_FAMILY, 'italic');
    return UNICODE_FAMILY;
  }

  /**
   * Find and read the Unicode font once per renderer
   */
  private loadFont(): Promise<UnicodeFontData | undefined> {
    this.fontData ??= this.readFont();
    return this.fontData;
  }

  private async readFont(): Promise<UnicodeFontData | undefined> {
    const files = await findUnicodeFont(this.fontCandidates);
    if (!files) {
      this.logger.debug('No Unicode TTF font found; PDF text uses Helvetica');
      return undefined;
    }

    try {
      const data = await loadUnicodeFont(files);
      this.logger.debug('PDF font loaded', { regular: files.regular, bold: files.bold });
      return data;
    } catch (error) {
      this.logger.warn('Failed to read PDF font; using Helvetica', {
        path: files.regular,
        error: errorMessage(error),
      });
      return undefined;
    }
  }
}
