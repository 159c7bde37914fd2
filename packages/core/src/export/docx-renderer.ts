import {
  AlignmentType,
  Document,
  HeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  TextRun,
} from 'docx';
import { numberLines, toTitleCase, type ClassifiedLine } from './classifier.js';
import type { DocumentRenderer } from './types.js';
import { formatDisplayDate } from '../storage/naming.js';

const BULLET_REFERENCE = 'docwriter-bullets';
const NUMBER_REFERENCE = 'docwriter-numbers';

// Sizes are in half-points
const BODY_SIZE = 22;
const DATE_SIZE = 20;
const DATE_COLOR = '808080';

const LIST_INDENT = { left: 720, hanging: 360 };

/**
 * DocxRenderer - Word document with Title, Heading1/2 and list paragraph styles
 */
export class DocxRenderer implements DocumentRenderer {
  readonly format = 'docx';
  readonly extension = 'docx';
  readonly mimeType = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

  async render(lines: readonly ClassifiedLine[], title: string, date: Date): Promise<Buffer> {
    const children: Paragraph[] = [
      new Paragraph({ text: title, heading: HeadingLevel.TITLE }),
      new Paragraph({
        children: [new TextRun({ text: formatDisplayDate(date), color: DATE_COLOR, size: DATE_SIZE })],
      }),
      new Paragraph({}),
    ];

    const numbers = numberLines(lines);
    // Each numbered run gets its own numbering instance so it restarts at 1
    let numberInstance = 0;

    lines.forEach((line, index) => {
      switch (line.kind) {
        case 'blank':
          children.push(new Paragraph({}));
          break;
        case 'heading':
          children.push(new Paragraph({ text: toTitleCase(line.text), heading: HeadingLevel.HEADING_1 }));
          break;
        case 'subheading':
          children.push(new Paragraph({ text: line.text, heading: HeadingLevel.HEADING_2 }));
          break;
        case 'bullet':
          children.push(
            new Paragraph({
              text: line.text,
              style: 'ListBullet',
              numbering: { reference: BULLET_REFERENCE, level: 0 },
            })
          );
          break;
        case 'numbered':
          if (numbers[index] === 1) {
            numberInstance += 1;
          }
          children.push(
            new Paragraph({
              text: line.text,
              style: 'ListNumber',
              numbering: { reference: NUMBER_REFERENCE, level: 0, instance: numberInstance },
            })
          );
          break;
        case 'paragraph':
          children.push(new Paragraph({ text: line.text }));
          break;
      }
    });

    const document = new Document({
      title,
      styles: {
        default: {
          document: { run: { font: 'Calibri', size: BODY_SIZE } },
        },
        paragraphStyles: [
          { id: 'ListBullet', name: 'List Bullet', basedOn: 'Normal', quickFormat: true },
          { id: 'ListNumber', name: 'List Number', basedOn: 'Normal', quickFormat: true },
        ],
      },
      numbering: {
        config: [
          {
            reference: BULLET_REFERENCE,
            levels: [
              {
                level: 0,
                format: LevelFormat.BULLET,
                text: '•',
                alignment: AlignmentType.LEFT,
                style: { paragraph: { indent: LIST_INDENT } },
              },
            ],
          },
          {
            reference: NUMBER_REFERENCE,
            levels: [
              {
                level: 0,
                format: LevelFormat.DECIMAL,
                text: '%1.',
                alignment: AlignmentType.LEFT,
                style: { paragraph: { indent: LIST_INDENT } },
              },
            ],
          },
        ],
      },
      sections: [{ children }],
    });

    return Packer.toBuffer(document);
  }
}
