/**
 * Line classification shared by the PDF and DOCX renderers
 */

export type LineKind = 'blank' | 'heading' | 'subheading' | 'bullet' | 'numbered' | 'paragraph';

export interface ClassifiedLine {
  kind: LineKind;
  /** Line payload with list markers removed */
  text: string;
}

const HEADING_MIN_EXCLUSIVE = 3;
const HEADING_MAX_EXCLUSIVE = 80;
const SUBHEADING_MAX_EXCLUSIVE = 60;

const BULLET_MARKERS = ['- ', '* '];
const NUMBERED_PREFIX = /^\d+[.)]\s/;

// A letter not preceded by another letter starts a word
const WORD_START = /(?<!\p{L})\p{L}/gu;

/**
 * True when the line has at least one cased letter and none in lower case
 */
function isAllCaps(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

/**
 * Classify a single line. The line is trimmed first; the first matching rule wins.
 */
export function classifyLine(line: string): ClassifiedLine {
  const stripped = line.trim();

  if (!stripped) {
    return { kind: 'blank', text: '' };
  }

  if (
    isAllCaps(stripped) &&
    stripped.length > HEADING_MIN_EXCLUSIVE &&
    stripped.length < HEADING_MAX_EXCLUSIVE
  ) {
    return { kind: 'heading', text: stripped };
  }

  if (stripped.endsWith(':') && stripped.length < SUBHEADING_MAX_EXCLUSIVE) {
    return { kind: 'subheading', text: stripped };
  }

  if (BULLET_MARKERS.some((marker) => stripped.startsWith(marker))) {
    return { kind: 'bullet', text: stripped.slice(2) };
  }

  const numbered = NUMBERED_PREFIX.exec(stripped);
  if (numbered) {
    return { kind: 'numbered', text: stripped.slice(numbered[0].length) };
  }

  return { kind: 'paragraph', text: stripped };
}

/**
 * Split text on `\n` and classify every line
 *
 * @example
 * ```typescript
 * classify('SUMMARY\n- one\n2) two');
 * // [{ kind: 'heading', text: 'SUMMARY' },
 * //  { kind: 'bullet', text: 'one' },
 * //  { kind: 'numbered', text: 'two' }]
 * ```
 */
export function classify(text: string): ClassifiedLine[] {
  return text.split('\n').map(classifyLine);
}

/**
 * Upper-case the first letter of every run of letters and lower-case the rest
 */
export function toTitleCase(text: string): string {
  return text.toLowerCase().replace(WORD_START, (letter) => letter.toUpperCase());
}

/**
 * Assign list numbers: each numbered line gets its position in the current run.
 * A run restarts after any line that is neither numbered nor blank.
 *
 * @returns One entry per line; 0 for lines that are not numbered
 */
export function numberLines(lines: readonly ClassifiedLine[]): number[] {
  let counter = 0;

  return lines.map((line) => {
    if (line.kind === 'numbered') {
      counter += 1;
      return counter;
    }
    if (line.kind !== 'blank') {
      counter = 0;
    }
    return 0;
  });
}
