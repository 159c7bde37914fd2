import { access, constants, readFile } from 'fs/promises';

/**
 * System TrueType fonts with wide Unicode coverage, in order of preference
 */
export const UNICODE_FONT_CANDIDATES: readonly string[] = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
  '/usr/share/fonts/truetype/freefont/FreeSans.ttf',
  '/usr/share/fonts/TTF/DejaVuSans.ttf',
];

export interface UnicodeFontFiles {
  regular: string;
  /** Bold face, or the regular file when no bold sibling exists */
  bold: string;
}

/**
 * Base64 font data, ready for jsPDF's virtual file system
 */
export interface UnicodeFontData {
  regular: string;
  bold: string;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Bold sibling naming used by DejaVu (`Sans-Bold`), Liberation (`-Bold`) and FreeFont (`SansBold`)
 */
export function boldVariantPaths(regular: string): string[] {
  return [
    regular.replace(/Sans\.ttf$/, 'Sans-Bold.ttf'),
    regular.replace(/-Regular\.ttf$/, '-Bold.ttf'),
    regular.replace(/Sans\.ttf$/, 'SansBold.ttf'),
  ].filter((path) => path !== regular);
}

/**
 * First installed candidate font, with its bold face when present
 */
export async function findUnicodeFont(
  candidates: readonly string[] = UNICODE_FONT_CANDIDATES
): Promise<UnicodeFontFiles | undefined> {
  for (const regular of candidates) {
    if (!(await exists(regular))) continue;

    for (const bold of boldVariantPaths(regular)) {
      if (await exists(bold)) {
        return { regular, bold };
      }
    }
    return { regular, bold: regular };
  }
  return undefined;
}

export async function loadUnicodeFont(files: UnicodeFontFiles): Promise<UnicodeFontData> {
  const [regular, bold] = await Promise.all([readFile(files.regular), readFile(files.bold)]);
  return { regular: regular.toString('base64'), bold: bold.toString('base64') };
}
