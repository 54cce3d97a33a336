import stringWidth from 'string-width';
import type { GlyphWidth } from '@loopfetch/protocol';

/**
 * Looks up the cell width of one code point
 */
export type WidthTable = (char: string) => number;

/**
 * Unicode East Asian Width / emoji table
 */
export const unicodeWidthTable: WidthTable = (char) => stringWidth(char);

/**
 * Code point ranges drawn two cells wide when no table answers
 */
const WIDE_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1100, 0x115f], // Hangul Jamo
  [0x2e80, 0xa4cf], // CJK radicals .. Yi
  [0xac00, 0xd7a3], // Hangul syllables
  [0xf900, 0xfaff], // CJK compatibility ideographs
  [0xfe10, 0xfe19], // vertical forms
  [0xfe30, 0xfe6f], // CJK compatibility forms, small forms
  [0xff00, 0xff60], // full-width forms
  [0x1f300, 0x1f64f], // pictographs, emoticons
];

function isControl(codePoint: number): boolean {
  return codePoint < 0x20 || (codePoint >= 0x7f && codePoint < 0xa0);
}

/**
 * Range-based width used when no Unicode table is available
 */
export function heuristicWidth(char: string): 1 | 2 {
  const codePoint = char.codePointAt(0) ?? 0;
  for (const [start, end] of WIDE_RANGES) {
    if (codePoint >= start && codePoint <= end) return 2;
  }
  return 1;
}

/**
 * Display width of one code point. Control characters (a stray ESC included)
 * take no cells.
 */
export function glyphWidth(char: string, table: WidthTable | null = unicodeWidthTable): GlyphWidth {
  const codePoint = char.codePointAt(0);
  if (codePoint === undefined || isControl(codePoint)) return 0;

  if (table) {
    const width = table(char);
    if (width === 0 || width === 1 || width === 2) return width;
  }
  return heuristicWidth(char);
}
