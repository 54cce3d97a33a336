import type { Align, GlyphWidth, StyledLine } from '@loopfetch/protocol';
import { ESC, STYLE, escapeRunAt, escapeRunsGlobal } from '../ansi/codes.js';
import { glyphWidth, unicodeWidthTable, type WidthTable } from './glyph-width.js';

/**
 * One lexical piece of a styled line
 */
export type TextToken =
  | { kind: 'escape'; text: string }
  | { kind: 'control'; text: string }
  | { kind: 'glyph'; text: string; width: GlyphWidth };

/**
 * Split a styled line into escape runs, stray escape bytes and glyphs.
 * Glyphs are code points, so surrogate pairs stay whole.
 */
export function* tokenize(s: string, table: WidthTable | null = unicodeWidthTable): Generator<TextToken> {
  const escapeRun = escapeRunAt();
  let i = 0;

  while (i < s.length) {
    if (s[i] === ESC) {
      escapeRun.lastIndex = i;
      const run = escapeRun.exec(s)?.[0];
      if (run) {
        yield { kind: 'escape', text: run };
        i = escapeRun.lastIndex;
      } else {
        yield { kind: 'control', text: ESC };
        i += 1;
      }
      continue;
    }

    const codePoint = s.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    yield { kind: 'glyph', text: char, width: glyphWidth(char, table) };
    i += char.length;
  }
}

/**
 * Remove every escape run
 */
export function stripEscapes(s: string): string {
  return s.replace(escapeRunsGlobal(), '');
}

/**
 * Every escape run in order of appearance
 */
export function escapeRuns(s: string): string[] {
  return s.match(escapeRunsGlobal()) ?? [];
}

/**
 * Number of terminal cells the line occupies once escape runs are removed
 */
export function visibleWidth(s: string, table: WidthTable | null = unicodeWidthTable): number {
  let width = 0;
  for (const token of tokenize(s, table)) {
    if (token.kind === 'glyph') width += token.width;
  }
  return width;
}

/**
 * Cut a styled line down to at most `target` cells.
 *
 * Escape runs are copied whole and never count against the target; a wide
 * glyph that would straddle the boundary is dropped. Anything cut ends in a
 * reset so color cannot bleed into what is written next.
 */
export function truncate(s: StyledLine, target: number, table: WidthTable | null = unicodeWidthTable): StyledLine {
  if (visibleWidth(s, table) <= target) return s;

  let out = '';
  let width = 0;

  for (const token of tokenize(s, table)) {
    if (width >= target) break;
    if (token.kind === 'escape') {
      out += token.text;
      continue;
    }
    if (token.kind === 'control') continue;
    if (width + token.width > target) break;
    out += token.text;
    width += token.width;
  }

  return out + STYLE.reset;
}

/**
 * Fit a styled line to exactly `target` cells.
 * Center alignment puts the odd space on the right.
 */
export function pad(
  s: StyledLine,
  target: number,
  align: Align = 'left',
  table: WidthTable | null = unicodeWidthTable
): StyledLine {
  const width = visibleWidth(s, table);

  if (width >= target) {
    const cut = truncate(s, target, table);
    // A dropped wide glyph leaves one cell to fill
    const shortfall = target - visibleWidth(cut, table);
    return shortfall > 0 ? cut + ' '.repeat(shortfall) : cut;
  }

  const extra = target - width;
  if (align === 'center') {
    const left = Math.floor(extra / 2);
    return ' '.repeat(left) + s + ' '.repeat(extra - left);
  }
  return s + ' '.repeat(extra);
}
