/**
 * 24-bit color channel triple
 */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/**
 * Text interleaved with zero-width escape runs
 */
export type StyledLine = string;

/**
 * Horizontal placement of a row inside the animation box
 */
export type Align = 'left' | 'center';

/**
 * Display width of one glyph in terminal cells
 */
export type GlyphWidth = 0 | 1 | 2;

/**
 * Live terminal size, read on every draw
 */
export interface TerminalGeometry {
  columns: number;
  rows: number;
}
