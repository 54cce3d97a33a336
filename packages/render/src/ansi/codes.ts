/**
 * ANSI escape code constants
 */
export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * One SGR run: ESC, '[', digits and semicolons, terminating 'm'
 */
export const ESCAPE_RUN_SOURCE = '\\x1b\\[[0-9;]*m';

/**
 * Matches an escape run at `lastIndex` (sticky)
 */
export function escapeRunAt(): RegExp {
  return new RegExp(ESCAPE_RUN_SOURCE, 'y');
}

/**
 * Matches every escape run in a string
 */
export function escapeRunsGlobal(): RegExp {
  return new RegExp(ESCAPE_RUN_SOURCE, 'g');
}

/**
 * Cursor control
 */
export const CURSOR = {
  /** Move cursor to (row, col) - 1-indexed */
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  /** Hide cursor */
  hide: `${CSI}?25l`,
  /** Show cursor */
  show: `${CSI}?25h`,
  /** Move to home position */
  home: `${CSI}H`,
} as const;

/**
 * Screen control
 */
export const SCREEN = {
  /** Clear entire screen */
  clear: `${CSI}2J`,
  /** Clear from cursor to end of screen */
  clearToEnd: `${CSI}0J`,
  /** Clear from cursor to end of line */
  clearLineToEnd: `${CSI}0K`,
  /** Enter alternate screen buffer */
  enterAlt: `${CSI}?1049h`,
  /** Exit alternate screen buffer */
  exitAlt: `${CSI}?1049l`,
  /** Enable line wrapping */
  enableWrap: `${CSI}?7h`,
  /** Disable line wrapping */
  disableWrap: `${CSI}?7l`,
} as const;

/**
 * Text styling
 */
export const STYLE = {
  /** Reset all attributes */
  reset: `${CSI}0m`,
  /** Bold on */
  bold: `${CSI}1m`,
} as const;
