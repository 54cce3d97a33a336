import type { Rgb } from './render.js';

/**
 * Colors read from the running terminal emulator's configuration
 */
export interface TerminalTheme {
  terminal: string;
  foreground: Rgb | null;
  background: Rgb | null;
  accent: Rgb | null;
  palette: Record<string, Rgb>;
}
