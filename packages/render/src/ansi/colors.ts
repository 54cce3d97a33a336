import type { Rgb } from '@loopfetch/protocol';
import { CSI } from './codes.js';

/**
 * 8 standard palette slots, in SGR order
 */
export const COLORS_8 = ['black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'white'] as const;

/**
 * 24-bit foreground color run
 */
export function fgRgb(color: Rgb): string {
  return `${CSI}38;2;${color.r};${color.g};${color.b}m`;
}

/**
 * Foreground run for a palette slot (0-7 normal, 8-15 bright)
 */
export function fgPalette(index: number): string {
  const idx = Math.max(0, Math.min(15, Math.trunc(index)));
  return idx < 8 ? `${CSI}${30 + idx}m` : `${CSI}${90 + idx - 8}m`;
}

/**
 * Parse `#rgb` / `#rrggbb` (leading '#' optional). Returns null when malformed.
 */
export function hexToRgb(hex: string): Rgb | null {
  let clean = hex.trim().replace(/^#/, '');
  if (clean.length === 3) {
    clean = clean
      .split('')
      .map((c) => c + c)
      .join('');
  }
  if (!/^[0-9a-fA-F]{6}$/.test(clean)) return null;
  const num = parseInt(clean, 16);
  return { r: (num >> 16) & 255, g: (num >> 8) & 255, b: num & 255 };
}
