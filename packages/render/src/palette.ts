import { STYLE } from './ansi/codes.js';
import { fgPalette } from './ansi/colors.js';

const BLOCK = '██';

/**
 * One block per standard palette slot, so the panel shows the terminal's own colors
 */
export function colorSwatch(slots: number = 8): string {
  const blocks: string[] = [];
  for (let i = 0; i < slots; i++) {
    blocks.push(`${fgPalette(i)}${BLOCK}${STYLE.reset}`);
  }
  return blocks.join(' ');
}

/**
 * Horizontal rule under the panel title
 */
export function rule(width: number): string {
  return '─'.repeat(Math.max(0, width));
}
