import type { Frame, StyledLine } from '@loopfetch/protocol';
import { truncate, visibleWidth } from '../text/ansi-text.js';

export interface CompositorOptions {
  separator: string;
  /** Live terminal column count */
  columns: number;
  /** Width every animation row was normalized to */
  boxWidth: number;
}

/**
 * Join one animation row and one panel row. The animation keeps its full
 * box width; the panel row absorbs all width pressure.
 */
export function composeLine(left: StyledLine, right: StyledLine, separator: string, columns: number): StyledLine {
  const available = Math.max(0, columns - visibleWidth(left) - visibleWidth(separator));
  return left + separator + truncate(right, available);
}

/**
 * Compose every row of one tick, top to bottom. The shorter side is filled
 * with blank rows.
 */
export function composeRows(frame: Frame, panelLines: readonly StyledLine[], options: CompositorOptions): StyledLine[] {
  const { separator, columns, boxWidth } = options;
  const blankLeft = ' '.repeat(boxWidth);
  const rowCount = Math.max(frame.length, panelLines.length);
  const rows: StyledLine[] = [];

  for (let i = 0; i < rowCount; i++) {
    rows.push(composeLine(frame[i] ?? blankLeft, panelLines[i] ?? '', separator, columns));
  }

  return rows;
}
