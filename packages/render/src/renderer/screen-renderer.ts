import { FALLBACK_COLUMNS, FALLBACK_ROWS } from '@loopfetch/protocol';
import type { StyledLine, TerminalGeometry } from '@loopfetch/protocol';
import { ANSIBuilder } from '../ansi/builder.js';

/**
 * The part of a TTY write stream the renderer needs
 */
export interface ScreenOutput {
  write(chunk: string): boolean;
  columns?: number;
  rows?: number;
}

/**
 * Read the terminal size now. Never cached: the user may resize mid-run.
 */
export function readGeometry(output: ScreenOutput): TerminalGeometry {
  const columns = output.columns && output.columns > 0 ? output.columns : FALLBACK_COLUMNS;
  const rows = output.rows && output.rows > 0 ? output.rows : FALLBACK_ROWS;
  return { columns, rows };
}

/**
 * Full-screen writer: every draw overwrites rows in place instead of scrolling
 */
export class ScreenRenderer {
  private ansi: ANSIBuilder = new ANSIBuilder();
  private output: ScreenOutput;
  private active: boolean = false;

  constructor(output: ScreenOutput) {
    this.output = output;
  }

  /**
   * Initialize terminal (enter alternate screen, hide cursor, etc.)
   */
  initialize(): void {
    if (this.active) return;

    const init = this.ansi
      .enterAlternateScreen()
      .hideCursor()
      .disableLineWrap()
      .clearScreen()
      .build();

    this.output.write(init);
    this.active = true;
  }

  /**
   * Cleanup terminal (exit alternate screen, show cursor)
   */
  cleanup(): void {
    if (!this.active) return;

    const cleanup = this.ansi
      .resetAttributes()
      .enableLineWrap()
      .showCursor()
      .exitAlternateScreen()
      .build();

    this.output.write(cleanup);
    this.active = false;
  }

  /**
   * Write one tick's rows top to bottom in a single write.
   * Rows below the terminal's last line are not written.
   */
  draw(rows: readonly StyledLine[], geometry: TerminalGeometry): string {
    const visible = Math.min(rows.length, geometry.rows);

    this.ansi.home();
    for (let y = 0; y < visible; y++) {
      this.ansi.moveTo(0, y).write(rows[y] ?? '').resetAttributes().clearLineToEnd();
    }
    if (visible < geometry.rows) {
      this.ansi.moveTo(0, visible).clearToEnd();
    }

    const frame = this.ansi.build();
    this.output.write(frame);
    return frame;
  }

  isActive(): boolean {
    return this.active;
  }
}
