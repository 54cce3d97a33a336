import { NoFramesError } from '@loopfetch/protocol';
import type { Frame, FrameBox, FrameSource, StyledLine } from '@loopfetch/protocol';
import { pad } from '../text/ansi-text.js';

/**
 * Adapt in-memory frames to a FrameSource
 */
export function arrayFrameSource(frames: ReadonlyArray<readonly string[]>): FrameSource {
  return {
    frameCount: frames.length,
    frameRows: (index) => frames[index] ?? [],
  };
}

/**
 * Fit raw rows to the box: excess rows dropped, missing rows blank,
 * every row exactly `box.width` cells.
 */
export function normalizeFrame(rows: readonly string[], box: FrameBox): Frame {
  const lines: StyledLine[] = [];
  for (let y = 0; y < box.height; y++) {
    lines.push(pad(rows[y] ?? '', box.width, box.align));
  }
  return Object.freeze(lines);
}

/**
 * Ordered, immutable animation frames with a cycling cursor.
 * Only the render loop calls next().
 */
export class FrameStore {
  public readonly box: FrameBox;
  private readonly frames: readonly Frame[];
  private cursor: number = 0;

  private constructor(frames: readonly Frame[], box: FrameBox) {
    this.frames = frames;
    this.box = box;
  }

  /**
   * Normalize every frame from the source. Throws NoFramesError when it is empty.
   */
  static load(source: FrameSource, box: FrameBox): FrameStore {
    if (source.frameCount <= 0) {
      throw new NoFramesError('No animation frames to display');
    }

    const frames: Frame[] = [];
    for (let i = 0; i < source.frameCount; i++) {
      frames.push(normalizeFrame(source.frameRows(i), box));
    }
    return new FrameStore(Object.freeze(frames), box);
  }

  /**
   * Return the current frame and advance
   */
  next(): Frame {
    const frame = this.current();
    this.advance();
    return frame;
  }

  /**
   * Move the cursor to the following frame, wrapping at the end
   */
  advance(): void {
    this.cursor = (this.cursor + 1) % this.frames.length;
  }

  /**
   * Return the current frame without advancing
   */
  current(): Frame {
    const frame = this.frames[this.cursor];
    if (!frame) {
      throw new NoFramesError(`Frame ${this.cursor} is missing`);
    }
    return frame;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  get index(): number {
    return this.cursor;
  }
}
