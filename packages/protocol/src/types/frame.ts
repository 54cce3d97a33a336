import type { Align, StyledLine } from './render.js';

/**
 * Exactly `box.height` rows, each exactly `box.width` visible cells
 */
export type Frame = readonly StyledLine[];

/**
 * The fixed rectangle every animation frame is normalized to
 */
export interface FrameBox {
  width: number;
  height: number;
  align: Align;
}

/**
 * Supplies pre-rendered frames of arbitrary size
 */
export interface FrameSource {
  readonly frameCount: number;
  frameRows(index: number): readonly string[];
}
