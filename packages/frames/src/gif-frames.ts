import * as fs from 'fs';
import sharp from 'sharp';
import { ASCII_RAMP, FrameGenerationError } from '@loopfetch/protocol';
import { STYLE, fgRgb } from '@loopfetch/render';
import { cleanFrameDirectory, saveFrames } from './frame-files.js';

export interface AsciiOptions {
  width: number;
  height: number;
  /** Wrap each character in its pixel's 24-bit color */
  color: boolean;
  /** Map light pixels to dense characters */
  invert: boolean;
}

/**
 * Raw pixel layout as sharp reports it
 */
export interface RawImageInfo {
  width: number;
  height: number;
  channels: number;
}

export interface GenerationResult {
  frameCount: number;
  removed: number;
}

/**
 * ITU-R 601 luma, 0-255
 */
export function luminance(r: number, g: number, b: number): number {
  return Math.round((r * 299 + g * 587 + b * 114) / 1000);
}

/**
 * Character for a luma value, darkest first
 */
export function rampChar(luma: number, invert: boolean, ramp: string = ASCII_RAMP): string {
  const value = invert ? 255 - luma : luma;
  const idx = Math.floor((value / 255) * (ramp.length - 1));
  return ramp[Math.max(0, Math.min(ramp.length - 1, idx))] ?? ' ';
}

/**
 * Convert one decoded frame into text rows
 */
export function pixelsToAsciiRows(data: Uint8Array, info: RawImageInfo, options: Pick<AsciiOptions, 'color' | 'invert'>): string[] {
  const rows: string[] = [];

  for (let y = 0; y < info.height; y++) {
    let row = '';
    for (let x = 0; x < info.width; x++) {
      const idx = (y * info.width + x) * info.channels;
      const r = data[idx] ?? 0;
      // Single-channel images repeat the gray value
      const g = info.channels >= 3 ? data[idx + 1] ?? 0 : r;
      const b = info.channels >= 3 ? data[idx + 2] ?? 0 : r;

      const char = rampChar(luminance(r, g, b), options.invert);
      row += options.color ? `${fgRgb({ r, g, b })}${char}${STYLE.reset}` : char;
    }
    rows.push(row);
  }

  return rows;
}

/**
 * Decode every page of an (animated) image into bounded ASCII frames
 */
export async function imageToAsciiFrames(input: string, options: AsciiOptions): Promise<string[][]> {
  if (!fs.existsSync(input)) {
    throw new FrameGenerationError(`Input file not found: ${input}`);
  }

  try {
    const metadata = await sharp(input, { animated: true }).metadata();
    const pages = metadata.pages ?? 1;
    const frames: string[][] = [];

    for (let page = 0; page < pages; page++) {
      const { data, info } = await sharp(input, { page })
        .resize(options.width, options.height, { fit: 'fill', kernel: 'lanczos3' })
        .flatten({ background: { r: 0, g: 0, b: 0 } })
        .raw()
        .toBuffer({ resolveWithObject: true });

      frames.push(pixelsToAsciiRows(data, info, options));
    }

    return frames;
  } catch (error) {
    throw new FrameGenerationError(`Failed to decode ${input}`, { cause: error });
  }
}

/**
 * Replace the frame files in `outDir` with frames generated from `input`
 */
export async function generateFramesFromGif(
  input: string,
  outDir: string,
  options: AsciiOptions
): Promise<GenerationResult> {
  const frames = await imageToAsciiFrames(input, options);
  const removed = await cleanFrameDirectory(outDir);
  await saveFrames(outDir, frames);
  return { frameCount: frames.length, removed };
}
