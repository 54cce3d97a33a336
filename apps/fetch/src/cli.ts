import { Command } from 'commander';
import { DEFAULT_BOX_HEIGHT, DEFAULT_BOX_WIDTH, DEFAULT_FPS } from '@loopfetch/protocol';
import type { CliOptions } from './config.js';
import { getVersion } from './version.js';

/**
 * Numeric options stay strings here; zod validates them once every source is merged
 */
export function createProgram(): Command {
  return new Command('loopfetch')
    .description('Looping ASCII animation beside a live system summary (q, Esc or Ctrl+C to quit)')
    .version(getVersion())
    .option('--anim-dir <dir>', 'directory of frame_<n>.txt files (env: LOOPFETCH_ANIM_DIR)')
    .option('--width <n>', `animation box width in cells (default: ${DEFAULT_BOX_WIDTH}, env: LOOPFETCH_WIDTH)`)
    .option('--height <n>', `animation box height in rows (default: ${DEFAULT_BOX_HEIGHT}, env: LOOPFETCH_HEIGHT)`)
    .option('--fps <n>', `frames per second (default: ${DEFAULT_FPS}, env: LOOPFETCH_FPS)`)
    .option('--align <left|center>', 'alignment of frame rows inside the box (env: LOOPFETCH_ALIGN)')
    .option('--gen-frames', 'convert an animated image to frame files and exit')
    .option('-i, --input <gif>', 'animated image for --gen-frames')
    .option('-o, --out <dir>', 'output directory for --gen-frames (default: the animation directory)')
    .option('--color', 'keep pixel colors when generating frames')
    .option('--invert', 'map light pixels to dense characters when generating frames')
    .option('--no-theme', 'do not tint labels with the terminal theme');
}

/**
 * Parse argv into raw options
 */
export function parseCliOptions(argv: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...argv]);
  return program.opts<CliOptions>();
}
