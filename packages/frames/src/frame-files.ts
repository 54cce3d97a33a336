import * as fs from 'fs';
import * as path from 'path';
import {
  FRAME_FILE_EXTENSION,
  FRAME_FILE_PATTERN,
  FRAME_FILE_PREFIX,
  NoFramesError,
} from '@loopfetch/protocol';
import type { FrameSource } from '@loopfetch/protocol';
import { arrayFrameSource } from '@loopfetch/render';

export interface FrameFile {
  name: string;
  index: number;
}

/**
 * Pick `frame_<n>.txt` names out of a directory listing, ordered by n
 */
export function listFrameFiles(names: readonly string[]): FrameFile[] {
  const files: FrameFile[] = [];
  for (const name of names) {
    const match = FRAME_FILE_PATTERN.exec(name);
    if (match?.[1] !== undefined) {
      files.push({ name, index: Number(match[1]) });
    }
  }
  return files.sort((a, b) => a.index - b.index);
}

/**
 * Split file contents into rows. A final newline does not start another row.
 */
export function splitRows(text: string): string[] {
  const rows = text.split(/\r?\n/);
  if (rows.length > 0 && rows[rows.length - 1] === '') {
    rows.pop();
  }
  return rows;
}

export function frameFileName(index: number): string {
  return `${FRAME_FILE_PREFIX}${index}${FRAME_FILE_EXTENSION}`;
}

/**
 * Read every frame file in a directory. Throws NoFramesError when the
 * directory is missing, unreadable or holds no frames.
 */
export async function loadFrameDirectory(dir: string): Promise<FrameSource> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dir);
  } catch (error) {
    throw new NoFramesError(`Animation directory not found: ${dir}`, { cause: error });
  }

  const files = listFrameFiles(names);
  if (files.length === 0) {
    throw new NoFramesError(`No frames found in ${dir}`);
  }

  const frames: string[][] = [];
  for (const file of files) {
    try {
      frames.push(splitRows(await fs.promises.readFile(path.join(dir, file.name), 'utf-8')));
    } catch (error) {
      throw new NoFramesError(`Failed to read frame ${file.name} in ${dir}`, { cause: error });
    }
  }

  return arrayFrameSource(frames);
}

/**
 * Remove every `frame_<n>.txt` file, leaving anything else alone
 */
export async function cleanFrameDirectory(dir: string): Promise<number> {
  if (!fs.existsSync(dir)) return 0;

  const files = listFrameFiles(await fs.promises.readdir(dir));
  for (const file of files) {
    await fs.promises.unlink(path.join(dir, file.name));
  }
  return files.length;
}

/**
 * Write frames as `frame_0.txt`, `frame_1.txt`, ...
 */
export async function saveFrames(dir: string, frames: ReadonlyArray<readonly string[]>): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });

  for (let i = 0; i < frames.length; i++) {
    const rows = frames[i] ?? [];
    await fs.promises.writeFile(path.join(dir, frameFileName(i)), rows.join('\n'), 'utf-8');
  }
}
