import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NoFramesError } from '@loopfetch/protocol';
import { cleanFrameDirectory, listFrameFiles, loadFrameDirectory, saveFrames, splitRows } from './frame-files.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'loopfetch-frames-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('listFrameFiles', () => {
  it('orders frames by their number, not their name', () => {
    const files = listFrameFiles(['frame_10.txt', 'frame_2.txt', 'notes.txt', 'frame_1.txt', 'frame_x.txt']);
    expect(files.map((f) => f.name)).toEqual(['frame_1.txt', 'frame_2.txt', 'frame_10.txt']);
  });
});

describe('splitRows', () => {
  it('does not add a row for a trailing newline', () => {
    expect(splitRows('ab\ncd\n')).toEqual(['ab', 'cd']);
    expect(splitRows('ab\r\ncd')).toEqual(['ab', 'cd']);
  });
});

describe('loadFrameDirectory', () => {
  it('loads frames in numeric order', async () => {
    fs.writeFileSync(path.join(dir, 'frame_10.txt'), 'ten');
    fs.writeFileSync(path.join(dir, 'frame_2.txt'), 'two\nrows');
    fs.writeFileSync(path.join(dir, 'frame_0.txt'), 'zero');
    fs.writeFileSync(path.join(dir, 'README'), 'ignored');

    const source = await loadFrameDirectory(dir);

    expect(source.frameCount).toBe(3);
    expect(source.frameRows(0)).toEqual(['zero']);
    expect(source.frameRows(1)).toEqual(['two', 'rows']);
    expect(source.frameRows(2)).toEqual(['ten']);
  });

  it('fails with NoFramesError for a missing directory', async () => {
    await expect(loadFrameDirectory(path.join(dir, 'missing'))).rejects.toBeInstanceOf(NoFramesError);
  });

  it('fails with NoFramesError for a directory without frames', async () => {
    fs.writeFileSync(path.join(dir, 'other.txt'), 'x');
    await expect(loadFrameDirectory(dir)).rejects.toThrow(`No frames found in ${dir}`);
  });
});

describe('saveFrames / cleanFrameDirectory', () => {
  it('writes numbered files and removes only frame files', async () => {
    const out = path.join(dir, 'anim');
    await saveFrames(out, [['a', 'b'], ['c']]);
    fs.writeFileSync(path.join(out, 'keep.txt'), 'keep');

    expect(fs.readFileSync(path.join(out, 'frame_0.txt'), 'utf-8')).toBe('a\nb');
    expect(fs.readFileSync(path.join(out, 'frame_1.txt'), 'utf-8')).toBe('c');

    expect(await cleanFrameDirectory(out)).toBe(2);
    expect(fs.readdirSync(out)).toEqual(['keep.txt']);
  });

  it('treats a missing directory as already clean', async () => {
    expect(await cleanFrameDirectory(path.join(dir, 'nope'))).toBe(0);
  });
});
