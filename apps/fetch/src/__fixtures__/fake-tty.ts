import { EventEmitter } from 'events';
import type { ScreenOutput } from '@loopfetch/render';
import type { TtyInput } from '../terminal/raw-input.js';

/**
 * In-process stand-in for process.stdin
 */
export class FakeTtyInput extends EventEmitter implements TtyInput {
  isTTY: boolean;
  isRaw: boolean;
  paused: boolean = true;
  encoding: BufferEncoding | null = null;
  modeChanges: boolean[] = [];
  failOnRawMode: boolean | null = null;

  constructor(options: { isTTY?: boolean; isRaw?: boolean } = {}) {
    super();
    this.isTTY = options.isTTY ?? true;
    this.isRaw = options.isRaw ?? false;
  }

  setRawMode(mode: boolean): this {
    if (this.failOnRawMode === mode) {
      throw new Error(`setRawMode(${mode}) failed`);
    }
    this.modeChanges.push(mode);
    this.isRaw = mode;
    return this;
  }

  setEncoding(encoding: BufferEncoding): this {
    this.encoding = encoding;
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  type(text: string | Buffer): void {
    this.emit('data', text);
  }
}

/**
 * Captures every write; size is settable mid-test
 */
export class FakeScreenOutput implements ScreenOutput {
  writes: string[] = [];
  columns: number;
  rows: number;
  onWrite: (() => void) | null = null;

  constructor(columns: number = 80, rows: number = 24) {
    this.columns = columns;
    this.rows = rows;
  }

  write(chunk: string): boolean {
    this.writes.push(chunk);
    this.onWrite?.();
    return true;
  }
}
