import { TerminalModeError } from '@loopfetch/protocol';

/**
 * The part of a TTY read stream raw input needs. process.stdin satisfies it.
 */
export interface TtyInput {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
  off(event: 'data', listener: (chunk: string | Buffer) => void): unknown;
}

/**
 * Proof of raw-mode ownership. Only the controller that issued it can use it.
 */
export interface RawInputHandle {
  /** Raw flag to restore on release */
  readonly wasRaw: boolean;
  readonly released: boolean;
}

interface HandleState extends RawInputHandle {
  released: boolean;
  queue: string[];
  listener: (chunk: string | Buffer) => void;
}

/**
 * Owns the terminal's raw mode for one session. Keys are buffered as they
 * arrive and read back one at a time without blocking.
 */
export class RawInputController {
  private input: TtyInput;
  private handles: WeakMap<RawInputHandle, HandleState> = new WeakMap();

  constructor(input: TtyInput) {
    this.input = input;
  }

  /**
   * Enter raw mode and start buffering keys
   */
  acquire(): RawInputHandle {
    const { input } = this;
    if (!input.isTTY || typeof input.setRawMode !== 'function') {
      throw new TerminalModeError('stdin is not a terminal; raw input is unavailable');
    }

    const wasRaw = input.isRaw ?? false;
    try {
      input.setRawMode(true);
    } catch (error) {
      throw new TerminalModeError('Could not switch the terminal to raw mode', { cause: error });
    }

    const state: HandleState = {
      wasRaw,
      released: false,
      queue: [],
      listener: (chunk) => {
        const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
        state.queue.push(...Array.from(text));
      },
    };

    input.setEncoding('utf8');
    input.on('data', state.listener);
    input.resume();

    this.handles.set(state, state);
    return state;
  }

  /**
   * One buffered key, or null when none arrived
   */
  poll(handle: RawInputHandle): string | null {
    const state = this.handles.get(handle);
    if (!state || state.released) return null;
    return state.queue.shift() ?? null;
  }

  /**
   * Restore the previous mode. Safe to call twice, and with null after a
   * failed acquire.
   */
  release(handle: RawInputHandle | null): void {
    if (handle === null) return;
    const state = this.handles.get(handle);
    if (!state || state.released) return;

    state.released = true;
    state.queue.length = 0;
    this.input.off('data', state.listener);
    this.input.pause();

    try {
      this.input.setRawMode?.(state.wasRaw);
    } catch (error) {
      throw new TerminalModeError('Could not restore the terminal mode', { cause: error });
    }
  }
}
