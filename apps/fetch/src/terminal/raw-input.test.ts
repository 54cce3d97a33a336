import { describe, it, expect } from 'vitest';
import { TerminalModeError } from '@loopfetch/protocol';
import { FakeTtyInput } from '../__fixtures__/fake-tty.js';
import { RawInputController } from './raw-input.js';

describe('RawInputController', () => {
  it('enters raw mode and buffers keys one at a time', () => {
    const input = new FakeTtyInput();
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    expect(input.isRaw).toBe(true);
    expect(input.paused).toBe(false);
    expect(input.encoding).toBe('utf8');

    input.type('ab');
    expect(controller.poll(handle)).toBe('a');
    expect(controller.poll(handle)).toBe('b');
    expect(controller.poll(handle)).toBeNull();
  });

  it('keeps astral characters whole', () => {
    const input = new FakeTtyInput();
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    input.type(Buffer.from('😀q'));
    expect(controller.poll(handle)).toBe('😀');
    expect(controller.poll(handle)).toBe('q');
  });

  it('refuses a non-TTY input', () => {
    const input = new FakeTtyInput({ isTTY: false });
    const controller = new RawInputController(input);

    expect(() => controller.acquire()).toThrow(TerminalModeError);
    expect(input.modeChanges).toEqual([]);
    expect(input.listenerCount('data')).toBe(0);
  });

  it('wraps a failing setRawMode', () => {
    const input = new FakeTtyInput();
    input.failOnRawMode = true;
    const controller = new RawInputController(input);

    expect(() => controller.acquire()).toThrow(TerminalModeError);
    expect(input.listenerCount('data')).toBe(0);
  });

  it('restores the previous raw flag on release', () => {
    const input = new FakeTtyInput({ isRaw: false });
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    controller.release(handle);

    expect(input.isRaw).toBe(false);
    expect(input.paused).toBe(true);
    expect(input.listenerCount('data')).toBe(0);
    expect(handle.released).toBe(true);
  });

  it('restores raw mode when it was already on', () => {
    const input = new FakeTtyInput({ isRaw: true });
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    controller.release(handle);
    expect(input.modeChanges).toEqual([true, true]);
  });

  it('is idempotent and accepts null', () => {
    const input = new FakeTtyInput();
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    controller.release(handle);
    controller.release(handle);
    controller.release(null);

    expect(input.modeChanges).toEqual([true, false]);
  });

  it('stops buffering after release', () => {
    const input = new FakeTtyInput();
    const controller = new RawInputController(input);
    const handle = controller.acquire();

    input.type('x');
    controller.release(handle);
    input.type('q');

    expect(controller.poll(handle)).toBeNull();
  });

  it('reports a failed restore once', () => {
    const input = new FakeTtyInput();
    const controller = new RawInputController(input);
    const handle = controller.acquire();
    input.failOnRawMode = false;

    expect(() => controller.release(handle)).toThrow(TerminalModeError);
    expect(() => controller.release(handle)).not.toThrow();
    expect(input.listenerCount('data')).toBe(0);
  });

  it('ignores handles from another controller', () => {
    const input = new FakeTtyInput();
    const owner = new RawInputController(input);
    const other = new RawInputController(input);
    const handle = owner.acquire();

    input.type('q');
    expect(other.poll(handle)).toBeNull();
    expect(owner.poll(handle)).toBe('q');
  });
});
