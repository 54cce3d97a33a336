import { afterEach, describe, it, expect, vi } from 'vitest';
import { NoFramesError, TerminalModeError } from '@loopfetch/protocol';
import { FrameStore, ScreenRenderer, StatusPanel, arrayFrameSource } from '@loopfetch/render';
import { FakeScreenOutput, FakeTtyInput } from './__fixtures__/fake-tty.js';
import { runSession, type SessionOptions } from './session.js';
import { RawInputController } from './terminal/raw-input.js';

function sessionOptions(input: FakeTtyInput, output: FakeScreenOutput, overrides: Partial<SessionOptions> = {}): SessionOptions {
  return {
    loadFrames: async () =>
      FrameStore.load(arrayFrameSource([['*']]), { width: 1, height: 1, align: 'left' }),
    createPanel: async () => new StatusPanel([{ name: 'title', tier: 'heavy', provider: () => 'me@box' }]),
    input: new RawInputController(input),
    screen: new ScreenRenderer(output),
    output,
    fps: 10,
    clock: () => 0,
    sleep: async () => {
      input.type('q');
    },
    ...overrides,
  };
}

describe('runSession', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('never touches the terminal when there are no frames', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();
    const createPanel = vi.fn(async () => new StatusPanel([]));

    const session = runSession(
      sessionOptions(input, output, {
        loadFrames: async () => FrameStore.load(arrayFrameSource([]), { width: 1, height: 1, align: 'left' }),
        createPanel,
      })
    );

    await expect(session).rejects.toThrow(NoFramesError);
    expect(input.modeChanges).toEqual([]);
    expect(output.writes).toEqual([]);
    expect(createPanel).not.toHaveBeenCalled();
  });

  it('does not start the loop when raw mode cannot be acquired', async () => {
    const input = new FakeTtyInput({ isTTY: false });
    const output = new FakeScreenOutput();
    const onLoop = vi.fn();

    await expect(runSession(sessionOptions(input, output, { onLoop }))).rejects.toThrow(TerminalModeError);
    expect(onLoop).not.toHaveBeenCalled();
    expect(output.writes).toEqual([]);
  });

  it('releases raw mode when wiring the loop fails', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();
    const onLoop = () => {
      throw new Error('signal wiring failed');
    };

    await expect(runSession(sessionOptions(input, output, { onLoop }))).rejects.toThrow('signal wiring failed');
    expect(input.isRaw).toBe(false);
    expect(input.paused).toBe(true);
    expect(input.listenerCount('data')).toBe(0);
    expect(output.writes).toEqual([]);
  });

  it('restores the terminal after a quit key', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();

    expect(await runSession(sessionOptions(input, output))).toBe('quit');

    expect(input.modeChanges).toEqual([true, false]);
    expect(output.writes[0]).toBe('\x1b[?1049h\x1b[?25l\x1b[?7l\x1b[2J');
    expect(output.writes.at(-1)).toBe('\x1b[0m\x1b[?7h\x1b[?25h\x1b[?1049l');
    expect(output.writes).toHaveLength(3);
  });

  it('restores the terminal when the loop throws', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();
    const failing = sessionOptions(input, output, {
      sleep: async () => {
        throw new Error('sleep failed');
      },
    });

    await expect(runSession(failing)).rejects.toThrow('sleep failed');
    expect(input.isRaw).toBe(false);
    expect(output.writes.at(-1)).toBe('\x1b[0m\x1b[?7h\x1b[?25h\x1b[?1049l');
  });

  it('logs a failed restore instead of throwing it', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const options = sessionOptions(input, output, {
      sleep: async () => {
        input.failOnRawMode = false;
        input.type('q');
      },
    });

    expect(await runSession(options)).toBe('quit');
    expect(error).toHaveBeenCalledWith('[Terminal] Failed to restore terminal mode:', 'Could not restore the terminal mode');
  });

  it('hands the loop out so signals can stop it', async () => {
    const input = new FakeTtyInput();
    const output = new FakeScreenOutput();

    const reason = await runSession(
      sessionOptions(input, output, {
        sleep: async () => {},
        onLoop: (loop) => {
          loop.on('start', () => loop.stop());
        },
      })
    );

    expect(reason).toBe('stopped');
  });
});
