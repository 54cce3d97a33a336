import type { FrameStore, ScreenOutput, ScreenRenderer, StatusPanel } from '@loopfetch/render';
import { RenderLoop, type Clock, type Sleep, type StopReason } from './loop/render-loop.js';
import type { RawInputController, RawInputHandle } from './terminal/raw-input.js';

export interface SessionOptions {
  /** Runs before the terminal is touched; a NoFramesError ends the session here */
  loadFrames: () => Promise<FrameStore>;
  createPanel: () => Promise<StatusPanel>;
  input: RawInputController;
  screen: ScreenRenderer;
  output: ScreenOutput;
  fps: number;
  /** Called once the loop exists, e.g. to wire signals to stop() */
  onLoop?: (loop: RenderLoop) => void;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * One full-screen session. The terminal is restored on every exit path;
 * a failed restore is logged, never thrown over the error that ended the loop.
 */
export async function runSession(options: SessionOptions): Promise<StopReason> {
  const frames = await options.loadFrames();
  const panel = await options.createPanel();

  const handle: RawInputHandle = options.input.acquire();

  try {
    const loop = new RenderLoop({
      frames,
      panel,
      screen: options.screen,
      output: options.output,
      keys: { poll: () => options.input.poll(handle) },
      fps: options.fps,
      ...(options.clock ? { clock: options.clock } : {}),
      ...(options.sleep ? { sleep: options.sleep } : {}),
    });
    options.onLoop?.(loop);

    options.screen.initialize();
    return await loop.run();
  } finally {
    options.screen.cleanup();
    try {
      options.input.release(handle);
    } catch (error) {
      console.error('[Terminal] Failed to restore terminal mode:', error instanceof Error ? error.message : error);
    }
  }
}
