import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { LIGHT_REFRESH_INTERVAL_MS, PANE_SEPARATOR, QUIT_KEYS } from '@loopfetch/protocol';
import { composeRows, readGeometry } from '@loopfetch/render';
import type { FrameStore, ScreenOutput, ScreenRenderer, StatusPanel } from '@loopfetch/render';

/**
 * Non-blocking key source, polled once per tick
 */
export interface KeySource {
  poll(): string | null;
}

export type Clock = () => number;
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type StopReason = 'quit' | 'stopped';

export interface RenderLoopConfig {
  frames: FrameStore;
  panel: StatusPanel;
  screen: ScreenRenderer;
  /** Where the live terminal size is read from */
  output: ScreenOutput;
  keys: KeySource;
  fps: number;
  separator?: string;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Sleep that returns early once the signal aborts
 */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

/**
 * Fixed-rate animation loop: one key poll, one draw and one frame advance
 * per tick.
 *
 * Events: `start`, `stop` (reason), `tickSlow` (elapsedMs, periodMs).
 */
export class RenderLoop extends EventEmitter {
  private config: RenderLoopConfig;
  private period: number;
  private clock: Clock;
  private sleep: Sleep;
  private running: boolean = false;
  private stopReason: StopReason = 'stopped';
  private abort: AbortController | null = null;
  private lastLightRefresh: number = 0;
  private ticks: number = 0;

  constructor(config: RenderLoopConfig) {
    super();
    this.config = config;
    this.period = 1000 / config.fps;
    this.clock = config.clock ?? Date.now;
    this.sleep = config.sleep ?? abortableSleep;
  }

  /**
   * Populate the panel, then tick until a quit key or stop()
   */
  async run(): Promise<StopReason> {
    if (this.running) return this.stopReason;

    this.running = true;
    this.stopReason = 'stopped';
    const abort = new AbortController();
    this.abort = abort;
    this.ticks = 0;

    await this.config.panel.populate();
    this.lastLightRefresh = this.clock();
    this.emit('start');

    while (this.running) {
      const tickStart = this.clock();

      const key = this.config.keys.poll();
      if (key !== null && QUIT_KEYS.has(key)) {
        this.stopReason = 'quit';
        this.running = false;
        break;
      }

      if (tickStart - this.lastLightRefresh >= LIGHT_REFRESH_INTERVAL_MS) {
        await this.config.panel.refreshLight();
        this.lastLightRefresh = tickStart;
      }

      this.drawTick();
      this.config.frames.advance();
      this.ticks++;

      const elapsed = this.clock() - tickStart;
      if (elapsed > this.period) {
        this.emit('tickSlow', elapsed, this.period);
      }

      if (!this.running) break;
      await this.sleep(Math.max(0, this.period - elapsed), abort.signal);
    }

    this.abort = null;
    this.emit('stop', this.stopReason);
    return this.stopReason;
  }

  /**
   * Request a stop; a pending sleep ends immediately
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.abort?.abort();
  }

  isRunning(): boolean {
    return this.running;
  }

  getTickCount(): number {
    return this.ticks;
  }

  private drawTick(): void {
    const { frames, panel, screen, output } = this.config;
    const geometry = readGeometry(output);

    const rows = composeRows(frames.current(), panel.lines(), {
      separator: this.config.separator ?? PANE_SEPARATOR,
      columns: geometry.columns,
      boxWidth: frames.box.width,
    });

    screen.draw(rows, geometry);
  }
}
