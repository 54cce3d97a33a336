// Sentry must be imported first
import './instrument.js';
import * as Sentry from '@sentry/node';

import 'dotenv/config';
import { ConfigError, FrameGenerationError, LoopfetchError, NoFramesError, TerminalModeError } from '@loopfetch/protocol';
import { generateFramesFromGif, loadFrameDirectory } from '@loopfetch/frames';
import { createProbeContext, createStatusFields, detectTerminalTheme } from '@loopfetch/probes';
import { FrameStore, ScreenRenderer, StatusPanel } from '@loopfetch/render';
import { parseCliOptions } from './cli.js';
import { resolveConfig, type FetchConfig } from './config.js';
import { runSession } from './session.js';
import { RawInputController } from './terminal/raw-input.js';

const STOP_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGHUP', 'SIGINT'];

async function generate(config: FetchConfig): Promise<void> {
  if (!config.input) {
    throw new ConfigError(['input: --gen-frames needs --input <gif>']);
  }

  const outDir = config.out ?? config.animDir;
  console.log(`[Frames] Converting ${config.input} to ${config.width}x${config.height}...`);

  const { frameCount, removed } = await generateFramesFromGif(config.input, outDir, {
    width: config.width,
    height: config.height,
    color: config.color,
    invert: config.invert,
  });

  if (removed > 0) console.log(`[Frames] Removed ${removed} old frames`);
  console.log(`[Frames] Wrote ${frameCount} frames to ${outDir}`);
}

async function play(config: FetchConfig): Promise<void> {
  const ctx = createProbeContext();
  const box = { width: config.width, height: config.height, align: config.align };

  await runSession({
    loadFrames: async () => FrameStore.load(await loadFrameDirectory(config.animDir), box),
    createPanel: async () => {
      const theme = config.theme ? await detectTerminalTheme(ctx) : null;
      return new StatusPanel(createStatusFields(ctx), { style: { accent: theme?.accent ?? null } });
    },
    input: new RawInputController(process.stdin),
    screen: new ScreenRenderer(process.stdout),
    output: process.stdout,
    fps: config.fps,
    onLoop: (loop) => {
      for (const signal of STOP_SIGNALS) {
        process.once(signal, () => loop.stop());
      }
      if (process.env.LOOPFETCH_DEBUG) {
        loop.on('tickSlow', (elapsed: number, period: number) => {
          console.warn(`[Loop] Tick took ${Math.round(elapsed)}ms, budget ${Math.round(period)}ms`);
        });
      }
    },
  });
}

async function main(): Promise<void> {
  const config = resolveConfig(parseCliOptions(process.argv));

  if (config.genFrames) {
    await generate(config);
    return;
  }

  try {
    await play(config);
  } catch (error) {
    if (error instanceof NoFramesError) {
      console.error(`[Frames] ${error.message}`);
      console.error(`Generate some with: loopfetch --gen-frames -i <gif> -o ${config.animDir}`);
      process.exit(1);
    }
    throw error;
  }
}

main().catch(async (error: unknown) => {
  if (error instanceof ConfigError) {
    for (const issue of error.issues) console.error(`[Config] ${issue}`);
  } else if (error instanceof FrameGenerationError) {
    console.error(`[Frames] ${error.message}`);
  } else if (error instanceof TerminalModeError) {
    console.error(`[Terminal] ${error.message}`);
  } else if (error instanceof LoopfetchError) {
    console.error(error.message);
  } else {
    console.error('Fatal error:', error);
    Sentry.captureException(error);
    await Sentry.flush(2000);
  }
  process.exit(1);
});
