import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, DEFAULT_BOX_HEIGHT, DEFAULT_BOX_WIDTH, DEFAULT_FPS } from '@loopfetch/protocol';

/**
 * Options as commander hands them over; unset ones fall back to the environment
 */
export type CliOptions = {
  animDir?: string;
  width?: string;
  height?: string;
  fps?: string;
  align?: string;
  genFrames?: boolean;
  input?: string;
  out?: string;
  color?: boolean;
  invert?: boolean;
  theme?: boolean;
};

export const FetchConfigSchema = z
  .object({
    animDir: z.string().min(1).describe('Directory holding frame_<n>.txt files'),
    width: z.coerce.number().int().positive().describe('Animation box width in cells'),
    height: z.coerce.number().int().positive().describe('Animation box height in rows'),
    fps: z.coerce.number().positive().max(120).describe('Ticks per second'),
    align: z.enum(['left', 'center']),
    genFrames: z.boolean(),
    input: z.string().min(1).optional().describe('Animated image to convert'),
    out: z.string().min(1).optional().describe('Frame directory to write; defaults to animDir'),
    color: z.boolean(),
    invert: z.boolean(),
    theme: z.boolean().describe('Tint labels with the terminal theme accent'),
  })
  .superRefine((config, ctx) => {
    if (config.genFrames && !config.input) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['input'], message: '--gen-frames needs --input <gif>' });
    }
  });

export type FetchConfig = z.infer<typeof FetchConfigSchema>;

export function defaultAnimDir(home: string = os.homedir()): string {
  return path.join(home, '.local/share/loopfetch/anim');
}

/**
 * Expand a leading `~/`
 */
export function expandHome(dir: string, home: string = os.homedir()): string {
  if (dir === '~') return home;
  return dir.startsWith('~/') ? path.join(home, dir.slice(2)) : dir;
}

/**
 * CLI over environment over defaults, validated. Throws ConfigError with one
 * entry per problem.
 */
export function resolveConfig(
  cli: CliOptions,
  env: Readonly<Record<string, string | undefined>> = process.env,
  home: string = os.homedir()
): FetchConfig {
  const result = FetchConfigSchema.safeParse({
    animDir: expandHome(cli.animDir ?? env.LOOPFETCH_ANIM_DIR ?? defaultAnimDir(home), home),
    width: cli.width ?? env.LOOPFETCH_WIDTH ?? DEFAULT_BOX_WIDTH,
    height: cli.height ?? env.LOOPFETCH_HEIGHT ?? DEFAULT_BOX_HEIGHT,
    fps: cli.fps ?? env.LOOPFETCH_FPS ?? DEFAULT_FPS,
    align: cli.align ?? env.LOOPFETCH_ALIGN ?? 'left',
    genFrames: cli.genFrames ?? false,
    input: cli.input === undefined ? undefined : expandHome(cli.input, home),
    out: cli.out === undefined ? undefined : expandHome(cli.out, home),
    color: cli.color ?? false,
    invert: cli.invert ?? false,
    theme: cli.theme ?? true,
  });

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`));
  }
  return result.data;
}
