import * as path from 'path';
import type { Rgb, TerminalTheme } from '@loopfetch/protocol';
import { COLORS_8, hexToRgb } from '@loopfetch/render';
import type { ProbeContext } from '../context.js';

/** Colors a single config source yielded; `terminal` is filled in later */
export type ThemeColors = Omit<TerminalTheme, 'terminal'>;

const KNOWN_TERMINALS = [
  'kitty',
  'alacritty',
  'wezterm',
  'konsole',
  'gnome-terminal',
  'xfce4-terminal',
  'xterm',
  'st',
  'tilix',
  'urxvt',
  'rxvt',
];

/** What detectTerminal reports when nothing identifies the emulator */
export const UNKNOWN_TERMINAL = 'unknown';

/** How far up the process tree to look for the emulator */
const MAX_ANCESTORS = 16;

const HEX = /#?[0-9A-Fa-f]{6}/;

function pickAccent(palette: Record<string, Rgb>, foreground: Rgb | null, fallbacks: readonly string[]): Rgb | null {
  for (const key of fallbacks) {
    const color = palette[key];
    if (color) return color;
  }
  return foreground;
}

function isEmpty(colors: ThemeColors): boolean {
  return colors.foreground === null && colors.background === null && Object.keys(colors.palette).length === 0;
}

/**
 * Name of the terminal emulator we run in: TERM_PROGRAM, else the first known
 * emulator among our ancestors, else TERM.
 */
export async function detectTerminal(ctx: ProbeContext): Promise<string> {
  if (ctx.env.TERM_PROGRAM) return ctx.env.TERM_PROGRAM;

  let pid = ctx.ppid;
  for (let depth = 0; pid > 1 && depth < MAX_ANCESTORS; depth++) {
    const comm = (await ctx.run(`ps -o comm= -p ${pid}`))?.toLowerCase();
    if (comm && KNOWN_TERMINALS.some((name) => comm.includes(name))) return comm;

    const parent = parseInt((await ctx.run(`ps -o ppid= -p ${pid}`)) ?? '', 10);
    if (!Number.isFinite(parent)) break;
    pid = parent;
  }

  return ctx.env.TERM || UNKNOWN_TERMINAL;
}

/**
 * kitty.conf style: `key value` per line, `#` comments
 */
export function parseKittyConfig(texts: readonly string[]): ThemeColors | null {
  let foreground: Rgb | null = null;
  let background: Rgb | null = null;
  const palette: Record<string, Rgb> = {};

  for (const text of texts) {
    for (const raw of text.split('\n')) {
      const line = raw.trim();
      if (!line || line.startsWith('#')) continue;

      const [key, value] = line.split(/\s+/);
      if (!key || !value) continue;
      const color = hexToRgb(value);
      if (!color) continue;

      const name = key.toLowerCase();
      if (name === 'foreground') foreground = color;
      else if (name === 'background') background = color;
      else if (/^color\d+$/.test(name)) palette[name] = color;
    }
  }

  const colors = { foreground, background, palette, accent: pickAccent(palette, foreground, ['color4', 'color2']) };
  return isEmpty(colors) ? null : colors;
}

/**
 * alacritty.yml (`blue: '#...'`) and alacritty.toml (`blue = "#..."`).
 * Named colors map onto palette slots 0-7.
 */
export function parseAlacrittyConfig(text: string): ThemeColors | null {
  const find = (key: string): Rgb | null => {
    const match = new RegExp(`\\b${key}\\s*[:=]\\s*['"]?(${HEX.source})`).exec(text);
    return match?.[1] ? hexToRgb(match[1]) : null;
  };

  const palette: Record<string, Rgb> = {};
  COLORS_8.forEach((name, index) => {
    const color = find(name);
    if (color) palette[`color${index}`] = color;
  });

  const foreground = find('foreground');
  const colors = {
    foreground,
    background: find('background'),
    palette,
    accent: pickAccent(palette, foreground, ['color4']),
  };
  return isEmpty(colors) ? null : colors;
}

/**
 * Konsole .colorscheme: `[Foreground]`, `[Background]`, `[ColorN]` sections
 * each holding `Color=r,g,b`
 */
export function parseKonsoleScheme(text: string): ThemeColors | null {
  let foreground: Rgb | null = null;
  let background: Rgb | null = null;
  const palette: Record<string, Rgb> = {};
  let section = '';

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    const header = /^\[(.+)\]$/.exec(line);
    if (header?.[1]) {
      section = header[1].toLowerCase();
      continue;
    }

    const match = /^Color\s*=\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)/.exec(line);
    if (!match) continue;
    const color = { r: Number(match[1]), g: Number(match[2]), b: Number(match[3]) };

    if (section === 'foreground') foreground = color;
    else if (section === 'background') background = color;
    else if (/^color\d+$/.test(section)) palette[section] = color;
  }

  const colors = { foreground, background, palette, accent: pickAccent(palette, foreground, ['color4']) };
  return isEmpty(colors) ? null : colors;
}

/**
 * dconf values as GNOME Terminal stores them: `'#rrggbb'` or a list of them
 */
export function parseDconfColors(palette: string | null, foreground: string | null, background: string | null): ThemeColors | null {
  const hexes = (value: string | null): Rgb[] =>
    [...(value ?? '').matchAll(/'(#[0-9A-Fa-f]{6})'/g)].flatMap((m) => {
      const color = m[1] ? hexToRgb(m[1]) : null;
      return color ? [color] : [];
    });

  const slots: Record<string, Rgb> = {};
  hexes(palette).forEach((color, index) => {
    slots[`color${index}`] = color;
  });

  const fg = hexes(foreground)[0] ?? null;
  const colors = {
    foreground: fg,
    background: hexes(background)[0] ?? null,
    palette: slots,
    accent: pickAccent(slots, fg, ['color4']),
  };
  return isEmpty(colors) ? null : colors;
}

/**
 * `*.foreground: #...`, `*color4: #...` and friends
 */
export function parseXresources(text: string): ThemeColors | null {
  let foreground: Rgb | null = null;
  let background: Rgb | null = null;
  const palette: Record<string, Rgb> = {};

  for (const raw of text.split('\n')) {
    const match = /^([A-Za-z0-9.*_-]+):\s*(#?[0-9A-Fa-f]{6})/.exec(raw.trim());
    if (!match?.[1] || !match[2]) continue;

    const key = match[1].toLowerCase();
    const color = hexToRgb(match[2]);
    if (!color) continue;

    if (key.includes('foreground')) foreground = color;
    else if (key.includes('background')) background = color;
    else {
      const slot = /color(\d+)/.exec(key)?.[1];
      if (slot) palette[`color${slot}`] = color;
    }
  }

  const colors = { foreground, background, palette, accent: pickAccent(palette, foreground, ['color4']) };
  return isEmpty(colors) ? null : colors;
}

async function readKitty(ctx: ProbeContext): Promise<ThemeColors | null> {
  const files = ['kitty.conf', 'theme.conf', 'themes/kitty.conf'].map((f) => path.join(ctx.home, '.config/kitty', f));
  const texts: string[] = [];
  for (const file of files) {
    const text = await ctx.readText(file);
    if (text !== null) texts.push(text);
  }
  return texts.length > 0 ? parseKittyConfig(texts) : null;
}

async function readAlacritty(ctx: ProbeContext): Promise<ThemeColors | null> {
  for (const file of ['alacritty.yml', 'alacritty.toml']) {
    const text = await ctx.readText(path.join(ctx.home, '.config/alacritty', file));
    if (text !== null) return parseAlacrittyConfig(text);
  }
  return null;
}

async function readKonsole(ctx: ProbeContext): Promise<ThemeColors | null> {
  const dir = path.join(ctx.home, '.local/share/konsole');
  const scheme = (await ctx.list(dir)).sort().find((entry) => entry.endsWith('.colorscheme'));
  if (!scheme) return null;
  const text = await ctx.readText(path.join(dir, scheme));
  return text === null ? null : parseKonsoleScheme(text);
}

async function readGnomeTerminal(ctx: ProbeContext, terminal: string): Promise<ThemeColors | null> {
  if (!terminal.includes('gnome')) return null;

  const profiles = await ctx.run('gsettings get org.gnome.Terminal.ProfilesList list');
  const profile = profiles?.replace(/[[\]']/g, '').split(',')[0]?.trim();
  if (!profile) return null;

  const key = (name: string): Promise<string | null> =>
    ctx.run(`dconf read /org/gnome/terminal/legacy/profiles:/:${profile}/${name}`);
  return parseDconfColors(await key('palette'), await key('foreground'), await key('background'));
}

async function readXresources(ctx: ProbeContext): Promise<ThemeColors | null> {
  for (const file of ['.Xresources', '.Xdefaults']) {
    const text = await ctx.readText(path.join(ctx.home, file));
    if (text !== null) return parseXresources(text);
  }
  return null;
}

/**
 * Colors of the running terminal, from the first config source that yields any
 */
export async function detectTerminalTheme(ctx: ProbeContext): Promise<TerminalTheme> {
  const terminal = await detectTerminal(ctx);

  const colors =
    (await readKitty(ctx)) ??
    (await readAlacritty(ctx)) ??
    (await readKonsole(ctx)) ??
    (await readGnomeTerminal(ctx, terminal)) ??
    (await readXresources(ctx));

  return {
    terminal,
    foreground: colors?.foreground ?? null,
    background: colors?.background ?? null,
    accent: colors?.accent ?? null,
    palette: colors?.palette ?? {},
  };
}
