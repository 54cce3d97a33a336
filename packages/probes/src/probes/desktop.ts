import * as path from 'path';
import { iniValue, prefixedLine, stripQuotes } from '../text.js';
import { UNKNOWN_TERMINAL, detectTerminal } from '../theme/detect.js';
import type { Probe } from './types.js';

const WINDOW_MANAGERS = ['hyprland', 'sway', 'i3', 'i3-wm', 'bspwm', 'openbox', 'kwin_x11', 'kwin_wayland', 'mutter', 'kwin'];

function gtkSettings(home: string): string {
  return path.join(home, '.config/gtk-3.0/settings.ini');
}

function kittyConfig(home: string): string {
  return path.join(home, '.config/kitty/kitty.conf');
}

function gsetting(key: string): string {
  return `gsettings get org.gnome.desktop.interface ${key} 2>/dev/null`;
}

export const display: Probe = async (ctx) =>
  (await ctx.run("xrandr --current 2>/dev/null | awk '/\\*/ {print $1; exit}'")) ??
  (await ctx.run("swaymsg -t get_outputs 2>/dev/null | jq -r '.[0].current_mode'"));

export const desktop: Probe = (ctx) => ctx.env.XDG_CURRENT_DESKTOP || ctx.env.DESKTOP_SESSION || null;

export const windowManager: Probe = async (ctx) => {
  if (ctx.which('wmctrl')) {
    const name = await ctx.run("wmctrl -m | awk -F': ' '/Name/ {print $2; exit}'");
    if (name) return name;
  }

  const processes = (await ctx.run('ps -e -o comm=')) ?? '';
  return WINDOW_MANAGERS.find((wm) => processes.includes(wm)) ?? null;
};

export const gtkTheme: Probe = async (ctx) => {
  if (ctx.which('gsettings')) {
    const theme = stripQuotes(await ctx.run(gsetting('gtk-theme')));
    if (theme) return theme;
  }
  return iniValue(await ctx.readText(gtkSettings(ctx.home)), 'gtk-theme-name');
};

export const icons: Probe = async (ctx) =>
  iniValue(await ctx.readText(gtkSettings(ctx.home)), 'gtk-icon-theme-name') ??
  stripQuotes(await ctx.run(gsetting('icon-theme')));

export const font: Probe = async (ctx) => {
  const gnome = stripQuotes(await ctx.run(gsetting('font-name')));
  if (gnome) return gnome;

  const kitty = await ctx.readText(kittyConfig(ctx.home));
  return prefixedLine(kitty, 'font_family ') ?? prefixedLine(kitty, 'font ');
};

export const cursor: Probe = async (ctx) => stripQuotes(await ctx.run(gsetting('cursor-theme')));

export const terminal: Probe = async (ctx) => {
  const name = await detectTerminal(ctx);
  return name === UNKNOWN_TERMINAL ? null : name;
};

export const terminalFont: Probe = async (ctx) => {
  const kitty = await ctx.readText(kittyConfig(ctx.home));
  const kittyFont = prefixedLine(kitty, 'font_family ') ?? prefixedLine(kitty, 'font ');
  if (kittyFont) return kittyFont;

  const yml = await ctx.readText(path.join(ctx.home, '.config/alacritty/alacritty.yml'));
  const ymlFamily = prefixedLine(yml, 'family:');
  if (ymlFamily) return stripQuotes(ymlFamily);

  const toml = await ctx.readText(path.join(ctx.home, '.config/alacritty/alacritty.toml'));
  const tomlFamily = /family\s*=\s*(.+)/.exec(toml ?? '')?.[1];
  return tomlFamily ? stripQuotes(tomlFamily) : null;
};
