import { PANEL_RULE_WIDTH } from '@loopfetch/protocol';
import { colorSwatch, rule } from '@loopfetch/render';
import { formatUptime, parseOsRelease } from '../text.js';
import type { Probe } from './types.js';

export const title: Probe = async (ctx) => {
  const user = ctx.env.USER || (await ctx.run('whoami')) || 'user';
  const host = (await ctx.run('hostname')) ?? 'host';
  return `${user}@${host}`;
};

export const separator: Probe = () => rule(PANEL_RULE_WIDTH);

export const osName: Probe = async (ctx) =>
  parseOsRelease(await ctx.readText('/etc/os-release')) ??
  (await ctx.run('lsb_release -ds')) ??
  (await ctx.run('uname -o'));

export const host: Probe = async (ctx) => (await ctx.run('hostnamectl --static')) ?? (await ctx.run('hostname'));

export const kernel: Probe = (ctx) => ctx.run('uname -r');

export const uptime: Probe = async (ctx) => {
  const pretty = await ctx.run('uptime -p');
  if (pretty) return pretty.replace(/^up /, '');

  const raw = await ctx.readText('/proc/uptime');
  const seconds = raw === null ? NaN : parseFloat(raw.split(/\s+/)[0] ?? '');
  return Number.isFinite(seconds) ? formatUptime(seconds) : null;
};

export const shell: Probe = async (ctx) => ctx.env.SHELL || (await ctx.run(`ps -o comm= -p ${ctx.ppid}`));

export const locale: Probe = async (ctx) =>
  ctx.env.LANG || (await ctx.run("locale | awk -F= '/^LANG=/ {print $2}'"));

/** Blank line before the swatch */
export const lineBreak: Probe = () => '';

export const colors: Probe = () => colorSwatch();
