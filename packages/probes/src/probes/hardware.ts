import * as path from 'path';
import { parseCpuModel } from '../text.js';
import type { Probe } from './types.js';

const POWER_SUPPLY = '/sys/class/power_supply';

const PACKAGE_MANAGERS: ReadonlyArray<{ binary: string; label: string; count: string }> = [
  { binary: 'pacman', label: 'pacman', count: 'pacman -Qq | wc -l' },
  { binary: 'dpkg-query', label: 'dpkg', count: "dpkg-query -f '${binary:Package}\\n' -W | wc -l" },
  { binary: 'rpm', label: 'rpm', count: 'rpm -qa | wc -l' },
  { binary: 'flatpak', label: 'flatpak', count: 'flatpak list --app | wc -l' },
  { binary: 'snap', label: 'snap', count: 'snap list | wc -l' },
];

export const packages: Probe = async (ctx) => {
  const counts: string[] = [];
  for (const manager of PACKAGE_MANAGERS) {
    if (!ctx.which(manager.binary)) continue;
    const count = await ctx.run(manager.count);
    if (count) counts.push(`${manager.label}:${count}`);
  }
  return counts.length > 0 ? counts.join(', ') : null;
};

export const cpu: Probe = async (ctx) => parseCpuModel(await ctx.readText('/proc/cpuinfo'));

export const gpu: Probe = (ctx) => ctx.run("lspci 2>/dev/null | grep -i 'vga\\|3d\\|display' | sed -E 's/.*: //' | head -n1");

export const memory: Probe = (ctx) => ctx.run("free -h | awk '/Mem:/ {print $3\"/\"$2}'");

export const swap: Probe = (ctx) => ctx.run("free -h | awk '/Swap:/ {print $3\"/\"$2}'");

export const disk: Probe = (ctx) => ctx.run('df -h --output=source,size,used,avail,pcent / | tail -n1');

export const localIp: Probe = (ctx) => ctx.run("hostname -I | awk '{print $1}'");

export const battery: Probe = async (ctx) => {
  if (ctx.which('upower')) {
    const percentage = await ctx.run(
      "upower -i $(upower -e | grep battery | head -n1) 2>/dev/null | awk -F: '/percentage/ {print $2; exit}'"
    );
    if (percentage) return percentage.trim();
  }

  for (const entry of await ctx.list(POWER_SUPPLY)) {
    if (!entry.toUpperCase().includes('BAT')) continue;
    const capacity = (await ctx.readText(path.join(POWER_SUPPLY, entry, 'capacity')))?.trim();
    const status = (await ctx.readText(path.join(POWER_SUPPLY, entry, 'status')))?.trim();
    if (capacity) return status ? `${capacity}% (${status})` : `${capacity}%`;
  }
  return null;
};

export const powerAdapter: Probe = async (ctx) => {
  const entries = await ctx.list(POWER_SUPPLY);
  return entries.some((entry) => entry.toLowerCase().startsWith('ac')) ? 'AC' : null;
};
