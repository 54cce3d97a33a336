import type { FieldDefinition } from '@loopfetch/render';
import type { ProbeContext } from './context.js';
import { cursor, desktop, display, font, gtkTheme, icons, terminal, terminalFont, windowManager } from './probes/desktop.js';
import { battery, cpu, disk, gpu, localIp, memory, packages, powerAdapter, swap } from './probes/hardware.js';
import { colors, host, kernel, lineBreak, locale, osName, separator, shell, title, uptime } from './probes/identity.js';
import type { ProbeEntry } from './probes/types.js';

/**
 * Panel fields top to bottom. Light fields are re-queried every second.
 */
export const PROBE_TABLE: readonly ProbeEntry[] = [
  { name: 'title', tier: 'heavy', probe: title },
  { name: 'separator', tier: 'heavy', probe: separator },
  { name: 'os', tier: 'heavy', label: 'OS', probe: osName },
  { name: 'host', tier: 'heavy', probe: host },
  { name: 'kernel', tier: 'heavy', probe: kernel },
  { name: 'uptime', tier: 'light', probe: uptime },
  { name: 'packages', tier: 'heavy', probe: packages },
  { name: 'shell', tier: 'heavy', probe: shell },
  { name: 'display', tier: 'heavy', probe: display },
  { name: 'de', tier: 'heavy', label: 'DE', probe: desktop },
  { name: 'wm', tier: 'heavy', label: 'WM', probe: windowManager },
  { name: 'wmtheme', tier: 'heavy', label: 'WM Theme', probe: gtkTheme },
  { name: 'theme', tier: 'heavy', probe: gtkTheme },
  { name: 'icons', tier: 'heavy', probe: icons },
  { name: 'font', tier: 'heavy', probe: font },
  { name: 'cursor', tier: 'heavy', probe: cursor },
  { name: 'terminal', tier: 'heavy', probe: terminal },
  { name: 'terminalfont', tier: 'heavy', label: 'Terminal Font', probe: terminalFont },
  { name: 'cpu', tier: 'heavy', label: 'CPU', probe: cpu },
  { name: 'gpu', tier: 'heavy', label: 'GPU', probe: gpu },
  { name: 'memory', tier: 'light', probe: memory },
  { name: 'swap', tier: 'light', probe: swap },
  { name: 'disk', tier: 'light', probe: disk },
  { name: 'localip', tier: 'light', label: 'Local IP', probe: localIp },
  { name: 'battery', tier: 'light', probe: battery },
  { name: 'poweradapter', tier: 'light', label: 'Power Adapter', probe: powerAdapter },
  { name: 'locale', tier: 'heavy', probe: locale },
  { name: 'break', tier: 'heavy', probe: lineBreak },
  { name: 'colors', tier: 'heavy', probe: colors },
];

/**
 * Bind every probe to a context, ready for a StatusPanel
 */
export function createStatusFields(ctx: ProbeContext, table: readonly ProbeEntry[] = PROBE_TABLE): FieldDefinition[] {
  return table.map(({ name, tier, label, probe }) => ({
    name,
    tier,
    ...(label ? { label } : {}),
    provider: () => probe(ctx),
  }));
}
