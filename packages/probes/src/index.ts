export { createProbeContext, type ProbeContext, type ProbeContextOptions } from './context.js';
export { PROBE_TABLE, createStatusFields } from './registry.js';
export type { Probe, ProbeEntry } from './probes/types.js';
export * from './text.js';
export {
  UNKNOWN_TERMINAL,
  detectTerminal,
  detectTerminalTheme,
  parseAlacrittyConfig,
  parseDconfColors,
  parseKittyConfig,
  parseKonsoleScheme,
  parseXresources,
  type ThemeColors,
} from './theme/detect.js';
