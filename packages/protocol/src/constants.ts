// Animation box defaults
export const DEFAULT_BOX_WIDTH = 40;
export const DEFAULT_BOX_HEIGHT = 20;
export const DEFAULT_FPS = 12;

// Layout
export const PANE_SEPARATOR = ' │ ';
export const PANEL_RULE_WIDTH = 28;

// Refresh cadence for light status fields
export const LIGHT_REFRESH_INTERVAL_MS = 1000;

// Probe shell commands are killed after this long
export const PROBE_TIMEOUT_MS = 2000;

// Frame files
export const FRAME_FILE_PREFIX = 'frame_';
export const FRAME_FILE_EXTENSION = '.txt';
export const FRAME_FILE_PATTERN = /^frame_(\d+)\.txt$/;

// Darkest -> lightest
export const ASCII_RAMP = '@%#*+=-:. ';

// Keys that end the render loop (raw mode delivers Ctrl+C as a byte)
export const QUIT_KEYS: ReadonlySet<string> = new Set(['q', 'Q', '\x1b', '\x03']);

// Used when the terminal does not report its size
export const FALLBACK_COLUMNS = 80;
export const FALLBACK_ROWS = 24;
