// ANSI utilities
export { ANSIBuilder } from './ansi/builder.js';
export * from './ansi/codes.js';
export * from './ansi/colors.js';
export { colorSwatch, rule } from './palette.js';

// Text engine
export {
  glyphWidth,
  heuristicWidth,
  unicodeWidthTable,
  type WidthTable,
} from './text/glyph-width.js';
export {
  tokenize,
  stripEscapes,
  escapeRuns,
  visibleWidth,
  truncate,
  pad,
  type TextToken,
} from './text/ansi-text.js';

// Frames
export { FrameStore, arrayFrameSource, normalizeFrame } from './frames/frame-store.js';

// Status panel
export {
  StatusPanel,
  buildLines,
  refreshLight,
  populate,
  labelFor,
  BARE_FIELDS,
  DEFAULT_PANEL_STYLE,
  type FieldDefinition,
  type PanelStyle,
  type UnavailableHandler,
} from './panels/status-panel.js';

// Layout
export { composeLine, composeRows, type CompositorOptions } from './layout/compositor.js';

// Renderer
export { ScreenRenderer, readGeometry, type ScreenOutput } from './renderer/screen-renderer.js';
