export * from './constants.js';
export * from './errors.js';
export type * from './types/render.js';
export type * from './types/frame.js';
export type * from './types/status.js';
export type * from './types/theme.js';
