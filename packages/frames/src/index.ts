export {
  loadFrameDirectory,
  listFrameFiles,
  splitRows,
  frameFileName,
  cleanFrameDirectory,
  saveFrames,
  type FrameFile,
} from './frame-files.js';
export {
  generateFramesFromGif,
  imageToAsciiFrames,
  pixelsToAsciiRows,
  luminance,
  rampChar,
  type AsciiOptions,
  type RawImageInfo,
  type GenerationResult,
} from './gif-frames.js';
