export type LoopfetchErrorCode =
  | 'NO_FRAMES'
  | 'PROVIDER_UNAVAILABLE'
  | 'TERMINAL_MODE'
  | 'CONFIG'
  | 'FRAME_GENERATION';

/**
 * Base class for every error the tool raises on purpose
 */
export class LoopfetchError extends Error {
  readonly code: LoopfetchErrorCode;

  constructor(code: LoopfetchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The frame source is empty or unreadable; the loop cannot start
 */
export class NoFramesError extends LoopfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NO_FRAMES', message, options);
  }
}

/**
 * A single status field could not be obtained. Recovered as absent.
 */
export class ProviderUnavailable extends LoopfetchError {
  readonly field: string;

  constructor(field: string, options?: { cause?: unknown }) {
    super('PROVIDER_UNAVAILABLE', `Status provider "${field}" is unavailable`, options);
    this.field = field;
  }
}

/**
 * Raw input mode could not be entered or restored
 */
export class TerminalModeError extends LoopfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TERMINAL_MODE', message, options);
  }
}

export class ConfigError extends LoopfetchError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', issues.join('; '));
    this.issues = issues;
  }
}

export class FrameGenerationError extends LoopfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FRAME_GENERATION', message, options);
  }
}
