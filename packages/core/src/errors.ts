// glyphproof/errors - Error kinds raised by filtering and generation

export class GlyphproofError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GlyphproofError';
  }
}

/**
 * A filter stage left no words. Recoverable: the generator swallows it
 * unless raiseErrors is set.
 */
export class NoMatchError extends GlyphproofError {
  constructor(public stage: string, public details: string = '') {
    super(`No words available after ${stage} filter${details ? ` (${details})` : ''}`);
    this.name = 'NoMatchError';
  }
}

/** The requested case mode cannot work with the glyphs or vocab at hand. */
export class ConfigurationError extends GlyphproofError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Malformed criteria, out-of-range parameters or unusable vocab data. */
export class ValidationError extends GlyphproofError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class IndexError extends GlyphproofError {
  constructor(public index: number, public size: number) {
    super(`No word at index ${index} (only ${size} available)`);
    this.name = 'IndexError';
  }
}

/** Errors that mean "ran out of words" rather than caller misuse. */
export function isRecoverable(error: unknown): error is NoMatchError | IndexError {
  return error instanceof NoMatchError || error instanceof IndexError;
}
